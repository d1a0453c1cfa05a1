import { describe, it, expect } from 'vitest';
import {
  parseBBox,
  parseDate,
  parseLoggerPosition,
  parseLoggerTime,
  parseMeters,
  parseOptionalTimestamp,
  parseOwnTracks,
  parseRequiredTimestamp,
  parseStageOrder,
  parseTimestamp,
  queryString,
} from '../params';
import { ValidationError } from '../../utils/errors';

describe('request params', () => {
  describe('queryString', () => {
    it('should accept only non-empty strings', () => {
      expect(queryString('abc')).toBe('abc');
      expect(queryString('')).toBeUndefined();
      expect(queryString(['a', 'b'])).toBeUndefined();
      expect(queryString(undefined)).toBeUndefined();
    });
  });

  describe('parseBBox', () => {
    it('should read south-west then north-east corners as lon,lat', () => {
      expect(parseBBox('-0.5,51.2,0.3,51.7')).toEqual({ swLon: -0.5, swLat: 51.2, neLon: 0.3, neLat: 51.7 });
    });

    it('should require a bbox', () => {
      expect(() => parseBBox(undefined)).toThrow('bbox required');
    });

    it('should reject malformed boxes', () => {
      expect(() => parseBBox('1,2,3')).toThrow('invalid bbox format');
      expect(() => parseBBox('1,2,x,4')).toThrow('invalid bbox format');
      expect(() => parseBBox('1,,3,4')).toThrow('invalid bbox format');
      expect(() => parseBBox('')).toThrow('bbox required');
    });
  });

  describe('timestamps', () => {
    it('should parse integer seconds', () => {
      expect(parseOptionalTimestamp('1710057600', 'start')).toBe(1710057600);
      expect(parseOptionalTimestamp(undefined, 'start')).toBeUndefined();
    });

    it('should reject non-integer values', () => {
      expect(() => parseOptionalTimestamp('yesterday', 'start')).toThrow('invalid start timestamp');
      expect(() => parseOptionalTimestamp('1.5', 'end')).toThrow('invalid end timestamp');
    });

    it('should require both ends of a range', () => {
      expect(() => parseRequiredTimestamp(undefined, 'end')).toThrow('start and end timestamps required');
      expect(parseRequiredTimestamp('0', 'start')).toBe(0);
    });
  });

  describe('parseTimestamp', () => {
    it('should parse a single timestamp', () => {
      expect(parseTimestamp('1710057600')).toBe(1710057600);
    });

    it('should explain what is wrong', () => {
      expect(() => parseTimestamp(undefined)).toThrow('timestamp required');
      expect(() => parseTimestamp('noon')).toThrow('invalid timestamp');
    });
  });

  describe('parseMeters', () => {
    it('should treat a missing value as disabled', () => {
      expect(parseMeters(undefined, 'prune')).toBe(0);
    });

    it('should parse distances', () => {
      expect(parseMeters('25.5', 'prune')).toBe(25.5);
    });

    it('should reject negative or non-numeric distances', () => {
      expect(() => parseMeters('-1', 'spikes')).toThrow('spikes must not be negative');
      expect(() => parseMeters('far', 'spikes')).toThrow('invalid spikes');
    });
  });

  describe('parseStageOrder', () => {
    it('should split a comma separated list', () => {
      expect(parseStageOrder('spikes, stationary')).toEqual(['spikes', 'stationary']);
      expect(parseStageOrder(undefined)).toBeUndefined();
    });
  });

  describe('parseDate', () => {
    it('should accept calendar dates', () => {
      expect(parseDate('2024-03-10')).toBe('2024-03-10');
    });

    it('should reject other formats', () => {
      expect(() => parseDate('10/03/2024')).toThrow('date must be YYYY-MM-DD');
      expect(() => parseDate(undefined)).toThrow('date must be YYYY-MM-DD');
    });
  });

  describe('parseLoggerTime', () => {
    const now = 1710057600123;

    it('should accept unix seconds and RFC 3339', () => {
      expect(parseLoggerTime('1710000000', now)).toBe(1710000000);
      expect(parseLoggerTime('2024-03-10T08:00:00Z', now)).toBe(1710057600);
    });

    it('should fall back to now', () => {
      expect(parseLoggerTime(undefined, now)).toBe(1710057600);
      expect(parseLoggerTime('soon', now)).toBe(1710057600);
    });
  });

  describe('parseLoggerPosition', () => {
    it('should parse decimal coordinates', () => {
      expect(parseLoggerPosition('51.5', ' -0.12')).toEqual({ lat: 51.5, lon: -0.12 });
    });

    it('should require both coordinates as numbers', () => {
      expect(() => parseLoggerPosition('51.5', undefined)).toThrow('lat and lon are required');
      expect(() => parseLoggerPosition('north', '0')).toThrow('lat and lon are required');
      expect(() => parseLoggerPosition(['1', '2'], '0')).toThrow(ValidationError);
    });
  });

  describe('parseOwnTracks', () => {
    it('should turn a location message into a sample', () => {
      expect(
        parseOwnTracks({ _type: 'location', lat: 51.5, lon: -0.12, tst: 1710057600, tid: 'ph', acc: 12, vel: 30 })
      ).toEqual({
        type: 'location',
        sample: {
          timestamp: 1710057600,
          deviceId: 'ph',
          lat: 51.5,
          lon: -0.12,
          source: 'owntracks',
          accuracyMeters: 12,
          speedKmh: 30,
        },
      });
    });

    it('should default the device id', () => {
      const message = parseOwnTracks({ _type: 'location', lat: 1, lon: 2, tst: 3 });

      expect(message.type === 'location' && message.sample.deviceId).toBe('owntracks');
    });

    it('should ignore other message types', () => {
      expect(parseOwnTracks({ _type: 'transition', event: 'enter' })).toEqual({ type: 'ignored' });
    });

    it('should reject incomplete locations', () => {
      expect(() => parseOwnTracks({ _type: 'location', lat: 51.5, tst: 1 })).toThrow(ValidationError);
      expect(() => parseOwnTracks('location')).toThrow('invalid json');
      expect(() => parseOwnTracks([{ _type: 'location' }])).toThrow('invalid json');
      expect(() => parseOwnTracks({ _type: 'location', lat: 'x', lon: 1, tst: 1 })).toThrow(
        'location requires numeric lat, lon and tst'
      );
    });
  });
});
