import { describe, it, expect } from 'vitest';
import {
  coerceCount,
  entriesForInstance,
  extractInstanceOutput,
  extractResultEntries,
  extractSummaryInstances,
  FIELD_NAMES,
  pickString,
  pickTimestamp,
  pickValue,
} from '../../src/lib/payload-fields.js';
import type { JsonObject } from '../../src/types/json.js';

describe('payload fields', () => {
  describe('pickValue', () => {
    it('should skip empty candidates in order', () => {
      const record = { OverallStatus: '', overallStatus: null, Status: 'Running', status: 'Other' };
      expect(pickValue(record, FIELD_NAMES.status)).toBe('Running');
    });

    it('should treat false, empty arrays and empty objects as missing', () => {
      expect(pickValue({ a: false, b: [], c: {}, d: 0 }, ['a', 'b', 'c', 'd'])).toBe(0);
    });
  });

  it('should trim picked strings and stringify objects', () => {
    expect(pickString({ id: '  abc  ' }, ['id'])).toBe('abc');
    expect(pickString({ id: 7 }, ['id'])).toBe('7');
    expect(pickString({ id: { x: 1 } }, ['id'])).toBe('{"x":1}');
    expect(pickString({}, ['id'])).toBe('');
  });

  it('should pick the first parseable timestamp', () => {
    const record = { ExecutedOn: 'soon', executedOn: '2024-03-01T10:00:00Z' };
    expect(pickTimestamp(record, FIELD_NAMES.summaryStart)?.toISOString()).toBe('2024-03-01T10:00:00.000Z');
  });

  describe('extractSummaryInstances', () => {
    it('should read the first known list key', () => {
      expect(extractSummaryInstances({ TaskInstances: [{ Id: 'i-1' }, 'junk'] })).toEqual([{ Id: 'i-1' }]);
    });

    it('should return undefined without a list', () => {
      expect(extractSummaryInstances({ success: 1 })).toBeUndefined();
      expect(extractSummaryInstances([{ Id: 'i-1' }])).toBeUndefined();
    });
  });

  describe('result entries', () => {
    it('should accept a bare list or a wrapped list', () => {
      expect(extractResultEntries([{ a: 1 }])).toEqual([{ a: 1 }]);
      expect(extractResultEntries({ items: [{ a: 2 }] })).toEqual([{ a: 2 }]);
      expect(extractResultEntries({ nothing: true })).toEqual([]);
      expect(extractResultEntries(undefined)).toEqual([]);
    });

    it('should keep entries for the instance and entries without an id', () => {
      const results: JsonObject = {
        Result: [
          { taskInstanceId: 'i-1', output: 'one' },
          { taskInstanceId: 'i-2', output: 'two' },
          { output: 'shared' },
        ],
      };
      expect(entriesForInstance(results, 'i-1')).toEqual([
        { taskInstanceId: 'i-1', output: 'one' },
        { output: 'shared' },
      ]);
    });
  });

  describe('extractInstanceOutput', () => {
    it('should prefer entry output fields', () => {
      expect(extractInstanceOutput({ Result: [{ resultDetails: 'done' }], output: 'top' })).toBe('done');
    });

    it('should fall back to payload output fields', () => {
      expect(extractInstanceOutput({ stdout: 'hello' })).toBe('hello');
    });

    it('should stringify structured output', () => {
      expect(extractInstanceOutput([{ details: { code: 0 } }])).toBe('{"code":0}');
    });

    it('should return undefined when there is no output', () => {
      expect(extractInstanceOutput({ status: 'ok' })).toBeUndefined();
    });
  });

  it('should coerce counts', () => {
    expect(coerceCount(3)).toBe(3);
    expect(coerceCount(2.9)).toBe(2);
    expect(coerceCount(' 4 ')).toBe(4);
    expect(coerceCount('many')).toBe(0);
    expect(coerceCount(null)).toBe(0);
  });
});
