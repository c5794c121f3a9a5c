import { isJsonObject, isJsonValue } from '@stockfeed/shared';

describe('JSON type guards', () => {
  describe('isJsonValue', () => {
    it('should accept values JSON.parse can produce', () => {
      expect(isJsonValue(null)).toBe(true);
      expect(isJsonValue('text')).toBe(true);
      expect(isJsonValue(12.5)).toBe(true);
      expect(isJsonValue(false)).toBe(true);
      expect(isJsonValue([1, 'a', { b: [null] }])).toBe(true);
      expect(isJsonValue(JSON.parse('{"Time Series (Daily)":{"2024-01-02":{"1. open":"1.0"}}}'))).toBe(true);
    });

    it('should reject values JSON cannot represent', () => {
      expect(isJsonValue(undefined)).toBe(false);
      expect(isJsonValue(Number.NaN)).toBe(false);
      expect(isJsonValue(Infinity)).toBe(false);
      expect(isJsonValue(() => 1)).toBe(false);
      expect(isJsonValue(new Date())).toBe(false);
      expect(isJsonValue({ nested: { when: new Date() } })).toBe(false);
      expect(isJsonValue([1, undefined])).toBe(false);
    });
  });

  describe('isJsonObject', () => {
    it('should accept plain objects only', () => {
      expect(isJsonObject({ a: 1 })).toBe(true);
      expect(isJsonObject(Object.create(null))).toBe(true);
      expect(isJsonObject([])).toBe(false);
      expect(isJsonObject(null)).toBe(false);
      expect(isJsonObject('{}')).toBe(false);
    });
  });
});
