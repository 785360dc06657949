import { parseMetadata, validateMetadata } from './metadata';
import { InvalidMetadataError } from '../shared/errors';

describe('monitor metadata', () => {
  describe('validateMetadata', () => {
    test('should treat missing metadata as empty', () => {
      expect(validateMetadata(undefined)).toEqual({});
      expect(validateMetadata(null)).toEqual({});
    });

    test('should accept flat scalar values', () => {
      expect(validateMetadata({ site: 'lab', rig: 2, active: true, note: null })).toEqual({
        site: 'lab',
        rig: 2,
        active: true,
        note: null,
      });
    });

    test('should reject values that are not plain objects', () => {
      expect(() => validateMetadata([1, 2])).toThrow(InvalidMetadataError);
      expect(() => validateMetadata('site=lab')).toThrow('Metadata must be a JSON object');
      expect(() => validateMetadata(new Date(0))).toThrow(InvalidMetadataError);
    });

    test('should reject nested or non-finite values', () => {
      expect(() => validateMetadata({ nested: { a: 1 } })).toThrow(
        'Metadata field "nested" must be a string, finite number, boolean or null'
      );
      expect(() => validateMetadata({ reading: Number.NaN })).toThrow(InvalidMetadataError);
    });
  });

  describe('parseMetadata', () => {
    test('should parse JSON text', () => {
      expect(parseMetadata('{"site":"lab","rig":2}')).toEqual({ site: 'lab', rig: 2 });
    });

    test('should treat blank input as no metadata', () => {
      expect(parseMetadata('')).toEqual({});
      expect(parseMetadata('   ')).toEqual({});
      expect(parseMetadata(null)).toEqual({});
    });

    test('should reject malformed JSON', () => {
      expect(() => parseMetadata('{site: lab}')).toThrow(InvalidMetadataError);
      expect(() => parseMetadata('[1]')).toThrow('Metadata must be a JSON object');
    });
  });
});
