import { extensionOf, findBulkIdFailures, parseCaptureDate, parseDuplicateGroups, toAsset } from '../../src/api/mappers';
import { logger } from '../../src/utils/logger';

jest.mock('../../src/utils/logger');

describe('mappers', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  describe('extensionOf', () => {
    it('should lower-case the file extension', () => {
      expect(extensionOf('IMG_0042.HEIC', 'image/heic')).toBe('heic');
      expect(extensionOf('archive.tar.gz', null)).toBe('gz');
    });

    it('should fall back to the MIME subtype', () => {
      expect(extensionOf('IMG_0042', 'image/HEIC')).toBe('heic');
      expect(extensionOf('.hidden', null)).toBe('');
    });
  });

  describe('parseCaptureDate', () => {
    it('should return null for missing or unparseable dates', () => {
      expect(parseCaptureDate(undefined)).toBeNull();
      expect(parseCaptureDate('')).toBeNull();
      expect(parseCaptureDate('not a date')).toBeNull();
      expect(parseCaptureDate('2020-02-29T12:00:00+02:00')?.toISOString()).toBe('2020-02-29T10:00:00.000Z');
    });
  });

  describe('toAsset', () => {
    it('should reject entries without an id', () => {
      expect(toAsset({ originalFileName: 'x.jpg' })).toBeNull();
      expect(toAsset('a')).toBeNull();
    });

    it('should require both coordinates for a location', () => {
      const asset = toAsset({ id: 'a', exifInfo: { latitude: 12.5, longitude: null, rating: 3, description: ' Sunset ' } });

      expect(asset?.location).toBeNull();
      expect(asset?.rating).toBe(3);
      expect(asset?.description).toBe('Sunset');
      expect(asset?.albumIds.size).toBe(0);
    });
  });

  describe('parseDuplicateGroups', () => {
    it('should drop malformed entries and assets and warn about them', () => {
      const groups = parseDuplicateGroups([
        { duplicateId: 'd1', assets: [{ id: 'a' }, { name: 'no id' }, { id: 'b' }] },
        { duplicateId: 'd2' },
        { assets: [{ id: 'c' }, { id: 'd' }] }
      ]);

      expect(groups.map((group) => [group.id, group.assets.map((asset) => asset.id)])).toEqual([
        ['d1', ['a', 'b']],
        ['#3', ['c', 'd']]
      ]);
      expect(logger.warn).toHaveBeenCalledWith('Duplicate entry at position 1: 1 asset(s) without an id ignored');
      expect(logger.warn).toHaveBeenCalledWith('Ignoring malformed duplicate entry at position 2');
    });

    it('should refuse a body that is not a list', () => {
      expect(() => parseDuplicateGroups({ error: 'Unauthorized' })).toThrow('Expected an array of duplicate groups');
    });
  });

  describe('findBulkIdFailures', () => {
    it('should ignore successes and duplicates', () => {
      expect(
        findBulkIdFailures([
          { id: 'a', success: true },
          { id: 'b', success: false, error: 'duplicate' },
          { id: 'c', success: false, error: 'not_found' },
          { id: 'd', success: false }
        ])
      ).toEqual(['c (not_found)', 'd (unknown)']);
      expect(findBulkIdFailures(undefined)).toEqual([]);
    });
  });
});
