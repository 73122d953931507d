import { Asset } from '../../types';

const countMeaningful = (value: unknown): number => {
  if (value === null || value === undefined) return 0;
  if (typeof value === 'string') return value.trim() === '' ? 0 : 1;
  // Zero is what the server stores for "unknown" (size, rating, exposure...)
  if (typeof value === 'number') return Number.isFinite(value) && value !== 0 ? 1 : 0;
  if (Array.isArray(value)) return value.some((item) => countMeaningful(item) > 0) ? 1 : 0;
  if (typeof value === 'object') {
    return Object.values(value).reduce<number>((total, item) => total + countMeaningful(item), 0);
  }
  return 1;
};

/**
 * Number of EXIF fields on the asset that carry a real value. Nested
 * objects contribute each of their own meaningful fields.
 */
export const scoreMetadata = (asset: Asset): number => countMeaningful(asset.exif);
