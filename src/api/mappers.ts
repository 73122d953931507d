import { Asset, DuplicateGroup, GeoLocation } from '../types';
import { logger } from '../utils/logger';

type JsonObject = Record<string, unknown>;

const isObject = (value: unknown): value is JsonObject =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

const asString = (value: unknown): string | null =>
  typeof value === 'string' ? value : null;

const asNumber = (value: unknown): number | null =>
  typeof value === 'number' && Number.isFinite(value) ? value : null;

export const parseCaptureDate = (value: unknown): Date | null => {
  if (typeof value !== 'string' || value.trim() === '') return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
};

/**
 * Lower-case extension of the original file name, falling back to the MIME
 * subtype (image/heic -> heic) for names without one.
 */
export const extensionOf = (fileName: string, mimeType: string | null): string => {
  const dot = fileName.lastIndexOf('.');
  if (dot > 0 && dot < fileName.length - 1) {
    return fileName.slice(dot + 1).toLowerCase();
  }
  const subtype = mimeType?.split('/')[1];
  return subtype ? subtype.toLowerCase() : '';
};

const toLocation = (exif: JsonObject): GeoLocation | null => {
  const latitude = asNumber(exif.latitude);
  const longitude = asNumber(exif.longitude);
  return latitude === null || longitude === null ? null : { latitude, longitude };
};

const idsOf = (value: unknown): string[] => {
  if (!Array.isArray(value)) return [];
  return value
    .map((entry: unknown) => (isObject(entry) ? asString(entry.id) : null))
    .filter((id): id is string => id !== null && id !== '');
};

export const toAsset = (dto: unknown): Asset | null => {
  if (!isObject(dto)) return null;
  const id = asString(dto.id);
  if (!id) return null;

  const exif = isObject(dto.exifInfo) ? dto.exifInfo : {};
  const fileName = asString(dto.originalFileName) ?? '';
  const mimeType = asString(dto.originalMimeType);
  const description = asString(exif.description)?.trim();
  const rating = asNumber(exif.rating);

  return {
    id,
    fileName,
    extension: extensionOf(fileName, mimeType),
    mimeType,
    capturedAt: parseCaptureDate(exif.dateTimeOriginal),
    fileSize: asNumber(exif.fileSizeInByte) ?? 0,
    exif,
    albumIds: new Set<string>(),
    tagIds: new Set(idsOf(dto.tags)),
    location: toLocation(exif),
    description: description ? description : null,
    rating: rating === null || rating === 0 ? null : rating
  };
};

/**
 * Turn the body of GET /api/duplicates into groups. Entries that are not
 * shaped like a duplicate group, and assets without an id, are dropped.
 */
export const parseDuplicateGroups = (data: unknown): DuplicateGroup[] => {
  if (!Array.isArray(data)) {
    throw new TypeError('Expected an array of duplicate groups');
  }

  const groups: DuplicateGroup[] = [];
  data.forEach((entry: unknown, index: number) => {
    if (!isObject(entry) || !Array.isArray(entry.assets)) {
      logger.warn(`Ignoring malformed duplicate entry at position ${index + 1}`);
      return;
    }
    const assets = entry.assets
      .map(toAsset)
      .filter((asset): asset is Asset => asset !== null);
    if (assets.length !== entry.assets.length) {
      logger.warn(`Duplicate entry at position ${index + 1}: ${entry.assets.length - assets.length} asset(s) without an id ignored`);
    }
    groups.push({ id: asString(entry.duplicateId) ?? `#${index + 1}`, assets });
  });
  return groups;
};

export const parseAlbumIds = (data: unknown): string[] => {
  if (!Array.isArray(data)) {
    throw new TypeError('Expected an array of albums');
  }
  return idsOf(data);
};

/**
 * PUT /albums/:id/assets answers one result per id; an asset that is already
 * in the album comes back as error "duplicate".
 */
export const findBulkIdFailures = (data: unknown): string[] => {
  if (!Array.isArray(data)) return [];
  return data
    .filter(isObject)
    .filter((result) => result.success === false && result.error !== 'duplicate')
    .map((result) => `${asString(result.id) ?? '?'} (${asString(result.error) ?? 'unknown'})`);
};
