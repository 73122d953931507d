const pad = (n: number): string => String(n).padStart(2, '0');

/**
 * dd/mm/yy - HH:MM:SS in UTC, or ??/??/?? when the asset has no capture date.
 */
export const formatCaptureDate = (date: Date | null): string => {
  if (!date) return '??/??/??';
  const day = `${pad(date.getUTCDate())}/${pad(date.getUTCMonth() + 1)}/${pad(date.getUTCFullYear() % 100)}`;
  const time = `${pad(date.getUTCHours())}:${pad(date.getUTCMinutes())}:${pad(date.getUTCSeconds())}`;
  return `${day} - ${time}`;
};

export const formatMegabytes = (bytes: number): string =>
  String(Math.round((bytes / 1024 / 1024) * 100) / 100);

export const formatIdList = (ids: readonly string[]): string => ids.join(', ');
