import type { BlobDescriptor } from '../azure/types.js';

/**
 * Render a byte count for humans. Example: 1536 -> "1.5 KB"
 */
export function formatSize(bytes: number): string {
  if (bytes < 1024) {
    return `${bytes} B`;
  }
  const units = ['KB', 'MB', 'GB', 'TB'];
  let value = bytes / 1024;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * One line per blob for the list command.
 * Example: "reports/q1.csv  1.5 KB  2024-03-01T10:00:00.000Z"
 */
export function formatListLine(blob: BlobDescriptor): string {
  const modified = blob.lastModified ? blob.lastModified.toISOString() : '-';
  return `${blob.name}  ${formatSize(blob.sizeBytes)}  ${modified}`;
}

/**
 * Multi-line block for the info command.
 */
export function formatDescriptor(blob: BlobDescriptor): string[] {
  return [
    `  Name:           ${blob.name}`,
    `  Size:           ${blob.sizeBytes} bytes`,
    `  Content type:   ${blob.contentType ?? '-'}`,
    `  Last modified:  ${blob.lastModified ? blob.lastModified.toISOString() : '-'}`,
    `  ETag:           ${blob.etag ?? '-'}`,
  ];
}
