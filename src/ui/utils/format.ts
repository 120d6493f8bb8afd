/**
 * Formatting helpers for progress output.
 *
 * Used by the ink progress view and the plain log summaries alike, so
 * both show the same numbers.
 *
 * @module ui/utils/format
 */

const BYTE_UNITS = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];

/**
 * Formats a byte count with binary units.
 *
 * @returns e.g. "0 B", "512 B", "1.5 MiB"
 */
export function formatBytes(bytes: number): string {
  if (!Number.isFinite(bytes) || bytes <= 0) return '0 B';

  let value = bytes;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < BYTE_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }

  if (unitIndex === 0) {
    return `${Math.round(value)} B`;
  }
  return `${value.toFixed(1)} ${BYTE_UNITS[unitIndex]}`;
}

/**
 * Formats a transfer rate.
 *
 * @returns e.g. "0 B/s", "2.0 MiB/s"
 */
export function formatSpeed(bytesPerSecond: number): string {
  return `${formatBytes(bytesPerSecond)}/s`;
}

/**
 * Formats an ETA in seconds.
 *
 * @returns e.g. "45s", "12m 5s", "1h 30m", or "--" when unknown
 */
export function formatEta(seconds: number | null): string {
  if (seconds === null || !Number.isFinite(seconds) || seconds < 0) {
    return '--';
  }

  const total = Math.ceil(seconds);
  const hours = Math.floor(total / 3600);
  const minutes = Math.floor((total % 3600) / 60);
  const secs = total % 60;

  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }
  if (minutes > 0) {
    return secs > 0 ? `${minutes}m ${secs}s` : `${minutes}m`;
  }
  return `${secs}s`;
}

/**
 * Formats an elapsed time in milliseconds, e.g. "3.2s" or "2m 4s".
 */
export function formatDuration(ms: number): string {
  if (ms < 60_000) {
    return `${(Math.max(0, ms) / 1000).toFixed(1)}s`;
  }
  return formatEta(Math.round(ms / 1000));
}

/**
 * Formats a 0-1 ratio as a whole percentage; 100% only when complete.
 */
export function formatProgress(progress: number): string {
  const clamped = Math.max(0, Math.min(1, progress));
  const percent = clamped >= 1 ? 100 : Math.floor(clamped * 100);
  return `${percent}%`;
}

/**
 * Truncates text to `maxLength`, ending with an ellipsis when cut.
 */
export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) {
    return text;
  }
  return text.slice(0, Math.max(0, maxLength - 1)) + '…';
}
