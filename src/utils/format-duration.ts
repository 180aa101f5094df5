/**
 * Format duration from milliseconds to human-readable format
 * Examples:
 *   - 8400 → "8s"
 *   - 125000 (2m 5s) → "2m 5s"
 *   - 3665000 (1h 1m 5s) → "1h 1m"
 */
export function formatDuration(milliseconds: number): string {
  if (!milliseconds || milliseconds <= 0) {
    return '0s';
  }

  const totalSeconds = Math.round(milliseconds / 1000);
  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  if (hours > 0) {
    return minutes > 0 ? `${hours}h ${minutes}m` : `${hours}h`;
  }

  if (minutes > 0) {
    return seconds > 0 ? `${minutes}m ${seconds}s` : `${minutes}m`;
  }

  return `${seconds}s`;
}
