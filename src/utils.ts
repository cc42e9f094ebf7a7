export function truncateQuery(query: string, maxLength: number = 30): string {
  const trimmed = query.trim().replace(/\s+/g, ' ');
  if (trimmed.length <= maxLength) return `"${trimmed}"`;
  return `"${trimmed.slice(0, maxLength)}..."`;
}

export function formatDuration(milliseconds: number): string {
  const seconds = milliseconds / 1000;

  if (seconds < 60) {
    return `${seconds.toFixed(2)}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = Math.floor(seconds % 60);

  return remainingSeconds > 0
    ? `${minutes}m ${remainingSeconds}s`
    : `${minutes}m`;
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return '0 Bytes';
  const k = 1024;
  const sizes = ['Bytes', 'KB', 'MB', 'GB'];
  const i = Math.min(
    Math.floor(Math.log(bytes) / Math.log(k)),
    sizes.length - 1
  );
  return `${Math.round((bytes / Math.pow(k, i)) * 100) / 100} ${sizes[i]}`;
}

/**
 * One-line preview of chunk text for terminal output
 */
export function previewText(text: string, maxLength: number = 150): string {
  const flattened = text.trim().replace(/\s+/g, ' ');
  if (flattened.length <= maxLength) return flattened;
  return `${flattened.slice(0, maxLength)}...`;
}
