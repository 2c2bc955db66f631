/**
 * Formats a number as a dollar amount with commas, no decimal places.
 * Examples: 2000 → "$2,000" | 1500000 → "$1,500,000"
 */
export function formatDollars(amount: number): string {
  return new Intl.NumberFormat('en-US', {
    style: 'currency',
    currency: 'USD',
    minimumFractionDigits: 0,
    maximumFractionDigits: 0,
  }).format(amount);
}

/**
 * Dashboard-card form of a funding goal, in thousands.
 * Examples: 500000 → "$500K" | 2500 → "$3K"
 */
export function formatThousands(amount: number): string {
  return `$${(amount / 1000).toFixed(0)}K`;
}

export function formatSize(bytes: number): string {
  if (bytes < 1024) return `${bytes} B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)} KB`;
  if (bytes < 1024 * 1024 * 1024) return `${(bytes / (1024 * 1024)).toFixed(1)} MB`;
  return `${(bytes / (1024 * 1024 * 1024)).toFixed(1)} GB`;
}

/** Shortens long names for thumbnail captions: "quarterly-plan.pdf" → "quarterly-pl..." */
export function truncateFileName(fileName: string, max = 15): string {
  if (fileName.length <= max) return fileName;
  return `${fileName.slice(0, max - 3)}...`;
}

/** Last path segment of a storage path or URL, query string dropped. */
export function baseName(pathOrUrl: string): string {
  const withoutQuery = pathOrUrl.split('?')[0] ?? '';
  const segments = withoutQuery.split('/');
  return segments[segments.length - 1] ?? '';
}

export function formatDate(iso: string): string {
  return new Date(iso).toLocaleDateString('en-US', {
    year: 'numeric',
    month: 'short',
    day: 'numeric',
  });
}
