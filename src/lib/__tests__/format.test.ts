import { describe, it, expect } from 'vitest';
import { baseName, formatDollars, formatSize, formatThousands, truncateFileName } from '../format';

describe('format helpers', () => {
  it('formats dollars without decimals', () => {
    expect(formatDollars(1500000)).toBe('$1,500,000');
  });

  it('formats funding goals in thousands', () => {
    expect(formatThousands(500000)).toBe('$500K');
    expect(formatThousands(2500)).toBe('$3K');
  });

  it('picks a size unit', () => {
    expect(formatSize(512)).toBe('512 B');
    expect(formatSize(2048)).toBe('2.0 KB');
    expect(formatSize(3 * 1024 * 1024)).toBe('3.0 MB');
  });

  it('truncates long file names to 12 characters plus an ellipsis', () => {
    expect(truncateFileName('quarterly-plan.pdf')).toBe('quarterly-pl...');
    expect(truncateFileName('deck.pdf')).toBe('deck.pdf');
  });

  it('takes the last segment of a path or URL', () => {
    expect(baseName('user-1/deck_0_17.pdf')).toBe('deck_0_17.pdf');
    expect(baseName('https://cdn.test/a/b/demo.mp4?token=abc')).toBe('demo.mp4');
  });
});
