import { describe, it, expect } from 'vitest';
import { BYTES_PER_MIB, formatMiB, toMiB } from '../file-size';

describe('file size helpers', () => {
  it('converts bytes to MiB', () => {
    expect(toMiB(BYTES_PER_MIB)).toBe(1);
    expect(toMiB(512 * 1024)).toBe(0.5);
  });

  it('formats with two decimals by default', () => {
    expect(formatMiB(52428800)).toBe('50.00 MB');
    expect(formatMiB(0)).toBe('0.00 MB');
    expect(formatMiB(1536 * 1024)).toBe('1.50 MB');
  });

  it('takes the number of decimals', () => {
    expect(formatMiB(4 * BYTES_PER_MIB, 1)).toBe('4.0 MB');
  });
});
