/**
 * Ordered Fallback Tests
 */

import { describe, it, expect, vi } from 'vitest';
import { tryInOrder } from '../src/fallback.js';

describe('tryInOrder', () => {
  it('should return the first non-null result and stop', async () => {
    const attempt = vi.fn(async (candidate: number) => (candidate >= 2 ? candidate * 10 : null));

    await expect(tryInOrder([1, 2, 3], attempt)).resolves.toBe(20);
    expect(attempt.mock.calls).toEqual([
      [1, 0],
      [2, 1],
    ]);
  });

  it('should return null when every candidate fails', async () => {
    const attempt = vi.fn(async () => null);

    await expect(tryInOrder(['a', 'b', 'c'], attempt)).resolves.toBeNull();
    expect(attempt).toHaveBeenCalledTimes(3);
  });

  it('should return null for no candidates', async () => {
    const attempt = vi.fn(async () => 'never');

    await expect(tryInOrder([], attempt)).resolves.toBeNull();
    expect(attempt).not.toHaveBeenCalled();
  });

  it('should propagate a rejection without trying later candidates', async () => {
    const attempt = vi.fn(async (candidate: string) => {
      if (candidate === 'bad') throw new Error('refused');
      return null;
    });

    await expect(tryInOrder(['ok', 'bad', 'later'], attempt)).rejects.toThrow('refused');
    expect(attempt).toHaveBeenCalledTimes(2);
  });
});
