/**
 * Tests for the CopySpy helper
 */

import { describe, it, expect } from 'vitest';
import { CopyError, CopySpy } from './test-utils';

describe('CopySpy', () => {
  it('should allow mutation while unique', () => {
    const spy = CopySpy.create();
    spy.mutate();
    expect(spy.isUnique).toBe(true);
    expect(spy.mutations).toBe(1);
  });

  it('should report a mutation through a copied spy', () => {
    const spy = CopySpy.create();
    const copy = spy.copy();

    expect(spy.isUnique).toBe(false);
    expect(copy.isUnique).toBe(false);
    expect(() => spy.mutate()).toThrow(CopyError);
    expect(() => copy.mutate()).toThrow('Encountered an unexpected copy');
    expect(spy.mutations).toBe(0);
    expect(copy.mutations).toBe(0);
  });
});
