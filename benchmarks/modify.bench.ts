/**
 * Benchmark: in-place modifiers vs naive get/set vs Immer
 */

import { bench, describe } from 'vitest';
import { modifyOrInsert, modify, modifyAt } from '../packages/core/src/index';
import { produce as immerProduce, enableMapSet } from 'immer';

enableMapSet();

// ===== Setup =====
const SIZE = 1000;

function createCounts(size: number): Map<string, number> {
  return new Map(Array.from({ length: size }, (_, i): [string, number] => [`k${i}`, i]));
}

function createBuckets(size: number): Map<string, number[]> {
  return new Map(Array.from({ length: size }, (_, i): [string, number[]] => [`k${i}`, [i]]));
}

// ===== Counter increment =====
describe('Increment existing key', () => {
  const nativeCounts = createCounts(SIZE);
  const inplaceCounts = createCounts(SIZE);
  const immerBase = createCounts(SIZE);

  bench('Native get/set', () => {
    nativeCounts.set('k500', (nativeCounts.get('k500') ?? 0) + 1);
  });

  bench('modifyOrInsert()', () => {
    modifyOrInsert(inplaceCounts, 'k500', () => 0, v => {
      v.value += 1;
    });
  });

  bench('Immer produce()', () => {
    immerProduce(immerBase, draft => {
      draft.set('k500', (draft.get('k500') ?? 0) + 1);
    });
  });
});

// ===== Grouping into buckets =====
describe('Append to bucket (half missing)', () => {
  const keys = Array.from({ length: 100 }, (_, i) => `k${i * 20}`);

  bench('Native get/set', () => {
    const buckets = createBuckets(SIZE);
    for (const key of keys) {
      const bucket = buckets.get(key) ?? [];
      bucket.push(1);
      buckets.set(key, bucket);
    }
  });

  bench('modifyOrInsert()', () => {
    const buckets = createBuckets(SIZE);
    for (const key of keys) {
      modifyOrInsert(buckets, key, () => [], bucket => {
        bucket.value.push(1);
      });
    }
  });

  bench('modify()', () => {
    const buckets = createBuckets(SIZE);
    for (const key of keys) {
      modify(buckets, key, slot => {
        const bucket = slot.getOrElse([]);
        bucket.push(1);
        slot.set(bucket);
      });
    }
  });
});

// ===== Element update =====
describe('Update element at index 500', () => {
  const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
  const inplaceArr = Array.from({ length: SIZE }, (_, i) => i);

  bench('Native', () => {
    nativeArr[500] += 1;
  });

  bench('modifyAt()', () => {
    modifyAt(inplaceArr, 500, n => {
      n.value += 1;
    });
  });

  bench('Immer produce()', () => {
    immerProduce(nativeArr, draft => {
      draft[500] += 1;
    });
  });
});
