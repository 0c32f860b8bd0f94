/**
 * Simple usage - Box, Map and array modifiers
 */

import { Box, modifyIfPresent, modifyOrInsert, modify, modifyAt, IndexOutOfBoundsError } from '../packages/core/src/index';

console.log('=== In-place modifiers ===\n');

// ===== Box =====
console.log('1️⃣ modifyIfPresent on a Box');
const possibleNumber = Box.of(42);
modifyIfPresent(possibleNumber, n => {
  n.value *= 2;
});
console.log('Box.of(42) doubled:', possibleNumber.toString());

const noNumber = Box.empty<number>();
modifyIfPresent(noNumber, n => {
  n.value *= 2;
});
console.log('Box.empty() doubled:', noNumber.toString());

// ===== Map with default =====
console.log('\n2️⃣ modifyOrInsert on a Map');
const hues = new Map([
  ['Heliotrope', 296],
  ['Coral', 16],
]);
modifyOrInsert(hues, 'Coral', () => 16, v => {
  v.value += 2;
});
modifyOrInsert(hues, 'Cerise', () => 328, v => {
  v.value += 2;
});
console.log('hues:', Object.fromEntries(hues));

// ===== Map presence =====
console.log('\n3️⃣ modify through a slot');
modify(hues, 'Aquamarine', slot => {
  slot.set(156);
});
modify(hues, 'Heliotrope', slot => {
  slot.clear();
});
modify(hues, 'Missing', slot =>
  slot.modifyIfPresent(v => {
    v.value += 1;
  })
);
console.log('hues:', Object.fromEntries(hues));

// ===== Restoration on error =====
console.log('\n4️⃣ Errors surface after the container is restored');
const totals = new Map([['a', 5]]);
try {
  modifyOrInsert(totals, 'a', () => 0, () => {
    throw new Error('rejected');
  });
} catch (error) {
  console.log('caught:', error instanceof Error ? error.message : error);
}
console.log('totals:', Object.fromEntries(totals));

// ===== Arrays =====
console.log('\n5️⃣ modifyAt on an array');
const streets = ['Adams Street', 'Butler', 'Channing Street'];
modifyAt(streets, 1, street => {
  street.value += ' Street';
});
console.log('streets:', streets);

try {
  modifyAt(streets, 5, street => {
    street.value = '';
  });
} catch (error) {
  if (!(error instanceof IndexOutOfBoundsError)) throw error;
  console.log('caught:', error.message);
}
