/**
 * Simple usage - persistent map and vector
 */

import { HashTrieMap, PersistentVector } from '../packages/core/src/index';

console.log('=== Persistent collections ===\n');

// ===== Vector =====
console.log('1️⃣ Build a vector and append');
const v1 = PersistentVector.fromList([1, 2, 3]);
const v2 = v1.append(4);
console.log('v1:', v1.elems());
console.log('v2:', v2.elems());
console.log('✅ v1 unchanged after append');

console.log('\n2️⃣ Set by index');
const v3 = v2.set(0, 100);
console.log('v3:', v3.elems());
console.log('v2 === v2.set(0, 1):', v2 === v2.set(0, 1));
console.log('✅ Same instance when the value is identical');

console.log('\n3️⃣ Bounds checks');
const miss = v3.tryIndex(10);
console.log('tryIndex(10):', miss.ok ? miss.value : miss.error.message);

// ===== Map =====
console.log('\n4️⃣ Build a map');
const m1 = HashTrieMap.fromList<string, number>([
  ['apples', 3],
  ['pears', 5],
]);
const m2 = m1.insertWith('apples', 2, (added, old) => added + old);
console.log('m1 apples:', m1.lookup('apples'));
console.log('m2 apples:', m2.lookup('apples'));
console.log('✅ m1 unchanged after insertWith');

console.log('\n5️⃣ Alter and delete');
const m3 = m2.alter('plums', (current) => ({ value: (current?.value ?? 0) + 1 })).delete('pears');
console.log('m3 entries:', m3.toList());
console.log('m3 size:', m3.size);
