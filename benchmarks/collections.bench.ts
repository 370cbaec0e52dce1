/**
 * Benchmark: persistent collections vs native copy vs Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { HashTrieMap, PersistentVector } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);
const vec = PersistentVector.fromList(nativeArr);

const nativeMap = new Map<string, number>(nativeArr.map((i) => [`key${i}`, i] as const));
const trieMap = HashTrieMap.fromList(nativeMap);

describe('Vector: single update at index 500', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    copy[500] = 999;
    return copy;
  });

  bench('PersistentVector.set', () => {
    return vec.set(500, 999);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeArr, (draft) => {
      draft[500] = 999;
    });
  });
});

describe('Vector: append 10 items', () => {
  bench('Native (copy)', () => {
    const copy = nativeArr.slice();
    for (let i = 0; i < 10; i++) copy.push(i);
    return copy;
  });

  bench('PersistentVector.append', () => {
    let v = vec;
    for (let i = 0; i < 10; i++) v = v.append(i);
    return v;
  });
});

describe('Map: insert one key', () => {
  bench('Native (copy)', () => {
    const copy = new Map(nativeMap);
    copy.set('extra', -1);
    return copy;
  });

  bench('HashTrieMap.insert', () => {
    return trieMap.insert('extra', -1);
  });
});

describe('Map: lookup 1000 keys', () => {
  bench('Native', () => {
    let sum = 0;
    for (let i = 0; i < SIZE; i++) sum += nativeMap.get(`key${i}`) ?? 0;
    return sum;
  });

  bench('HashTrieMap.lookup', () => {
    let sum = 0;
    for (let i = 0; i < SIZE; i++) sum += trieMap.lookup(`key${i}`) ?? 0;
    return sum;
  });
});
