/**
 * Benchmark: bounds-checked array access vs native and Immer
 */

import { bench, describe } from 'vitest';
import { produce as immerProduce } from 'immer';
import { arrayGet, arrayNew, arraySet } from '../packages/core/src/index';

// ===== Setup =====
const SIZE = 1000;
const oArr = arrayNew<number>(SIZE);
for (let i = 0; i < SIZE; i++) arraySet(oArr, i, i);
const nativeArr = Array.from({ length: SIZE }, (_, i) => i);

describe(`Sequential read (${SIZE} items)`, () => {
  bench('Native', () => {
    let sum = 0;
    for (let i = 0; i < SIZE; i++) sum += nativeArr[i];
    return sum;
  });

  bench('O runtime', () => {
    let sum = 0;
    for (let i = 0; i < SIZE; i++) sum += arrayGet(oArr, i) ?? 0;
    return sum;
  });
});

describe('Single update at index 500', () => {
  bench('Native (in place)', () => {
    nativeArr[500] = 999;
  });

  bench('O runtime', () => {
    arraySet(oArr, 500, 999);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeArr, draft => {
      draft[500] = 999;
    });
  });
});

describe(`Allocate ${SIZE} slots`, () => {
  bench('Native', () => {
    return new Array<number | null>(SIZE).fill(null);
  });

  bench('O runtime', () => {
    return arrayNew(SIZE);
  });
});
