/**
 * Benchmark: list append / tail / toArray vs Immutable.js List and Immer
 * Append walks the whole chain, so cost grows with list length.
 */

import { bench, describe } from 'vitest';
import { List as ImmutableList } from 'immutable';
import { produce as immerProduce } from 'immer';
import { listAppend, listEmpty, listTail, listToArray, type List } from '../packages/core/src/index';

// ===== Setup =====
function buildList(size: number): List<number> {
  let list = listEmpty<number>();
  for (let i = 0; i < size; i++) {
    list = listAppend(list, i);
  }
  return list;
}

const SMALL = 100;
const MEDIUM = 1000;

const oSmall = buildList(SMALL);
const oMedium = buildList(MEDIUM);
const immutableSmall = ImmutableList(Array.from({ length: SMALL }, (_, i) => i));
const immutableMedium = ImmutableList(Array.from({ length: MEDIUM }, (_, i) => i));
const nativeMedium = Array.from({ length: MEDIUM }, (_, i) => i);

// ===== Append =====
describe(`Append 1 item to ${SMALL} items`, () => {
  bench('O runtime', () => {
    return listAppend(oSmall, -1);
  });

  bench('Immutable.js', () => {
    return immutableSmall.push(-1);
  });
});

describe(`Append 1 item to ${MEDIUM} items`, () => {
  bench('O runtime', () => {
    return listAppend(oMedium, -1);
  });

  bench('Immutable.js', () => {
    return immutableMedium.push(-1);
  });

  bench('Immer produce()', () => {
    return immerProduce(nativeMedium, draft => {
      draft.push(-1);
    });
  });
});

// ===== Tail =====
describe(`Tail of ${MEDIUM} items`, () => {
  bench('O runtime', () => {
    return listTail(oMedium);
  });

  bench('Immutable.js', () => {
    return immutableMedium.shift();
  });
});

// ===== To array =====
describe(`To array (${MEDIUM} items)`, () => {
  bench('O runtime', () => {
    return listToArray(oMedium);
  });

  bench('Immutable.js', () => {
    return immutableMedium.toArray();
  });
});
