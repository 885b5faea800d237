/**
 * Runtime usage - arrays, lists and the fail-fast contract
 */

import {
  arrayGet,
  arrayIter,
  arrayLength,
  arrayNew,
  arraySet,
  configureRuntime,
  listAppend,
  listEmpty,
  listHead,
  listTail,
  listToArray,
  RuntimeFault,
} from '../packages/core/src/index';

console.log('=== O runtime: Arrays and Lists ===\n');

// ===== Arrays =====
console.log('1️⃣ Fixed-length arrays');
const arr = arrayNew<string>(3);
arraySet(arr, 0, 'x');
console.log('length:', arrayLength(arr));
console.log('slots:', [...arrayIter(arr)]);
console.log('arrayNew(-5) length:', arrayLength(arrayNew(-5)));

// ===== Lists =====
console.log('\n2️⃣ Append-ordered lists');
const list = listAppend(listAppend(listAppend(listEmpty<string>(), 'a'), 'b'), 'c');
console.log('toArray:', [...arrayIter(listToArray(list))]);
console.log('head:', listHead(list));
console.log('tail:', [...arrayIter(listToArray(listTail(list)))]);
console.log('head of empty:', listHead(listEmpty()));

// ===== Tail views share nodes =====
console.log('\n3️⃣ Tail views never see appends');
const tail = listTail(list);
const extended = listAppend(tail, 'd');
console.log('list:', [...arrayIter(listToArray(list))]);
console.log('tail:', [...arrayIter(listToArray(tail))]);
console.log('tail + d:', [...arrayIter(listToArray(extended))]);

// ===== Faults =====
console.log('\n4️⃣ Out-of-bounds access is fatal');
// Without a throwing handler this call would abort the process
configureRuntime({
  onFault: (fault) => {
    throw fault;
  },
});
try {
  arrayGet(arr, 3);
} catch (err) {
  if (!(err instanceof RuntimeFault)) throw err;
  console.log('fault:', err.message);
}
