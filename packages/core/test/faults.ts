import { RuntimeFault } from '../src';

export function catchFault(run: () => unknown): RuntimeFault {
  try {
    run();
  } catch (err) {
    if (err instanceof RuntimeFault) return err;
    throw err;
  }
  throw new Error('expected a runtime fault');
}
