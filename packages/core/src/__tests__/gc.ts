import { setFlagsFromString } from 'node:v8';
import { runInNewContext } from 'node:vm';

setFlagsFromString('--expose-gc');
const gc: () => void = runInNewContext('gc');

/**
 * Force collections until `condition` holds. Finalization callbacks run
 * between turns of the event loop, so each attempt yields once.
 */
export async function collectGarbageUntil(condition: () => boolean, attempts = 20): Promise<boolean> {
  for (let i = 0; i < attempts; i++) {
    gc();
    await new Promise<void>((resolve) => setTimeout(resolve, 10));
    if (condition()) return true;
  }
  return false;
}
