import { DecodeError } from '@rail-trace/domain';
import type { Result } from '@rail-trace/domain';

export function thrownDecodeError(run: () => unknown): DecodeError {
  try {
    run();
  } catch (err) {
    if (err instanceof DecodeError) return err;
    throw err;
  }
  throw new Error('expected a DecodeError to be thrown');
}

export function failureOf<T, E>(result: Result<T, E>): E {
  if (result.ok) throw new Error('expected a failed result');
  return result.error;
}

export function valueOf<T, E>(result: Result<T, E>): T {
  if (!result.ok) throw new Error(`expected a successful result, got ${String(result.error)}`);
  return result.value;
}
