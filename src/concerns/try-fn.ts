/** Result tuple type for tryFn */
export type TryResult<T> = [ok: true, err: null, data: T] | [ok: false, err: Error, data: undefined];

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs an async operation and settles it into an `[ok, err, data]` tuple
 * instead of throwing.
 */
export async function tryFn<T>(fn: () => Promise<T>): Promise<TryResult<T>> {
  try {
    const data = await fn();
    return [true, null, data];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

/**
 * Synchronous version of tryFn for cases where you know the function is synchronous
 */
export function tryFnSync<T>(fn: () => T): TryResult<T> {
  try {
    return [true, null, fn()];
  } catch (error: unknown) {
    return [false, toError(error), undefined];
  }
}

export default tryFn;
