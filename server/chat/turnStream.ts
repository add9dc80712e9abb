/**
 * Wraps a generator so that closing it before the first `next()` still runs
 * `release`. A generator that never started skips its own `finally` blocks.
 */
export function releaseIfUnstarted<T>(
  stream: AsyncGenerator<T, void, undefined>,
  release: () => Promise<unknown> | void,
): AsyncGenerator<T, void, undefined> {
  let started = false;
  const settleUnstarted = async () => {
    if (!started) {
      started = true;
      await release();
    }
  };
  const wrapped: AsyncGenerator<T, void, undefined> = {
    next: () => {
      started = true;
      return stream.next();
    },
    return: async (value) => {
      await settleUnstarted();
      return stream.return(value);
    },
    throw: async (err) => {
      await settleUnstarted();
      return stream.throw(err);
    },
    [Symbol.asyncIterator]: () => wrapped,
  };
  return wrapped;
}
