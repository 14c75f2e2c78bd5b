export type Lock = <T>(fn: () => Promise<T>) => Promise<T>;

/**
 * Serialize async operations via a promise chain.
 * Each call runs after the previous one settles, whether it resolved or rejected.
 */
export function createLock(): Lock {
  let chain: Promise<void> = Promise.resolve();

  return <T>(fn: () => Promise<T>): Promise<T> => {
    const result = chain.then(fn, fn);
    // Keep the chain alive past failures; the caller still sees the rejection
    chain = result.then(
      () => {},
      () => {},
    );
    return result;
  };
}
