/**
 * Keyed mutual exclusion
 *
 * One lock slot per key. Work for the same key runs strictly one at a time in
 * arrival order; different keys never wait on each other.
 */

/**
 * Keyed lock handle
 */
export interface KeyedLock<K> {
  /** Run `task` once every earlier task for `key` has settled */
  run<T>(key: K, task: () => Promise<T>): Promise<T>;
  /** True while a task for `key` is queued or running */
  isLocked(key: K): boolean;
}

/**
 * Create a keyed lock
 *
 * Each key keeps the tail of a promise chain. A new task waits for the tail,
 * runs, and becomes the new tail; the slot is removed once the chain drains so
 * the map does not grow with every appliance ever seen.
 *
 * @returns Keyed lock instance
 *
 * @example
 * ```typescript
 * const sessions = createKeyedLock<number>();
 * await sessions.run(applianceId, () => runRelaySession(applianceId));
 * ```
 */
export function createKeyedLock<K>(): KeyedLock<K> {
  const tails = new Map<K, Promise<void>>();

  function run<T>(key: K, task: () => Promise<T>): Promise<T> {
    const previous = tails.get(key) ?? Promise.resolve();

    const result = previous.then(task);
    const tail = result.then(
      function() { return undefined; },
      function() { return undefined; }
    );
    tails.set(key, tail);

    void tail.then(function() {
      if (tails.get(key) === tail) {
        tails.delete(key);
      }
    });

    return result;
  }

  function isLocked(key: K): boolean {
    return tails.has(key);
  }

  return {
    run: run,
    isLocked: isLocked
  };
}
