/**
 * Keyed lock
 *
 * Callbacks given to `run` with the same key execute one at a time, in call
 * order. Callbacks with different keys do not wait on each other.
 */

interface Gate {
  promise: Promise<void>;
  open: () => void;
}

function makeGate(): Gate {
  let open: () => void = () => {};
  const promise = new Promise<void>((resolve) => {
    open = resolve;
  });
  return { promise, open };
}

export class KeyedLock {
  private readonly tails = new Map<string, Promise<void>>();

  /**
   * Run `fn` once every earlier callback for `key` has settled. Resolves or
   * rejects with the result of `fn`.
   */
  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    const gate = makeGate();
    const tail = previous.then(() => gate.promise);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      gate.open();
      if (this.tails.get(key) === tail) {
        this.tails.delete(key);
      }
    }
  }

  /** Number of keys with a running or queued callback */
  get size(): number {
    return this.tails.size;
  }
}
