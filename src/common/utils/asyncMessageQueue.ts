/**
 * Creates a queue-based async message stream with a terminal state.
 *
 * Producers push values from any context; a single consumer drains them with
 * `for await`. `end()` finishes the stream after the queued values are
 * delivered. `fail(error)` does the same, then throws `error` from the
 * iterator, so values pushed before the failure are never lost.
 *
 * Usage:
 * ```ts
 * const queue = createAsyncMessageQueue<string>();
 * emitter.on("token", queue.push);
 * emitter.once("finished", () => queue.end());
 * emitter.once("failed", (err) => queue.fail(err));
 *
 * for await (const token of queue.iterate()) {
 *   process.stdout.write(token);
 * }
 * ```
 */
export interface AsyncMessageQueue<T> {
  push: (msg: T) => void;
  iterate: () => AsyncGenerator<T>;
  end: () => void;
  fail: (error: Error) => void;
  readonly closed: boolean;
}

export function createAsyncMessageQueue<T>(): AsyncMessageQueue<T> {
  const queue: T[] = [];
  let resolveNext: (() => void) | null = null;
  let ended = false;
  let failure: Error | null = null;

  const wake = () => {
    if (resolveNext) {
      const resolve = resolveNext;
      resolveNext = null;
      resolve();
    }
  };

  const push = (msg: T) => {
    if (ended) return;
    queue.push(msg);
    wake();
  };

  async function* iterate(): AsyncGenerator<T> {
    for (;;) {
      // Yield everything queued without async boundaries between items
      while (queue.length > 0) {
        const next = queue.shift();
        if (next !== undefined) {
          yield next;
        }
      }
      if (ended) {
        break;
      }
      await new Promise<void>((resolve) => {
        resolveNext = resolve;
      });
    }

    if (failure) {
      throw failure;
    }
  }

  const end = () => {
    ended = true;
    wake();
  };

  const fail = (error: Error) => {
    if (ended) return;
    failure = error;
    end();
  };

  return {
    push,
    iterate,
    end,
    fail,
    get closed() {
      return ended;
    },
  };
}
