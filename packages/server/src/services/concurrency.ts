import { CallTimeoutError } from "../errors.js";

/**
 * Run `fn` with an abort signal that fires after `timeoutMs` or when `parent`
 * aborts. Settles at the deadline even if `fn` ignores its signal.
 */
export function withTimeout<T>(
  fn: (signal: AbortSignal) => Promise<T>,
  timeoutMs: number,
  parent?: AbortSignal,
): Promise<T> {
  if (parent?.aborted) return Promise.reject(abortReason(parent));

  const controller = new AbortController();
  return new Promise<T>((resolve, reject) => {
    const onParentAbort = () => {
      const reason = abortReason(parent);
      controller.abort(reason);
      cleanup();
      reject(reason);
    };
    const timer = setTimeout(() => {
      const err = new CallTimeoutError(timeoutMs);
      controller.abort(err);
      cleanup();
      reject(err);
    }, timeoutMs);
    const cleanup = () => {
      clearTimeout(timer);
      parent?.removeEventListener("abort", onParentAbort);
    };
    parent?.addEventListener("abort", onParentAbort, { once: true });

    fn(controller.signal).then(
      (value) => {
        cleanup();
        resolve(value);
      },
      (err: unknown) => {
        cleanup();
        reject(err);
      },
    );
  });
}

export function abortReason(signal: AbortSignal | undefined): Error {
  const reason: unknown = signal?.reason;
  if (reason instanceof Error) return reason;
  return new Error(typeof reason === "string" ? reason : "Operation aborted");
}

/**
 * Run `worker` over `items` with at most `limit` in flight. Results keep input
 * order. After a worker throws no new items start; the call rejects with the
 * first error once every item already started has settled.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  const errors: unknown[] = [];

  const lane = async (): Promise<void> => {
    while (errors.length === 0 && next < items.length) {
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        errors.push(error);
      }
    }
  };

  const lanes = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  if (errors.length > 0) throw errors[0];
  return results;
}

/** Serializes async sections per key. Distinct keys never wait on each other. */
export class KeyedMutex {
  private tails = new Map<string, Promise<void>>();

  async run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const previous = this.tails.get(key) ?? Promise.resolve();
    let release: () => void = () => {};
    const current = new Promise<void>((resolve) => {
      release = resolve;
    });
    const tail = previous.then(() => current);
    this.tails.set(key, tail);

    await previous;
    try {
      return await fn();
    } finally {
      release();
      if (this.tails.get(key) === tail) this.tails.delete(key);
    }
  }
}
