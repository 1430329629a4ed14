// Typed deferred: a promise plus the function that settles it.
// Used by the orchestrator's bounded waits on display requests.

import type { Deferred } from "../types.js";

export function createDeferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => {};
  const promise = new Promise<T>((r) => {
    resolve = r;
  });
  return { promise, resolve };
}
