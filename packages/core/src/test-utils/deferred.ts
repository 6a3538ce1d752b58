/** A promise plus its settle functions, for driving collaborators by hand. */
export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(reason: unknown): void;
}

export function deferred<T>(): Deferred<T> {
  const handlers: Pick<Deferred<T>, "resolve" | "reject"> = {
    resolve: () => {},
    reject: () => {},
  };
  const promise = new Promise<T>((resolve, reject) => {
    handlers.resolve = resolve;
    handlers.reject = reject;
  });
  return { promise, resolve: handlers.resolve, reject: handlers.reject };
}
