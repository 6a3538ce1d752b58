/**
 * Lazily built, replaceable client instance. Listers and renewal tasks ask
 * the factory for the client on every call, so a reset after a settings
 * change takes effect on the next call without rebinding anything.
 */
export interface ClientFactory<T> {
  /** The client, built on first use. */
  get(): T;
  /** Drop the current client; the next get() builds a fresh one. */
  reset(): void;
  /** Replace the client, e.g. with a test double. */
  inject(client: T): void;
  /** The client if one has been built or injected. */
  readonly current: T | undefined;
}

export function createClientFactory<T>(build: () => T): ClientFactory<T> {
  let client: T | undefined;

  return {
    get() {
      if (client === undefined) {
        client = build();
      }
      return client;
    },
    reset() {
      client = undefined;
    },
    inject(next) {
      client = next;
    },
    get current() {
      return client;
    },
  };
}
