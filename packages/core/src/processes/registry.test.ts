import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { makeMockLogger, deferred } from "../test-utils/index.js";
import { InternalInvariantViolationError } from "../errors/catalog.js";
import { ProcessRegistry } from "./registry.js";
import { assertTransition, isTerminal } from "./transitions.js";
import type { ProcessStatus } from "./types.js";

function waitForAbort(signal: AbortSignal): Promise<never> {
  return new Promise((_, reject) => {
    if (signal.aborted) {
      reject(signal.reason);
      return;
    }
    signal.addEventListener("abort", () => reject(signal.reason), { once: true });
  });
}

describe("ProcessRegistry", () => {
  let registry: ProcessRegistry;

  beforeEach(() => {
    registry = new ProcessRegistry({ logger: makeMockLogger() });
  });

  describe("submit", () => {
    it("returns a running handle and completes with the result", async () => {
      const handle = registry.submit(
        { name: "build", description: "Build image" },
        async () => 42,
      );

      expect(handle.status).toBe("running");
      expect(handle.name).toBe("build");
      expect(handle.description).toBe("Build image");
      expect(handle.startedAt).toBeInstanceOf(Date);
      expect(handle.finishedAt).toBeNull();

      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("completed");
      expect(done?.result).toBe(42);
      expect(done?.error).toBeUndefined();
      expect(done?.finishedAt).toBeInstanceOf(Date);
    });

    it("marks a rejected operation as failed with its message", async () => {
      const handle = registry.submit({ name: "apply" }, async () => {
        throw new Error("plan drifted");
      });

      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("failed");
      expect(done?.error).toBe("plan drifted");
      expect(done?.errorCode).toBe("TRANSPORT_ERROR");
      expect(done).not.toHaveProperty("result");
    });

    it("captures a synchronous throw as a failure", async () => {
      const handle = registry.submit({ name: "connect" }, () => {
        throw new Error("no route to host");
      });

      expect(handle.status).toBe("running");
      const done = await registry.wait(handle.id);
      expect(done?.status).toBe("failed");
      expect(done?.error).toBe("no route to host");
    });

    it("emits process-changed on every transition", async () => {
      const statuses: ProcessStatus[] = [];
      registry.on("process-changed", (handle) => statuses.push(handle.status));

      const handle = registry.submit({ name: "build" }, async () => "ok");
      await registry.wait(handle.id);

      expect(statuses).toEqual(["pending", "running", "completed"]);
    });

    it("records clamped progress reports", async () => {
      const gate = deferred<void>();
      const progress: Array<number | null> = [];
      registry.on("process-changed", (handle) => progress.push(handle.progress));

      const handle = registry.submit({ name: "upload" }, async ({ reportProgress }) => {
        reportProgress(40);
        reportProgress(150);
        await gate.promise;
      });

      await vi.waitFor(() => expect(registry.get(handle.id)?.progress).toBe(100));
      gate.resolve();
      await registry.wait(handle.id);

      expect(progress).toEqual([null, null, 40, 100, 100]);
    });
  });

  describe("cancel", () => {
    it("aborts the signal and ends as cancelled when the operation gives up", async () => {
      const handle = registry.submit({ name: "build" }, ({ signal }) =>
        waitForAbort(signal),
      );

      expect(registry.cancel(handle.id)).toBe(true);
      expect(registry.get(handle.id)?.cancelRequested).toBe(true);

      const done = await registry.wait(handle.id);
      expect(done?.status).toBe("cancelled");
      expect(done?.errorCode).toBe("CANCELLATION_REQUESTED");
      expect(done?.error).toBe("Cancellation requested");
    });

    it("settles as cancelled without starting when cancelled right after submit", async () => {
      const fn = vi.fn(({ signal }: { signal: AbortSignal }) =>
        new Promise<never>((_, reject) => {
          signal.addEventListener("abort", () => reject(signal.reason), { once: true });
        }),
      );
      const handle = registry.submit({ name: "build" }, fn);

      expect(registry.cancel(handle.id)).toBe(true);
      const done = await registry.wait(handle.id);

      expect(fn).not.toHaveBeenCalled();
      expect(done?.status).toBe("cancelled");
      expect(done?.errorCode).toBe("CANCELLATION_REQUESTED");
    });

    it("keeps the operation's own error when it fails after a cancel", async () => {
      const started = deferred<void>();
      const gate = deferred<string>();
      const handle = registry.submit({ name: "backup" }, () => {
        started.resolve();
        return gate.promise;
      });
      await started.promise;

      expect(registry.cancel(handle.id)).toBe(true);
      gate.reject(new Error("disk full"));

      const done = await registry.wait(handle.id);
      expect(done?.status).toBe("failed");
      expect(done?.error).toBe("disk full");
      expect(done?.cancelRequested).toBe(true);
    });

    it("counts an AbortError raised after cancel as cancelled", async () => {
      const started = deferred<void>();
      const handle = registry.submit({ name: "fetch" }, ({ signal }) =>
        new Promise<never>((_, reject) => {
          signal.addEventListener(
            "abort",
            () => {
              const aborted = new Error("This operation was aborted");
              aborted.name = "AbortError";
              reject(aborted);
            },
            { once: true },
          );
          started.resolve();
        }),
      );
      await started.promise;

      expect(registry.cancel(handle.id)).toBe(true);
      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("cancelled");
      expect(done?.error).toBe("Cancellation requested");
    });

    it("refuses non-cancellable handles, which still complete naturally", async () => {
      const gate = deferred<string>();
      const rejected = vi.fn();
      registry.on("cancel-rejected", rejected);

      const handle = registry.submit(
        { name: "migrate", cancellable: false },
        () => gate.promise,
      );

      expect(registry.cancel(handle.id)).toBe(false);
      expect(rejected).toHaveBeenCalledWith(handle.id, "not-cancellable");
      expect(registry.get(handle.id)?.cancelRequested).toBe(false);

      gate.resolve("migrated");
      const done = await registry.wait(handle.id);
      expect(done?.status).toBe("completed");
      expect(done?.result).toBe("migrated");
    });

    it("leaves the natural outcome to an operation that ignores the signal", async () => {
      const gate = deferred<string>();
      const handle = registry.submit({ name: "build" }, () => gate.promise);

      expect(registry.cancel(handle.id)).toBe(true);
      gate.resolve("built anyway");

      const done = await registry.wait(handle.id);
      expect(done?.status).toBe("completed");
      expect(done?.cancelRequested).toBe(true);
      expect(done?.result).toBe("built anyway");
    });

    it("returns false for unknown and terminal handles", async () => {
      const rejected = vi.fn();
      registry.on("cancel-rejected", rejected);

      const handle = registry.submit({ name: "build" }, async () => "ok");
      await registry.wait(handle.id);

      expect(registry.cancel("missing")).toBe(false);
      expect(registry.cancel(handle.id)).toBe(false);
      expect(rejected.mock.calls).toEqual([
        ["missing", "unknown"],
        [handle.id, "terminal"],
      ]);
    });

    it("cancelAll() cancels only cancellable operations in progress", async () => {
      const gate = deferred<void>();
      const a = registry.submit({ name: "a" }, ({ signal }) => waitForAbort(signal));
      const b = registry.submit({ name: "b", cancellable: false }, () => gate.promise);

      expect(registry.cancelAll()).toBe(1);
      gate.resolve();

      expect((await registry.wait(a.id))?.status).toBe("cancelled");
      expect((await registry.wait(b.id))?.status).toBe("completed");
    });
  });

  describe("timeouts", () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("fails an operation that gives up after its timeout", async () => {
      const handle = registry.submit({ name: "connect", timeoutMs: 1000 }, ({ signal }) =>
        waitForAbort(signal),
      );

      await vi.advanceTimersByTimeAsync(999);
      expect(registry.get(handle.id)?.status).toBe("running");

      await vi.advanceTimersByTimeAsync(1);
      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("failed");
      expect(done?.errorCode).toBe("OPERATION_TIMEOUT");
      expect(done?.error).toBe("Operation timed out");
    });

    it("keeps a genuine error raised after the timeout", async () => {
      const handle = registry.submit({ name: "connect", timeoutMs: 1000 }, ({ signal }) =>
        new Promise<never>((_, reject) => {
          signal.addEventListener(
            "abort",
            () => reject(new Error("connection refused")),
            { once: true },
          );
        }),
      );

      await vi.advanceTimersByTimeAsync(1000);
      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("failed");
      expect(done?.error).toBe("connection refused");
      expect(done?.errorCode).toBe("TRANSPORT_ERROR");
    });

    it("never fires a timeout past the timer limit", async () => {
      const gate = deferred<string>();
      const handle = registry.submit(
        { name: "archive", timeoutMs: 3_000_000_000 },
        () => gate.promise,
      );

      await vi.advanceTimersByTimeAsync(60_000);
      expect(registry.get(handle.id)?.status).toBe("running");

      gate.resolve("archived");
      expect((await registry.wait(handle.id))?.status).toBe("completed");
    });
  });

  describe("listeners", () => {
    it("resolves wait() even when a process-changed listener throws", async () => {
      registry.on("process-changed", (handle) => {
        if (handle.status === "completed") throw new Error("render failed");
      });

      const handle = registry.submit({ name: "build" }, async () => "ok");
      const done = await registry.wait(handle.id);

      expect(done?.status).toBe("completed");
      expect(done?.result).toBe("ok");
      expect(registry.get(handle.id)?.status).toBe("completed");
    });

    it("returns a handle from submit() when a listener throws on pending", () => {
      registry.on("process-changed", () => {
        throw new Error("render failed");
      });

      const handle = registry.submit({ name: "build" }, async () => "ok");
      expect(handle.status).toBe("running");
    });
  });

  describe("queries", () => {
    it("lists handles by status and returns recent ones newest first", async () => {
      const gate = deferred<void>();
      const first = registry.submit({ name: "first" }, async () => "ok");
      const second = registry.submit({ name: "second" }, () => gate.promise);
      const third = registry.submit({ name: "third" }, async () => {
        throw new Error("nope");
      });
      await registry.wait(first.id);
      await registry.wait(third.id);

      expect(registry.list().map((h) => h.name)).toEqual(["first", "second", "third"]);
      expect(registry.list({ status: "running" }).map((h) => h.id)).toEqual([second.id]);
      expect(
        registry.list({ status: ["completed", "failed"] }).map((h) => h.name),
      ).toEqual(["first", "third"]);
      expect(registry.recent(2).map((h) => h.name)).toEqual(["third", "second"]);

      gate.resolve();
      await registry.wait(second.id);
    });

    it("returns copies that do not track later changes", async () => {
      const gate = deferred<void>();
      const handle = registry.submit({ name: "build" }, () => gate.promise);
      const seen = registry.get(handle.id);

      gate.resolve();
      await registry.wait(handle.id);

      expect(seen?.status).toBe("running");
      expect(registry.get(handle.id)?.status).toBe("completed");
    });

    it("resolves wait() with undefined for an unknown id", async () => {
      await expect(registry.wait("missing")).resolves.toBeUndefined();
      expect(registry.get("missing")).toBeUndefined();
    });
  });

  describe("sweep", () => {
    const START = new Date("2026-03-01T12:00:00Z").getTime();

    beforeEach(() => {
      vi.useFakeTimers();
      vi.setSystemTime(START);
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it("removes old terminal handles and keeps running ones of any age", async () => {
      const gate = deferred<void>();
      const finished = registry.submit({ name: "done" }, async () => "ok");
      const running = registry.submit({ name: "long" }, () => gate.promise);
      await registry.wait(finished.id);

      expect(registry.sweep(START + 30 * 60 * 1000)).toEqual([]);

      const removed = registry.sweep(START + 2 * 60 * 60 * 1000);

      expect(removed).toEqual([finished.id]);
      expect(registry.get(finished.id)).toBeUndefined();
      expect(registry.get(running.id)?.status).toBe("running");
      expect(registry.size).toBe(1);

      gate.resolve();
      await registry.wait(running.id);
    });

    it("honours a custom retention window", async () => {
      const short = new ProcessRegistry({ logger: makeMockLogger(), retentionMs: 1000 });
      const handle = short.submit({ name: "done" }, async () => "ok");
      await short.wait(handle.id);

      expect(short.sweep(START + 1000)).toEqual([]);
      expect(short.sweep(START + 1001)).toEqual([handle.id]);
    });
  });
});

describe("process transitions", () => {
  it("allows running to any terminal status", () => {
    expect(() => assertTransition("p1", "running", "completed")).not.toThrow();
    expect(() => assertTransition("p1", "running", "cancelled")).not.toThrow();
  });

  it("rejects a second terminal transition", () => {
    expect(() => assertTransition("p1", "completed", "cancelled")).toThrow(
      InternalInvariantViolationError,
    );
    expect(() => assertTransition("p1", "failed", "completed")).toThrow(
      "Invalid process transition: failed -> completed",
    );
  });

  it("knows which statuses are terminal", () => {
    expect(isTerminal("pending")).toBe(false);
    expect(isTerminal("running")).toBe(false);
    expect(isTerminal("completed")).toBe(true);
    expect(isTerminal("failed")).toBe(true);
    expect(isTerminal("cancelled")).toBe(true);
  });
});
