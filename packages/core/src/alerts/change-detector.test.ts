import { describe, it, expect } from "vitest";
import { ChangeDetector } from "./change-detector.js";

describe("ChangeDetector", () => {
  it("first observation yields no alerts", () => {
    const detector = new ChangeDetector();

    expect(detector.observe({ a: "running" })).toEqual([]);
    expect(detector.observe({ b: "dead" })).toHaveLength(1); // only "a removed"
  });

  it("running → dead yields exactly one failure alert", () => {
    const detector = new ChangeDetector();

    detector.observe({ a: "running" });
    const alerts = detector.observe({ a: "dead" });

    expect(alerts).toEqual([
      {
        kind: "failed",
        resourceId: "a",
        title: "Resource Failed: a",
        message: "Resource a status changed from running to dead",
        previousStatus: "running",
        currentStatus: "dead",
      },
    ]);
  });

  it("does not repeat the alert while the resource stays failed", () => {
    const detector = new ChangeDetector();

    detector.observe({ a: "running" });
    detector.observe({ a: "dead" });

    expect(detector.observe({ a: "dead" })).toEqual([]);
  });

  it("moving between two failure statuses is not a new failure", () => {
    const detector = new ChangeDetector();

    detector.observe({ a: "failed" });

    expect(detector.observe({ a: "dead" })).toEqual([]);
  });

  it("a resource first seen in a failure status does not alert", () => {
    const detector = new ChangeDetector();

    detector.observe({ a: "running" });

    expect(detector.observe({ a: "running", b: "dead" })).toEqual([]);
  });

  it("reports removed resources", () => {
    const detector = new ChangeDetector({ resourceLabel: "Job" });

    detector.observe(new Map([["web", "running"], ["batch", "pending"]]));
    const alerts = detector.observe(new Map([["web", "running"]]));

    expect(alerts).toEqual([
      {
        kind: "removed",
        resourceId: "batch",
        title: "Job Removed: batch",
        message: "Job batch has been removed",
        previousStatus: "pending",
        currentStatus: null,
      },
    ]);
  });

  it("removal alerts can be switched off", () => {
    const detector = new ChangeDetector({ alertOnRemoval: false });

    detector.observe({ a: "running" });

    expect(detector.observe({})).toEqual([]);
  });

  it("honours custom failure statuses", () => {
    const detector = new ChangeDetector({ failureStatuses: ["critical"] });

    detector.observe({ api: "passing", db: "passing" });
    const alerts = detector.observe({ api: "critical", db: "dead" });

    expect(alerts.map((alert) => [alert.kind, alert.resourceId])).toEqual([
      ["failed", "api"],
    ]);
  });

  it("emits started alerts only when opted in", () => {
    const quiet = new ChangeDetector({ resourceLabel: "Job" });
    const chatty = new ChangeDetector({ resourceLabel: "Job", startStatuses: ["running"] });

    for (const detector of [quiet, chatty]) {
      detector.observe({ web: "pending" });
    }

    expect(quiet.observe({ web: "running" })).toEqual([]);
    expect(chatty.observe({ web: "running" })).toEqual([
      {
        kind: "started",
        resourceId: "web",
        title: "Job Started: web",
        message: "Job web is now running",
        previousStatus: "pending",
        currentStatus: "running",
      },
    ]);
  });

  it("replaces the stored snapshot instead of mutating the caller's map", () => {
    const detector = new ChangeDetector();
    const first = new Map([["a", "running"]]);

    detector.observe(first);
    const stored = detector.snapshot();
    first.set("a", "dead");

    expect(stored?.get("a")).toBe("running");

    detector.observe({ a: "pending" });
    expect(detector.snapshot()).not.toBe(stored);
    expect(stored?.get("a")).toBe("running");
    expect(detector.snapshot()?.get("a")).toBe("pending");
  });

  it("reset() makes the next observation a baseline again", () => {
    const detector = new ChangeDetector();

    detector.observe({ a: "running" });
    detector.reset();

    expect(detector.snapshot()).toBeNull();
    expect(detector.observe({ a: "dead" })).toEqual([]);
  });
});
