import { mkdtemp, readFile, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { CoreConfigSchema } from "@opentongchi/core/schemas";
import { makeMockLogger } from "@opentongchi/core/test-utils";
import { createRuntime } from "./bootstrap.js";

describe("createRuntime", () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "runtime-test-"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("loads config from the root path and writes defaults back", async () => {
    const ctx = await createRuntime({ rootPath: tempDir, logger: makeMockLogger() });

    expect(ctx.rootPath).toBe(tempDir);
    expect(ctx.config.tree.ttlSeconds).toBe(0);
    expect(ctx.coordinator.state).toBe("idle");

    const written: unknown = JSON.parse(await readFile(join(tempDir, "config.json"), "utf-8"));
    expect(written).toEqual(ctx.config);
    await ctx.cleanup();
  });

  it("uses an explicit config without touching disk", async () => {
    const config = CoreConfigSchema.parse({ processes: { retentionSeconds: 60 } });
    const ctx = await createRuntime({ rootPath: tempDir, config, logger: makeMockLogger() });

    expect(ctx.config).toBe(config);
    await expect(readFile(join(tempDir, "config.json"), "utf-8")).rejects.toThrow();
    await ctx.cleanup();
  });

  it("registers the process sweep task", async () => {
    const ctx = await createRuntime({ rootPath: tempDir, logger: makeMockLogger() });

    expect(ctx.coordinator.listTasks().map((task) => task.id)).toEqual(["process-sweep"]);
    await ctx.cleanup();
  });

  it("cleanup stops the coordinator", async () => {
    const ctx = await createRuntime({ rootPath: tempDir, logger: makeMockLogger() });
    ctx.coordinator.start();

    await ctx.cleanup();

    expect(ctx.coordinator.state).toBe("stopped");
  });

  it("startedAt is a reasonable timestamp", async () => {
    const before = new Date();
    const ctx = await createRuntime({ rootPath: tempDir, logger: makeMockLogger() });
    const after = new Date();

    expect(ctx.startedAt.getTime()).toBeGreaterThanOrEqual(before.getTime());
    expect(ctx.startedAt.getTime()).toBeLessThanOrEqual(after.getTime());
    await ctx.cleanup();
  });
});
