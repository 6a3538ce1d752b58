/**
 * Lazily populated, cached forest of resource nodes fed by listers.
 *
 * - A node is created on first reference and loaded on first expand.
 * - Concurrent expands of one path share a single lister call.
 * - Loaded listings expire after a TTL (0 = only explicit invalidation).
 * - A failed reload keeps the previous children next to the error.
 *
 * Paths are opaque keys. Listers are bound by string prefix and subtrees
 * are found through the cached child descriptors, never by parsing paths.
 */

import { EventEmitter } from "node:events";
import type { Logger } from "pino";
import {
  CancellationRequestedError,
  ListerTimeoutError,
  NoListerError,
  ResourceNotFoundError,
  errorMessage,
  toTransportError,
  type CoreError,
} from "../errors/catalog.js";
import { componentLogger } from "../logger/index.js";
import { createDeadline, raceSignal } from "../signals/deadline.js";
import type {
  BindOptions,
  ChildDescriptor,
  ExpandOptions,
  ExpandResult,
  InvalidateOptions,
  Lister,
  NodeSnapshot,
  NodeStatus,
  ResourceTreeEvents,
} from "./types.js";

export interface ResourceTreeOptions {
  logger: Logger;
  /** Tree name used in logs. */
  name?: string;
  /** Default time-to-live of a loaded listing in ms. Default: 0 (never stale) */
  ttlMs?: number;
  /** Upper bound for one lister call in ms. Default: 30000 */
  listerTimeoutMs?: number;
}

interface ResourceNode {
  path: string;
  status: NodeStatus;
  children: ChildDescriptor[] | null;
  loadedAt: number | null;
  lastError: string | null;
  /** Bumped on invalidation; loads started under an older value are not cached. */
  generation: number;
}

interface Binding {
  prefix: string;
  lister: Lister;
  ttlMs: number | undefined;
}

interface InFlightLoad {
  generation: number;
  promise: Promise<ExpandResult>;
}

export class ResourceTree extends EventEmitter<ResourceTreeEvents> {
  readonly name: string;

  private readonly nodes = new Map<string, ResourceNode>();
  private readonly inFlight = new Map<string, InFlightLoad>();
  private readonly bindings = new Map<string, Binding>();
  private readonly logger: Logger;
  private readonly ttlMs: number;
  private readonly listerTimeoutMs: number;
  private generationSeq = 0;

  constructor(options: ResourceTreeOptions) {
    super();
    this.name = options.name ?? "default";
    this.logger = componentLogger(options.logger, "resource-tree").child({
      tree: this.name,
    });
    this.ttlMs = options.ttlMs ?? 0;
    this.listerTimeoutMs = options.listerTimeoutMs ?? 30_000;
  }

  /**
   * Serve every path starting with `prefix` from `lister`. The longest
   * matching prefix wins. Returns an unbind function.
   */
  bind(prefix: string, lister: Lister, options?: BindOptions): () => void {
    const binding: Binding = { prefix, lister, ttlMs: options?.ttlMs };
    this.bindings.set(prefix, binding);
    return () => {
      if (this.bindings.get(prefix) === binding) {
        this.bindings.delete(prefix);
      }
    };
  }

  /**
   * Children of `path`, from cache when loaded and fresh, otherwise from
   * the bound lister. Never rejects: failures come back as `ok: false`.
   */
  async expand(path: string, options?: ExpandOptions): Promise<ExpandResult> {
    const signal = options?.signal;
    const node = this.getOrCreate(path);

    if (signal?.aborted) {
      return this.cancelled(node);
    }

    const load = this.joinOrStartLoad(path, options?.force ?? false);

    try {
      return signal ? await raceSignal(load, signal) : await load;
    } catch (err) {
      const current = this.nodes.get(path) ?? node;
      if (signal?.aborted) {
        return this.cancelled(current);
      }
      this.logger.error({ path, error: errorMessage(err) }, "Expand failed");
      return { ok: false, error: toTransportError(err), node: this.snapshot(current) };
    }
  }

  /** Non-blocking view of a node. Never loads and never creates the node. */
  peek(path: string): NodeSnapshot {
    const node = this.nodes.get(path);
    if (!node) {
      return {
        path,
        status: "not-loaded",
        children: null,
        loadedAt: null,
        lastError: null,
        stale: false,
      };
    }
    return this.snapshot(node);
  }

  /**
   * Discard the cached listing of `path` (and, when recursive, of every
   * cached descendant) so the next expand reloads. Returns the number of
   * nodes invalidated.
   */
  invalidate(path: string, options?: InvalidateOptions): number {
    const targets = options?.recursive ? this.subtree(path) : [path];
    let count = 0;

    for (const target of targets) {
      const node = this.nodes.get(target);
      if (!node) continue;
      this.discard(node);
      count++;
    }

    if (count > 0) {
      this.logger.debug({ path, count }, "Invalidated cached listing");
    }
    return count;
  }

  /** Invalidate every node of the forest. Returns the number of nodes. */
  invalidateAll(): number {
    for (const node of this.nodes.values()) {
      this.discard(node);
    }
    this.logger.debug({ count: this.nodes.size }, "Invalidated every listing");
    return this.nodes.size;
  }

  /** Remove `path` and its cached subtree from the forest. */
  prune(path: string): number {
    const targets = this.subtree(path);
    let count = 0;
    for (const target of targets) {
      if (this.nodes.delete(target)) count++;
    }
    return count;
  }

  /** Tear the forest down. Loads in flight still answer their waiters. */
  clear(): void {
    this.nodes.clear();
  }

  has(path: string): boolean {
    return this.nodes.has(path);
  }

  get size(): number {
    return this.nodes.size;
  }

  private async joinOrStartLoad(
    path: string,
    force: boolean,
  ): Promise<ExpandResult> {
    let current = this.getOrCreate(path);

    if (!force && current.status === "loaded" && !this.isStale(current)) {
      return { ok: true, node: this.snapshot(current) };
    }

    let load = this.inFlight.get(path);

    // A load started before an invalidation must not be reused, and must
    // not overlap a new call for the same path: wait it out first.
    while (load && load.generation !== current.generation) {
      await load.promise;
      current = this.getOrCreate(path);
      if (!force && current.status === "loaded" && !this.isStale(current)) {
        return { ok: true, node: this.snapshot(current) };
      }
      load = this.inFlight.get(path);
    }

    if (load) {
      return load.promise;
    }
    return this.startLoad(current);
  }

  private startLoad(node: ResourceNode): Promise<ExpandResult> {
    const binding = this.resolveBinding(node.path);
    if (!binding) {
      const error = new NoListerError({ path: node.path });
      return Promise.resolve(this.fail(node.path, node.generation, error));
    }

    node.status = "loading";
    this.emitUpdate(node);
    this.logger.debug({ path: node.path }, "Loading listing");

    const entry: InFlightLoad = {
      generation: node.generation,
      promise: this.runLister(node.path, node.generation, binding),
    };
    this.inFlight.set(node.path, entry);

    return entry.promise.finally(() => {
      if (this.inFlight.get(node.path) === entry) {
        this.inFlight.delete(node.path);
      }
    });
  }

  private async runLister(
    path: string,
    generation: number,
    binding: Binding,
  ): Promise<ExpandResult> {
    const deadline = createDeadline(
      this.listerTimeoutMs,
      () => new ListerTimeoutError({ path, timeoutMs: this.listerTimeoutMs }),
    );

    try {
      const children = await raceSignal(
        Promise.resolve().then(() => binding.lister(path, deadline.signal)),
        deadline.signal,
      );
      return this.complete(path, generation, children);
    } catch (err) {
      if (err instanceof ResourceNotFoundError) {
        return this.complete(path, generation, []);
      }
      return this.fail(path, generation, toTransportError(err));
    } finally {
      deadline.dispose();
    }
  }

  private complete(
    path: string,
    generation: number,
    children: ChildDescriptor[],
  ): ExpandResult {
    const listing = children.map((child) => ({ ...child }));
    const node = this.nodes.get(path);

    if (!node || node.generation !== generation) {
      // Invalidated or pruned while loading: answer waiters, cache nothing
      return {
        ok: true,
        node: {
          path,
          status: "loaded",
          children: listing,
          loadedAt: new Date(),
          lastError: null,
          stale: false,
        },
      };
    }

    node.status = "loaded";
    node.children = listing;
    node.loadedAt = Date.now();
    node.lastError = null;
    this.emitUpdate(node);
    this.logger.debug(
      { path, children: listing.length },
      "Listing loaded",
    );

    return { ok: true, node: this.snapshot(node) };
  }

  private fail(path: string, generation: number, error: CoreError): ExpandResult {
    const node = this.nodes.get(path);
    this.logger.warn({ path, error: error.message }, "Listing failed");

    if (!node || node.generation !== generation) {
      return {
        ok: false,
        error,
        node: {
          path,
          status: "error",
          children: null,
          loadedAt: null,
          lastError: errorMessage(error),
          stale: false,
        },
      };
    }

    // Previous children stay so a transient failure does not blank the view
    node.status = "error";
    node.lastError = errorMessage(error);
    this.emitUpdate(node);

    return { ok: false, error, node: this.snapshot(node) };
  }

  private discard(node: ResourceNode): void {
    node.status = "not-loaded";
    node.children = null;
    node.lastError = null;
    node.generation = ++this.generationSeq;
    this.emitUpdate(node);
  }

  private cancelled(node: ResourceNode): ExpandResult {
    return {
      ok: false,
      error: new CancellationRequestedError({ path: node.path }),
      node: this.snapshot(node),
    };
  }

  private getOrCreate(path: string): ResourceNode {
    let node = this.nodes.get(path);
    if (!node) {
      node = {
        path,
        status: "not-loaded",
        children: null,
        loadedAt: null,
        lastError: null,
        generation: ++this.generationSeq,
      };
      this.nodes.set(path, node);
    }
    return node;
  }

  private resolveBinding(path: string): Binding | undefined {
    let best: Binding | undefined;
    for (const binding of this.bindings.values()) {
      if (
        path.startsWith(binding.prefix) &&
        (!best || binding.prefix.length > best.prefix.length)
      ) {
        best = binding;
      }
    }
    return best;
  }

  private isStale(node: ResourceNode): boolean {
    if (node.status !== "loaded" || node.loadedAt === null) return false;
    const ttlMs = this.resolveBinding(node.path)?.ttlMs ?? this.ttlMs;
    return ttlMs > 0 && Date.now() - node.loadedAt >= ttlMs;
  }

  /** `path` plus every cached descendant reachable through child listings. */
  private subtree(path: string): string[] {
    const seen = new Set<string>([path]);
    const queue = [path];

    while (queue.length > 0) {
      const current = queue.shift();
      if (current === undefined) break;
      const children = this.nodes.get(current)?.children ?? [];
      for (const child of children) {
        if (!seen.has(child.path)) {
          seen.add(child.path);
          queue.push(child.path);
        }
      }
    }
    return [...seen];
  }

  private snapshot(node: ResourceNode): NodeSnapshot {
    return {
      path: node.path,
      status: node.status,
      children: node.children ? node.children.map((child) => ({ ...child })) : null,
      loadedAt: node.loadedAt !== null ? new Date(node.loadedAt) : null,
      lastError: node.lastError,
      stale: this.isStale(node),
    };
  }

  /** Listener errors are logged; they never fail a load. */
  private emitUpdate(node: ResourceNode): void {
    try {
      this.emit("node-updated", node.path, this.snapshot(node));
    } catch (err) {
      this.logger.error(
        { path: node.path, error: errorMessage(err) },
        "node-updated listener threw",
      );
    }
  }
}
