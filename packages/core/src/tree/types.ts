import type { CoreError } from "../errors/catalog.js";

export type NodeStatus = "not-loaded" | "loading" | "loaded" | "error";

/** One entry of a listing. `path` is the full key of the child node. */
export interface ChildDescriptor {
  path: string;
  isContainer: boolean;
  displayLabel: string;
}

/**
 * Fetches one level of a namespace. Throw ResourceNotFoundError for a
 * missing resource (cached as an empty listing); anything else is a
 * transport failure.
 */
export type Lister = (
  path: string,
  signal: AbortSignal,
) => Promise<ChildDescriptor[]>;

export interface NodeSnapshot {
  path: string;
  status: NodeStatus;
  /** Children held by the node; retained through a failed reload. */
  children: ChildDescriptor[] | null;
  loadedAt: Date | null;
  lastError: string | null;
  /** Loaded, but older than its TTL. */
  stale: boolean;
}

export type ExpandResult =
  | { ok: true; node: NodeSnapshot }
  | { ok: false; error: CoreError; node: NodeSnapshot };

export interface ExpandOptions {
  /** Abandons this caller's wait; the load itself keeps running. */
  signal?: AbortSignal;
  /** Reload even when the cached listing is fresh. */
  force?: boolean;
}

export interface InvalidateOptions {
  /** Also invalidate every cached descendant. */
  recursive?: boolean;
}

export interface BindOptions {
  /** Overrides the tree TTL for paths served by this lister. */
  ttlMs?: number;
}

export interface ResourceTreeEvents {
  "node-updated": [path: string, node: NodeSnapshot];
}
