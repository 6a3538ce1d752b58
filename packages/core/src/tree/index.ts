export type {
  NodeStatus,
  ChildDescriptor,
  Lister,
  NodeSnapshot,
  ExpandResult,
  ExpandOptions,
  InvalidateOptions,
  BindOptions,
  ResourceTreeEvents,
} from "./types.js";
export { ResourceTree, type ResourceTreeOptions } from "./resource-tree.js";
