export { Arena } from "./core/arena.js";
export { TreeError, type TreeErrorCode } from "./core/errors.js";
export { Tree } from "./tree/tree.js";
export {
  makeHandle,
  sameHandle,
  formatHandle,
  type Handle,
  type TreeNode,
  type NodeEdge,
  type InsertResult,
  type TryInsertResult,
  type TreeConfig,
} from "./interfaces.js";
