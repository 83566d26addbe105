export { PartitionTree } from "./partition-tree";
export type { NodeHandle, LeafNode, SplitNode, TreeNode, TreeView, TreeSnapshot } from "./partition-tree";
export { partition, splitRect, DEFAULT_RESIZE_RULES } from "./partitioner";
export { LayoutEngine } from "./layout-engine";
export type { LayoutEngineOptions } from "./layout-engine";
export { createConsoleDiagnostics, silentDiagnostics, isLogLevel, LOG_LEVELS } from "./diagnostics";
export type { Diagnostics, LogLevel } from "./diagnostics";
export { loadConfig, parseScreen, DEFAULT_CONFIG, DEFAULT_SCREEN } from "./config";
export type { LayoutConfig } from "./config";
export {
  parseScript,
  replay,
  toChange,
  formatAssignment,
  ReplayScriptError,
  ScriptedWindow,
  ScriptedWindowSystem,
} from "./replay";
export type { ReplayEvent, ReplayScript, ReplayOptions, ReplayResult } from "./replay";
export type * from "../shared/types";
export type * from "../shared/protocol";
