// Identity
export {
  asNodeId,
  asScopeId,
  asValueId,
  asVarId,
  IdAllocator,
  type NodeId,
  type ScopeId,
  type ValueId,
  type VarId,
} from "./model/identity.js";

// Binding model
export {
  createHint,
  isFunctionValue,
  type FunctionValue,
  type Hint,
  type LocalVar,
  type OpaqueValue,
  type Param,
  type Position,
  type ReferenceVar,
  type Value,
  type ValueLocation,
  type Var,
  type VarLocation,
} from "./model/values.js";

// Syntax
export {
  DEFAULT_LUA_VERSION,
  isLuaVersion,
  isParenthesized,
  LUA_VERSIONS,
  parseLua,
  rangeOf,
  startOf,
  SyntaxTree,
  type LuaVersion,
  type NodeRange,
  type ParseFailure,
  type ParseOptions,
  type ParseResult,
} from "./syntax/parse.js";

// Scopes
export { Arena } from "./scope/arena.js";
export {
  ROOT_SCOPE_NAME,
  ScopeInvariantError,
  ScopeTree,
  type Scope,
  type ScopeInvariantCode,
} from "./scope/scope-tree.js";
export { ScopeBuilder, type BuildResult } from "./scope/builder.js";

// Hints
export { callHints, resolveCallee } from "./hints/generate.js";

// Analysis
export {
  analyzeText,
  computeHints,
  describeScopes,
  scopeAt,
  visibleNames,
  type Analysis,
  type AnalysisResult,
  type AnalyzeOptions,
  type ScopeSummary,
} from "./analysis.js";

// Debug
export {
  configureDebug,
  debug,
  formatDebugMessage,
  isDebugEnabled,
  refreshDebugChannels,
  resetDebugConfig,
  type DebugChannel,
  type DebugConfig,
  type DebugData,
} from "./shared/debug.js";
