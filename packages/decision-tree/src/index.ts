export const VERSION = "0.1.0";

// State
export { Context } from "./state/context.js";

// Tree
export { NO_RESULT, NodeKind, isNoResult, visit, describeChild } from "./tree/node.js";
export type {
  NoResult,
  EvaluationResult,
  OutcomeValue,
  Predicate,
  Action,
  TreeNode,
  NodeRef,
  EvaluationScope,
  NodeDescription,
  DecisionNodeDescription,
  MultiBranchNodeDescription,
  OutcomeNodeDescription,
} from "./tree/node.js";
export { DecisionNode } from "./tree/decision-node.js";
export {
  MultiBranchNode,
  DEFAULT_BRANCH_LABEL,
} from "./tree/multi-branch-node.js";
export type { Branch } from "./tree/multi-branch-node.js";
export { OutcomeNode } from "./tree/outcome-node.js";

// Errors
export {
  TreeTraversalError,
  CycleDetectedError,
  MaxDepthExceededError,
} from "./errors.js";

// Engine
export { DecisionTreeEngine, DEFAULT_MAX_DEPTH } from "./engine/engine.js";
export type { EngineConfig } from "./engine/engine.js";
export { TraversalScope } from "./engine/trace.js";
export type {
  TraceEntry,
  DecisionTraceEntry,
  MultiBranchTraceEntry,
  OutcomeTraceEntry,
  TraversalScopeOptions,
} from "./engine/trace.js";
export { EvaluationEventEmitter } from "./engine/events.js";
export type {
  EvaluationEvent,
  EventListener,
  EvaluationStartedEvent,
  EvaluationCompletedEvent,
  EvaluationFailedEvent,
  NodeEnteredEvent,
  BranchSelectedEvent,
  OutcomeReachedEvent,
} from "./engine/events.js";

// Formatting
export { formatResult, safeStringify } from "./format.js";
