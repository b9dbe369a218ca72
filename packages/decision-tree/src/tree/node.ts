/**
 * TreeNode interface — the contract every node kind implements.
 */

import type { Context } from "../state/context.js";
import { CycleDetectedError } from "../errors.js";

/** Returned when evaluation ends on a missing branch or unmatched multi-branch node. */
export const NO_RESULT: unique symbol = Symbol("NO_RESULT");
export type NoResult = typeof NO_RESULT;

export type EvaluationResult<T> = T | NoResult;

export function isNoResult(value: unknown): value is NoResult {
  return value === NO_RESULT;
}

/** Default outcome value type for trees built without an explicit one. */
export type OutcomeValue = string | number | boolean;

/** Pure boolean test over the context. Must not mutate it. */
export type Predicate = (context: Context) => boolean;

/** Side effect run when an outcome node is reached. Its return value is ignored. */
export type Action = (context: Context) => void;

export const NodeKind = {
  DECISION: "decision",
  MULTI_BRANCH: "multi_branch",
  OUTCOME: "outcome",
} as const;

export type NodeKind = (typeof NodeKind)[keyof typeof NodeKind];

export interface DecisionNodeDescription {
  kind: typeof NodeKind.DECISION;
  name: string;
  trueBranch?: NodeDescription;
  falseBranch?: NodeDescription;
}

export interface MultiBranchNodeDescription {
  kind: typeof NodeKind.MULTI_BRANCH;
  name: string;
  branches: Array<{ label: string; node: NodeDescription }>;
  default?: NodeDescription;
}

export interface OutcomeNodeDescription {
  kind: typeof NodeKind.OUTCOME;
  name: string;
  value: unknown;
  hasAction: boolean;
}

/** Plain, JSON-serializable shape of a subtree. */
export type NodeDescription =
  | DecisionNodeDescription
  | MultiBranchNodeDescription
  | OutcomeNodeDescription;

/** Identity of a node as seen by an evaluation scope. */
export interface NodeRef {
  readonly kind: NodeKind;
  readonly name: string;
}

/**
 * Observer threaded through one evaluation. The engine supplies one to
 * guard against cycles and to record the path taken; nodes evaluated
 * without a scope behave exactly the same.
 */
export interface EvaluationScope {
  /** Called before a node is evaluated. May throw to abort the traversal. */
  enter(node: NodeRef): void;
  /** Called after a node's evaluation returns. */
  exit(node: NodeRef): void;
  recordDecision(node: NodeRef, predicateResult: boolean, branch: "true" | "false" | null): void;
  recordMatch(node: NodeRef, label: string | null): void;
  recordOutcome(node: NodeRef, value: unknown): void;
}

/**
 * Every node kind implements this interface. Children are evaluated
 * through {@link visit} so the scope sees every step.
 */
export interface TreeNode<T = OutcomeValue> extends NodeRef {
  evaluate(context: Context, scope?: EvaluationScope): EvaluationResult<T>;
  /**
   * @param ancestors - nodes already being described above this one, root first
   */
  describe(ancestors?: readonly NodeRef[]): NodeDescription;
}

/**
 * Describe a child node, throwing CycleDetectedError when it is one of its
 * own ancestors.
 */
export function describeChild<T>(
  child: TreeNode<T>,
  ancestors: readonly NodeRef[],
): NodeDescription {
  if (ancestors.includes(child)) {
    throw new CycleDetectedError(child.name, [
      ...ancestors.map((n) => n.name),
      child.name,
    ]);
  }
  return child.describe(ancestors);
}

/**
 * Evaluate a node inside a scope's enter/exit bracket.
 *
 * `exit` is skipped when evaluation throws, so a failed scope still holds
 * the path that was active at the point of failure.
 */
export function visit<T>(
  node: TreeNode<T>,
  context: Context,
  scope: EvaluationScope | undefined,
): EvaluationResult<T> {
  if (!scope) {
    return node.evaluate(context);
  }
  scope.enter(node);
  const result = node.evaluate(context, scope);
  scope.exit(node);
  return result;
}
