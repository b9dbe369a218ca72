/**
 * MultiBranchNode — ordered first-match dispatch with an optional default.
 *
 * Branches are tried in insertion order and evaluation stops at the first
 * predicate that returns true; later predicates are never called. With no
 * match, the default node is evaluated, or NO_RESULT is returned when there
 * is none.
 */

import type { Context } from "../state/context.js";
import { NO_RESULT, NodeKind, describeChild, visit } from "./node.js";
import type {
  EvaluationResult,
  EvaluationScope,
  MultiBranchNodeDescription,
  NodeRef,
  OutcomeValue,
  Predicate,
  TreeNode,
} from "./node.js";

/** Label reported in traces when the default node is taken. */
export const DEFAULT_BRANCH_LABEL = "default";

export interface Branch<T> {
  label: string;
  predicate: Predicate;
  node: TreeNode<T>;
}

export class MultiBranchNode<T = OutcomeValue> implements TreeNode<T> {
  readonly kind = NodeKind.MULTI_BRANCH;
  private branchList: Branch<T>[] = [];
  private defaultNode: TreeNode<T> | undefined;

  constructor(readonly name: string) {}

  /**
   * Append a branch. The label defaults to `branch_<index>`.
   */
  addBranch(predicate: Predicate, node: TreeNode<T>, label?: string): this {
    this.branchList.push({
      label: label ?? `branch_${this.branchList.length}`,
      predicate,
      node,
    });
    return this;
  }

  /** Set or replace the fallback node. Passing undefined removes it. */
  setDefault(node: TreeNode<T> | undefined): this {
    this.defaultNode = node;
    return this;
  }

  get branches(): ReadonlyArray<Readonly<Branch<T>>> {
    return [...this.branchList];
  }

  get defaultBranch(): TreeNode<T> | undefined {
    return this.defaultNode;
  }

  evaluate(context: Context, scope?: EvaluationScope): EvaluationResult<T> {
    for (const branch of this.branchList) {
      if (branch.predicate(context)) {
        scope?.recordMatch(this, branch.label);
        return visit(branch.node, context, scope);
      }
    }

    if (this.defaultNode) {
      scope?.recordMatch(this, DEFAULT_BRANCH_LABEL);
      return visit(this.defaultNode, context, scope);
    }

    scope?.recordMatch(this, null);
    return NO_RESULT;
  }

  describe(ancestors: readonly NodeRef[] = []): MultiBranchNodeDescription {
    const path = [...ancestors, this];
    const description: MultiBranchNodeDescription = {
      kind: this.kind,
      name: this.name,
      branches: this.branchList.map((b) => ({
        label: b.label,
        node: describeChild(b.node, path),
      })),
    };
    if (this.defaultNode) description.default = describeChild(this.defaultNode, path);
    return description;
  }
}
