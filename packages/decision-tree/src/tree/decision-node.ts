/**
 * DecisionNode — binary branch on a single predicate.
 *
 * A missing branch on the taken side yields NO_RESULT rather than an error.
 */

import type { Context } from "../state/context.js";
import { NO_RESULT, NodeKind, describeChild, visit } from "./node.js";
import type {
  DecisionNodeDescription,
  EvaluationResult,
  EvaluationScope,
  NodeRef,
  OutcomeValue,
  Predicate,
  TreeNode,
} from "./node.js";

export class DecisionNode<T = OutcomeValue> implements TreeNode<T> {
  readonly kind = NodeKind.DECISION;
  private trueNode: TreeNode<T> | undefined;
  private falseNode: TreeNode<T> | undefined;

  constructor(
    readonly name: string,
    private readonly predicate: Predicate,
    trueNode?: TreeNode<T>,
    falseNode?: TreeNode<T>,
  ) {
    this.trueNode = trueNode;
    this.falseNode = falseNode;
  }

  get trueBranch(): TreeNode<T> | undefined {
    return this.trueNode;
  }

  get falseBranch(): TreeNode<T> | undefined {
    return this.falseNode;
  }

  setTrueBranch(node: TreeNode<T> | undefined): this {
    this.trueNode = node;
    return this;
  }

  setFalseBranch(node: TreeNode<T> | undefined): this {
    this.falseNode = node;
    return this;
  }

  evaluate(context: Context, scope?: EvaluationScope): EvaluationResult<T> {
    const result = this.predicate(context);
    const next = result ? this.trueNode : this.falseNode;

    if (!next) {
      scope?.recordDecision(this, result, null);
      return NO_RESULT;
    }

    scope?.recordDecision(this, result, result ? "true" : "false");
    return visit(next, context, scope);
  }

  describe(ancestors: readonly NodeRef[] = []): DecisionNodeDescription {
    const path = [...ancestors, this];
    const description: DecisionNodeDescription = {
      kind: this.kind,
      name: this.name,
    };
    if (this.trueNode) description.trueBranch = describeChild(this.trueNode, path);
    if (this.falseNode) description.falseBranch = describeChild(this.falseNode, path);
    return description;
  }
}
