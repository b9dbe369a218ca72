import type { Context } from "../state/context.js";
import { NodeKind } from "./node.js";
import type {
  Action,
  EvaluationScope,
  OutcomeNodeDescription,
  OutcomeValue,
  TreeNode,
} from "./node.js";

/**
 * OutcomeNode — terminal leaf. Runs its action (if any) once, then returns
 * its fixed value.
 */
export class OutcomeNode<T = OutcomeValue> implements TreeNode<T> {
  readonly kind = NodeKind.OUTCOME;
  readonly name: string;

  constructor(
    readonly value: T,
    private readonly action?: Action,
    name?: string,
  ) {
    this.name = name ?? String(value);
  }

  get hasAction(): boolean {
    return this.action !== undefined;
  }

  evaluate(context: Context, scope?: EvaluationScope): T {
    if (this.action) {
      this.action(context);
    }
    scope?.recordOutcome(this, this.value);
    return this.value;
  }

  describe(): OutcomeNodeDescription {
    return {
      kind: this.kind,
      name: this.name,
      value: this.value,
      hasAction: this.hasAction,
    };
  }
}
