/**
 * DecisionTreeEngine — evaluates a tree from its root, once per context.
 *
 * The engine owns the trace buffer and the guards against malformed trees.
 * Everything else is delegated to the nodes; the root's result is returned
 * unchanged, and errors thrown by predicates or actions propagate as-is.
 * A failed evaluation leaves no entries behind in the trace buffer.
 */

import { Context } from "../state/context.js";
import { isNoResult, visit } from "../tree/node.js";
import type { EvaluationResult, OutcomeValue, TreeNode } from "../tree/node.js";
import { formatResult, safeStringify } from "../format.js";
import { EvaluationEventEmitter } from "./events.js";
import type { EvaluationEvent } from "./events.js";
import { TraversalScope } from "./trace.js";
import type { TraceEntry } from "./trace.js";

// ---------- Types ----------

export interface EngineConfig {
  /** Event listener callback. */
  onEvent?: (event: EvaluationEvent) => void;
  /** Longest root-to-leaf path allowed, counted in nodes. Default 1000. */
  maxDepth?: number;
  /** Whether to record trace entries. Default true. */
  trace?: boolean;
}

export const DEFAULT_MAX_DEPTH = 1000;

// ---------- Engine ----------

export class DecisionTreeEngine<T = OutcomeValue> {
  readonly events: EvaluationEventEmitter;
  private readonly maxDepth: number;
  private readonly traceEnabled: boolean;
  private trace: TraceEntry[] = [];

  constructor(
    private readonly root: TreeNode<T>,
    config: EngineConfig = {},
  ) {
    const maxDepth = config.maxDepth ?? DEFAULT_MAX_DEPTH;
    if (!Number.isInteger(maxDepth) || maxDepth < 1) {
      throw new RangeError(`maxDepth must be a positive integer, got ${maxDepth}`);
    }
    this.maxDepth = maxDepth;
    this.traceEnabled = config.trace ?? true;
    this.events = new EvaluationEventEmitter();
    if (config.onEvent) {
      this.events.on(config.onEvent);
    }
  }

  /**
   * Evaluate the tree against a context.
   *
   * @param context - facts for this call; a plain record is wrapped in a
   *   Context and action writes are copied back into it afterwards
   * @param resetTrace - clear the trace buffer first instead of appending to it
   */
  evaluate(
    context: Context | Record<string, unknown>,
    resetTrace: boolean = false,
  ): EvaluationResult<T> {
    if (resetTrace) {
      this.trace = [];
    }

    const startTime = Date.now();
    const traceMark = this.trace.length;
    const ctx = Context.from(context);
    const scope = new TraversalScope({
      maxDepth: this.maxDepth,
      events: this.events,
      trace: this.traceEnabled ? this.trace : undefined,
    });

    this.events.emitEvaluationStarted(this.root.name);

    let result: EvaluationResult<T>;
    try {
      result = visit(this.root, ctx, scope);
    } catch (error) {
      this.trace.length = traceMark;
      const message = error instanceof Error ? error.message : String(error);
      this.events.emitEvaluationFailed(message, scope.path, Date.now() - startTime);
      throw error;
    } finally {
      if (!(context instanceof Context)) {
        ctx.copyTo(context);
      }
    }

    this.events.emitEvaluationCompleted(
      formatResult(result),
      !isNoResult(result),
      scope.nodesVisited,
      Date.now() - startTime,
    );
    return result;
  }

  /** A copy of the trace buffer; entries are copied too. */
  getTrace(): TraceEntry[] {
    return this.trace.map((entry) => ({ ...entry }));
  }

  /**
   * Pretty-printed JSON description of the whole tree. Throws
   * CycleDetectedError when a node is its own descendant.
   */
  describeTree(): string {
    return safeStringify(this.root.describe(), 2) ?? "";
  }
}
