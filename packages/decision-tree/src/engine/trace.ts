/**
 * Trace entries and the traversal scope that records them.
 *
 * One TraversalScope lives for exactly one engine evaluation. It keeps the
 * stack of nodes on the current path, which is what the cycle and depth
 * guards check against.
 */

import { CycleDetectedError, MaxDepthExceededError } from "../errors.js";
import type { EvaluationScope, NodeRef } from "../tree/node.js";
import type { EvaluationEventEmitter } from "./events.js";

// ---------- Trace entries ----------

export interface DecisionTraceEntry {
  kind: "decision";
  node: string;
  depth: number;
  predicate: boolean;
  /** Branch taken, or null when that side of the node is empty. */
  branch: "true" | "false" | null;
}

export interface MultiBranchTraceEntry {
  kind: "multi_branch";
  node: string;
  depth: number;
  /** Label of the matched branch, "default", or null when nothing applied. */
  matched: string | null;
}

export interface OutcomeTraceEntry {
  kind: "outcome";
  node: string;
  depth: number;
  value: unknown;
}

export type TraceEntry =
  | DecisionTraceEntry
  | MultiBranchTraceEntry
  | OutcomeTraceEntry;

// ---------- Scope ----------

export interface TraversalScopeOptions {
  maxDepth: number;
  events: EvaluationEventEmitter;
  /** Buffer to append entries to. Tracing is off when omitted. */
  trace?: TraceEntry[];
}

export class TraversalScope implements EvaluationScope {
  private active: NodeRef[] = [];
  private visitCount = 0;

  constructor(private readonly options: TraversalScopeOptions) {}

  /** Names of the nodes currently being evaluated, root first. */
  get path(): string[] {
    return this.active.map((n) => n.name);
  }

  get nodesVisited(): number {
    return this.visitCount;
  }

  private get depth(): number {
    return this.active.length - 1;
  }

  enter(node: NodeRef): void {
    if (this.active.includes(node)) {
      throw new CycleDetectedError(node.name, [...this.path, node.name]);
    }
    if (this.active.length >= this.options.maxDepth) {
      throw new MaxDepthExceededError(this.options.maxDepth, this.path);
    }
    this.active.push(node);
    this.visitCount++;
    this.options.events.emitNodeEntered(node.name, node.kind, this.depth);
  }

  exit(node: NodeRef): void {
    const top = this.active[this.active.length - 1];
    if (top === node) {
      this.active.pop();
    }
  }

  recordDecision(
    node: NodeRef,
    predicateResult: boolean,
    branch: "true" | "false" | null,
  ): void {
    this.options.trace?.push({
      kind: "decision",
      node: node.name,
      depth: this.depth,
      predicate: predicateResult,
      branch,
    });
    if (branch !== null) {
      this.options.events.emitBranchSelected(node.name, branch, this.depth);
    }
  }

  recordMatch(node: NodeRef, label: string | null): void {
    this.options.trace?.push({
      kind: "multi_branch",
      node: node.name,
      depth: this.depth,
      matched: label,
    });
    if (label !== null) {
      this.options.events.emitBranchSelected(node.name, label, this.depth);
    }
  }

  recordOutcome(node: NodeRef, value: unknown): void {
    this.options.trace?.push({
      kind: "outcome",
      node: node.name,
      depth: this.depth,
      value,
    });
    this.options.events.emitOutcomeReached(node.name, value, this.depth);
  }
}
