/**
 * Evaluation observability events.
 *
 * The engine emits typed events while it walks a tree, for logging and
 * debugging integrations.
 */

import type { NodeKind } from "../tree/node.js";

// ---------- Event Types ----------

export interface EvaluationStartedEvent {
  type: "EvaluationStarted";
  root: string;
  timestamp: string;
}

export interface EvaluationCompletedEvent {
  type: "EvaluationCompleted";
  result: string;
  matched: boolean;
  nodesVisited: number;
  duration: number;
  timestamp: string;
}

export interface EvaluationFailedEvent {
  type: "EvaluationFailed";
  error: string;
  path: string[];
  duration: number;
  timestamp: string;
}

export interface NodeEnteredEvent {
  type: "NodeEntered";
  name: string;
  kind: NodeKind;
  depth: number;
  timestamp: string;
}

export interface BranchSelectedEvent {
  type: "BranchSelected";
  name: string;
  branch: string;
  depth: number;
  timestamp: string;
}

export interface OutcomeReachedEvent {
  type: "OutcomeReached";
  name: string;
  value: unknown;
  depth: number;
  timestamp: string;
}

export type EvaluationEvent =
  | EvaluationStartedEvent
  | EvaluationCompletedEvent
  | EvaluationFailedEvent
  | NodeEnteredEvent
  | BranchSelectedEvent
  | OutcomeReachedEvent;

// ---------- Event Emitter ----------

export type EventListener = (event: EvaluationEvent) => void;

export class EvaluationEventEmitter {
  private listeners: EventListener[] = [];

  /** Register an event listener. */
  on(listener: EventListener): void {
    this.listeners.push(listener);
  }

  /** Remove an event listener. */
  off(listener: EventListener): void {
    this.listeners = this.listeners.filter((l) => l !== listener);
  }

  /** Emit an event to all listeners. */
  emit(event: EvaluationEvent): void {
    for (const listener of this.listeners) {
      listener(event);
    }
  }

  /** Remove all listeners. */
  clear(): void {
    this.listeners = [];
  }

  get listenerCount(): number {
    return this.listeners.length;
  }

  emitEvaluationStarted(root: string): void {
    this.emit({
      type: "EvaluationStarted",
      root,
      timestamp: new Date().toISOString(),
    });
  }

  emitEvaluationCompleted(
    result: string,
    matched: boolean,
    nodesVisited: number,
    duration: number,
  ): void {
    this.emit({
      type: "EvaluationCompleted",
      result,
      matched,
      nodesVisited,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitEvaluationFailed(error: string, path: string[], duration: number): void {
    this.emit({
      type: "EvaluationFailed",
      error,
      path,
      duration,
      timestamp: new Date().toISOString(),
    });
  }

  emitNodeEntered(name: string, kind: NodeKind, depth: number): void {
    this.emit({
      type: "NodeEntered",
      name,
      kind,
      depth,
      timestamp: new Date().toISOString(),
    });
  }

  emitBranchSelected(name: string, branch: string, depth: number): void {
    this.emit({
      type: "BranchSelected",
      name,
      branch,
      depth,
      timestamp: new Date().toISOString(),
    });
  }

  emitOutcomeReached(name: string, value: unknown, depth: number): void {
    this.emit({
      type: "OutcomeReached",
      name,
      value,
      depth,
      timestamp: new Date().toISOString(),
    });
  }
}
