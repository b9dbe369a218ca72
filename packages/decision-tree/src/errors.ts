/**
 * Traversal errors raised by the engine's guards.
 *
 * Failures thrown by predicates and actions are never wrapped: they reach
 * the caller as the same error object.
 */

export class TreeTraversalError extends Error {
  constructor(
    message: string,
    public readonly path: string[],
  ) {
    super(message);
    this.name = "TreeTraversalError";
  }
}

export class CycleDetectedError extends TreeTraversalError {
  constructor(
    public readonly nodeName: string,
    path: string[],
  ) {
    super(
      `Cycle detected: node "${nodeName}" is already on the evaluation path (${path.join(" -> ")})`,
      path,
    );
    this.name = "CycleDetectedError";
  }
}

export class MaxDepthExceededError extends TreeTraversalError {
  constructor(
    public readonly maxDepth: number,
    path: string[],
  ) {
    super(`Evaluation exceeded the maximum depth of ${maxDepth} nodes`, path);
    this.name = "MaxDepthExceededError";
  }
}
