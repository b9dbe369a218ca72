import { describe, it, expect, vi } from "vitest";
import { Context } from "../../src/state/context.js";
import { DecisionNode } from "../../src/tree/decision-node.js";
import { OutcomeNode } from "../../src/tree/outcome-node.js";
import { NO_RESULT, isNoResult } from "../../src/tree/node.js";

const isAdult = (ctx: Context) => ctx.getNumber("age") >= 18;

describe("DecisionNode", () => {
  it("evaluates the true branch when the predicate holds", () => {
    const node = new DecisionNode(
      "Age Check",
      isAdult,
      new OutcomeNode("adult"),
      new OutcomeNode("minor"),
    );
    expect(node.evaluate(new Context({ age: 30 }))).toBe("adult");
  });

  it("evaluates the false branch when the predicate fails", () => {
    const node = new DecisionNode(
      "Age Check",
      isAdult,
      new OutcomeNode("adult"),
      new OutcomeNode("minor"),
    );
    expect(node.evaluate(new Context({ age: 12 }))).toBe("minor");
  });

  it("returns NO_RESULT when the true branch is missing", () => {
    const node = new DecisionNode<string>(
      "Age Check",
      isAdult,
      undefined,
      new OutcomeNode("minor"),
    );
    expect(node.evaluate(new Context({ age: 30 }))).toBe(NO_RESULT);
  });

  it("returns NO_RESULT when the false branch is missing", () => {
    const node = new DecisionNode("Age Check", isAdult, new OutcomeNode("adult"));
    const result = node.evaluate(new Context({ age: 12 }));
    expect(isNoResult(result)).toBe(true);
  });

  it("does not fall through to the other branch", () => {
    const falseAction = vi.fn();
    const node = new DecisionNode<string>(
      "Always",
      () => true,
      undefined,
      new OutcomeNode("false side", falseAction),
    );
    expect(node.evaluate(new Context())).toBe(NO_RESULT);
    expect(falseAction).not.toHaveBeenCalled();
  });

  it("keeps falsy outcome values distinct from NO_RESULT", () => {
    const node = new DecisionNode<number>("Zero", () => true, new OutcomeNode(0));
    const result = node.evaluate(new Context());
    expect(result).toBe(0);
    expect(isNoResult(result)).toBe(false);
  });

  it("calls the predicate once per evaluation with the given context", () => {
    const predicate = vi.fn(() => false);
    const node = new DecisionNode("Spy", predicate, undefined, new OutcomeNode("no"));
    const ctx = new Context({ k: "v" });
    node.evaluate(ctx);
    expect(predicate).toHaveBeenCalledTimes(1);
    expect(predicate).toHaveBeenCalledWith(ctx);
  });

  it("propagates predicate errors unchanged", () => {
    const failure = new Error("bad predicate");
    const node = new DecisionNode("Broken", () => {
      throw failure;
    }, new OutcomeNode("x"));
    expect(() => node.evaluate(new Context())).toThrow(failure);
  });

  it("nests decision nodes", () => {
    const inner = new DecisionNode(
      "Member Check",
      (ctx) => ctx.getBoolean("member"),
      new OutcomeNode("member price"),
      new OutcomeNode("adult price"),
    );
    const root = new DecisionNode("Age Check", isAdult, inner, new OutcomeNode("child price"));

    expect(root.evaluate(new Context({ age: 40, member: true }))).toBe("member price");
    expect(root.evaluate(new Context({ age: 40 }))).toBe("adult price");
    expect(root.evaluate(new Context({ age: 8, member: true }))).toBe("child price");
  });

  it("setters replace branches and chain", () => {
    const node = new DecisionNode<string>("Age Check", isAdult);
    expect(node.evaluate(new Context({ age: 30 }))).toBe(NO_RESULT);

    const returned = node
      .setTrueBranch(new OutcomeNode("adult"))
      .setFalseBranch(new OutcomeNode("minor"));
    expect(returned).toBe(node);
    expect(node.evaluate(new Context({ age: 30 }))).toBe("adult");

    node.setTrueBranch(undefined);
    expect(node.trueBranch).toBeUndefined();
    expect(node.evaluate(new Context({ age: 30 }))).toBe(NO_RESULT);
  });

  it("describes its subtree", () => {
    const node = new DecisionNode<string>(
      "Age Check",
      isAdult,
      undefined,
      new OutcomeNode("minor"),
    );
    expect(node.describe()).toEqual({
      kind: "decision",
      name: "Age Check",
      falseBranch: { kind: "outcome", name: "minor", value: "minor", hasAction: false },
    });
  });
});
