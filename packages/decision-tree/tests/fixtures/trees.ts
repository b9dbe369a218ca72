/**
 * Sample trees shared by the engine tests.
 */

import { DecisionNode } from "../../src/tree/decision-node.js";
import { MultiBranchNode } from "../../src/tree/multi-branch-node.js";
import { OutcomeNode } from "../../src/tree/outcome-node.js";
import type { Action } from "../../src/tree/node.js";

export function buildLoanTree(onApproved?: Action): DecisionNode<string> {
  const approved = new OutcomeNode("APPROVED", onApproved);
  const deniedIncome = new OutcomeNode("DENIED - Insufficient Income");
  const deniedCredit = new OutcomeNode("DENIED - Low Credit Score");
  const manualReview = new OutcomeNode("MANUAL REVIEW REQUIRED");

  const creditCheck = new DecisionNode(
    "Credit Score Check",
    (ctx) => ctx.getNumber("credit_score") >= 650,
    approved,
    deniedCredit,
  );

  const incomeCheck = new DecisionNode(
    "Income Check",
    (ctx) => ctx.getNumber("income") >= 50000,
    creditCheck,
    deniedIncome,
  );

  return new DecisionNode(
    "Loan Amount Check",
    (ctx) => ctx.getNumber("amount") <= 100000,
    incomeCheck,
    manualReview,
  );
}

export function buildRiskTree(): MultiBranchNode<string> {
  return new MultiBranchNode<string>("Risk Level")
    .addBranch(
      (ctx) =>
        ctx.getNumber("credit_score") >= 750 &&
        ctx.getNumber("debt_ratio", 1.0) < 0.3,
      new OutcomeNode("LOW RISK"),
      "low",
    )
    .addBranch(
      (ctx) =>
        ctx.getNumber("credit_score") >= 650 &&
        ctx.getNumber("debt_ratio", 1.0) < 0.5,
      new OutcomeNode("MEDIUM RISK"),
      "medium",
    )
    .addBranch(
      (ctx) => ctx.getNumber("credit_score") >= 550,
      new OutcomeNode("HIGH RISK"),
      "high",
    )
    .setDefault(new OutcomeNode("CRITICAL RISK"));
}
