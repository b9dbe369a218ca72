/**
 * Example: evaluating decision trees with Arbor.
 *
 * Builds two sample trees, prints their structure as JSON and evaluates a
 * handful of applicant profiles against each:
 *   1. Loan approval — a chain of binary DecisionNodes
 *   2. Risk assessment — a single MultiBranchNode with a default
 *
 * Usage:
 *   npx tsx examples/run-example.ts
 */

import {
  Context,
  DecisionNode,
  DecisionTreeEngine,
  MultiBranchNode,
  OutcomeNode,
  formatResult,
} from "@arbor/decision-tree";
import type { EvaluationEvent } from "@arbor/decision-tree";

// ---------------------------------------------------------------------------
// Loan approval
// ---------------------------------------------------------------------------

function loanApprovalExample(): void {
  console.log("=== Loan Approval Decision Tree ===\n");

  const approved = new OutcomeNode("APPROVED", (ctx) => {
    console.log(`  -> Loan approved for $${ctx.getNumber("amount")}`);
  });
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
  const amountCheck = new DecisionNode(
    "Loan Amount Check",
    (ctx) => ctx.getNumber("amount") <= 100000,
    incomeCheck,
    manualReview,
  );

  const engine = new DecisionTreeEngine(amountCheck);

  console.log("Tree structure:");
  console.log(engine.describeTree());
  console.log();

  const applicants = [
    { amount: 50000, income: 75000, credit_score: 700 },
    { amount: 50000, income: 40000, credit_score: 700 },
    { amount: 50000, income: 75000, credit_score: 600 },
    { amount: 150000, income: 75000, credit_score: 700 },
  ];

  applicants.forEach((applicant, index) => {
    console.log(`Test Case ${index + 1}:`);
    console.log(
      `  Amount: ${applicant.amount}, Income: ${applicant.income}, Credit: ${applicant.credit_score}`,
    );
    const result = engine.evaluate(applicant, true);
    console.log(`  Result: ${formatResult(result)}`);
    const path = engine
      .getTrace()
      .map((entry) => entry.node)
      .join(" -> ");
    console.log(`  Path: ${path}\n`);
  });
}

// ---------------------------------------------------------------------------
// Risk assessment
// ---------------------------------------------------------------------------

function riskAssessmentExample(): void {
  console.log("=== Risk Assessment (Multi-Branch) ===\n");

  const riskLevel = new MultiBranchNode<string>("Risk Level")
    .addBranch(
      (ctx) => ctx.getNumber("credit_score") >= 750 && ctx.getNumber("debt_ratio", 1.0) < 0.3,
      new OutcomeNode("LOW RISK"),
      "low",
    )
    .addBranch(
      (ctx) => ctx.getNumber("credit_score") >= 650 && ctx.getNumber("debt_ratio", 1.0) < 0.5,
      new OutcomeNode("MEDIUM RISK"),
      "medium",
    )
    .addBranch(
      (ctx) => ctx.getNumber("credit_score") >= 550,
      new OutcomeNode("HIGH RISK"),
      "high",
    )
    .setDefault(new OutcomeNode("CRITICAL RISK"));

  const engine = new DecisionTreeEngine(riskLevel, {
    onEvent: (event: EvaluationEvent) => {
      if (event.type === "BranchSelected") {
        console.log(`  [BRANCH] ${event.name}: ${event.branch}`);
      }
    },
  });

  console.log("Tree structure:");
  console.log(engine.describeTree());
  console.log();

  const profiles = [
    new Context({ credit_score: 780, debt_ratio: 0.25 }),
    new Context({ credit_score: 680, debt_ratio: 0.4 }),
    new Context({ credit_score: 600, debt_ratio: 0.6 }),
    new Context({ credit_score: 500, debt_ratio: 0.8 }),
  ];

  for (const profile of profiles) {
    console.log(
      `Case: Credit=${profile.getNumber("credit_score")}, Debt Ratio=${profile.getNumber("debt_ratio")}`,
    );
    console.log(`  Risk: ${formatResult(engine.evaluate(profile))}\n`);
  }
}

loanApprovalExample();
riskAssessmentExample();
