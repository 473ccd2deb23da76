#!/usr/bin/env node
/**
 * @treerecon/demo: Interactive CLI walkthrough.
 *
 * Reconciles two versions of a small invoice mapping sheet in your terminal:
 * load -> rebuild paths -> match -> classify -> diagnostics -> summary
 *
 * Uses the reconciler package directly (no HTTP server).
 */

import chalk from "chalk";
import { SOURCE_SHEETS, TEST_SHEETS } from "./sample.js";
import { runWalkthrough } from "./walkthrough.js";

const DELAY_MS = 600;

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function banner(): void {
  console.log();
  console.log(chalk.cyan.bold("  ╔══════════════════════════════════════════════════════════╗"));
  console.log(chalk.cyan.bold("  ║") + chalk.white.bold("                    TREERECON DEMO                        ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ║") + chalk.gray("        Reconciling sheets that have no row ids           ") + chalk.cyan.bold("║"));
  console.log(chalk.cyan.bold("  ╚══════════════════════════════════════════════════════════╝"));
  console.log();
}

function stepHeader(step: number, total: number, title: string): void {
  const prefix = chalk.cyan.bold(`  Step ${step}/${total}`);
  const line = chalk.gray("─".repeat(Math.max(0, 50 - title.length)));
  console.log(`\n${prefix}  ${chalk.white.bold(title)}  ${line}`);
}

async function run(): Promise<void> {
  banner();
  console.log(chalk.gray("  Two versions of an invoice mapping sheet, no identifiers."));
  console.log(chalk.gray("  Rows are paired by where they sit in the tree.\n"));

  const { steps } = runWalkthrough(chalk, SOURCE_SHEETS, TEST_SHEETS);

  for (const [i, step] of steps.entries()) {
    await sleep(DELAY_MS);
    stepHeader(i + 1, steps.length, step.title);
    for (const line of step.lines) {
      console.log(line);
    }
  }
  console.log();
}

run().catch((err: unknown) => {
  console.error(chalk.red("\n  Demo failed:"), err);
  process.exit(1);
});
