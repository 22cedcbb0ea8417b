/**
 * @lanekeeper/runtime — Terminal rendering of reports.
 */

import chalk from "chalk";
import type { DoctorResult, ValidationReport } from "@lanekeeper/verify";
import { describeAmbiguity, describeViolation } from "@lanekeeper/verify";

export function formatValidationReport(report: ValidationReport): string {
  const lines: string[] = [];
  const head = `${report.feature}: ${report.eventCount} event(s)`;

  if (report.passed) {
    lines.push(`${chalk.green("✓")} ${chalk.white(head)}`);
  } else {
    lines.push(`${chalk.red("✗")} ${chalk.white.bold(head)}`);
  }

  for (const err of report.schemaErrors) {
    lines.push(`  ${chalk.red("schema")}     line ${err.line}: ${err.message}`);
  }
  for (const v of report.violations) {
    lines.push(`  ${chalk.red("violation")}  ${describeViolation(v)}`);
  }
  for (const a of report.ambiguities) {
    lines.push(`  ${chalk.yellow("ambiguous")}  ${describeAmbiguity(a)}`);
  }
  for (const s of report.superseded) {
    lines.push(chalk.gray(`  superseded ${s.eventId} ${s.wp} by ${s.supersededBy}`));
  }

  return lines.join("\n");
}

export function formatDoctorResult(result: DoctorResult): string {
  if (result.healthy) {
    return `${chalk.green("✓")} ${result.feature}: healthy`;
  }

  const lines = [`${chalk.yellow("!")} ${result.feature}: ${result.findings.length} finding(s)`];
  for (const f of result.findings) {
    const tag = f.severity === "error" ? chalk.red(f.severity) : chalk.yellow(f.severity);
    lines.push(`  ${tag} [${f.category}] ${f.message}`);
    lines.push(chalk.gray(`    → ${f.recommendedAction}`));
  }
  return lines.join("\n");
}
