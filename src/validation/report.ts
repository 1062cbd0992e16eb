import type { ValidationIssue } from "../schema/issue.js";
import type { ConversionResult, ConversionSuccess } from "../schema/result.js";

/** Render the aggregated report, one line per issue */
export function formatIssues(issues: ValidationIssue[]): string {
  return issues
    .map((issue) => {
      const where = issue.nodes.map((n) => n.path).join(", ");
      return `- [${issue.kind}] ${where}: ${issue.detail}`;
    })
    .join("\n");
}

/** Outcome of converting a batch of slides, one entry per slide */
export interface BatchReport {
  succeeded: ConversionSuccess[];
  /** Report lines for every slide: warnings, issues and setup errors */
  lines: string[];
  /** 0 on success, 1 when any slide failed validation, 2 on any setup error */
  exitCode: 0 | 1 | 2;
}

/**
 * Summarize settled conversions. A setup error on one slide never hides
 * another slide's report.
 */
export function reportBatch(
  labels: string[],
  outcomes: PromiseSettledResult<ConversionResult>[]
): BatchReport {
  const succeeded: ConversionSuccess[] = [];
  const lines: string[] = [];
  let failed = false;
  let setupError = false;

  for (const [i, outcome] of outcomes.entries()) {
    const label = labels[i] ?? `slide ${i + 1}`;
    if (outcome.status === "rejected") {
      setupError = true;
      const reason: unknown = outcome.reason;
      lines.push(`${label}: error: ${reason instanceof Error ? reason.message : String(reason)}`);
      continue;
    }
    const result = outcome.value;
    if (result.ok) {
      succeeded.push(result);
      for (const w of result.warnings) {
        lines.push(`${label}: warning [${w.kind}] ${w.node.path}: ${w.detail}`);
      }
    } else {
      failed = true;
      lines.push(`${label}: ${result.issues.length} issue(s)\n${formatIssues(result.issues)}`);
    }
  }

  return { succeeded, lines, exitCode: setupError ? 2 : failed ? 1 : 0 };
}
