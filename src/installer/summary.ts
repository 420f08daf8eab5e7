/**
 * End-of-run report
 */

import type { StepResult } from '../types/index.js';
import { resolveBinary } from './detector.js';
import { EXPECTED_TOOLS } from './tools.js';
import { say } from './context.js';
import type {
  FailureItem,
  InstallContext,
  InstallSummary,
  ToolInstallResult,
  ToolReportLine,
} from './types.js';

/**
 * Resolve each expected tool on PATH
 */
export function buildToolReport(
  env: NodeJS.ProcessEnv,
  names: readonly string[] = EXPECTED_TOOLS
): ToolReportLine[] {
  return names.map((name) => ({ name, path: resolveBinary(name, env) }));
}

/**
 * `  - ffuf         -> /path/to/ffuf` or `-> MISSING`
 */
export function formatToolReport(report: ToolReportLine[]): string[] {
  return report.map((line) => `  - ${line.name.padEnd(12)} -> ${line.path ?? 'MISSING'}`);
}

/**
 * Failed steps and failed tools, in run order
 */
export function collectFailures(steps: StepResult[], tools: ToolInstallResult[]): FailureItem[] {
  const failures: FailureItem[] = [];
  for (const step of steps) {
    if (step.status === 'failed') {
      failures.push({
        item: step.label,
        cause: step.cause ?? 'command-failed',
        message: step.message ?? 'failed',
      });
    }
  }
  for (const result of tools) {
    if (result.status !== 'failed') continue;
    for (const attempt of [...(result.earlierFailures ?? []), result]) {
      failures.push({
        item: attempt.tool.name,
        source: attempt.source,
        cause: attempt.cause ?? 'command-failed',
        message: attempt.message,
      });
    }
  }
  return failures;
}

/**
 * Print installation summary
 */
export function printInstallSummary(summary: InstallSummary, ctx: InstallContext): void {
  const rcHint = ctx.config.platform === 'darwin' ? "'source ~/.zshrc'" : "'source ~/.bashrc'";

  say(ctx, `Done. Binaries in: ${ctx.config.binDir}`);
  say(ctx, `You may need to ${rcHint} or open a new shell for PATH changes.`);
  say(ctx, 'Quick sanity check (versions):');
  for (const line of formatToolReport(summary.report)) {
    ctx.print(line);
  }

  if (summary.failures.length > 0) {
    ctx.print(`\nFailed (${summary.failures.length}):`);
    for (const failure of summary.failures) {
      const via = failure.source ? ` (${failure.source})` : '';
      ctx.print(`  - ${failure.item}${via} [${failure.cause}]: ${failure.message}`);
    }
  }

  ctx.print(`\nWordlists: ${summary.wordlistsDir}`);
}

/**
 * Missing tools never change the exit status; --strict turns failures into 2
 */
export function exitCodeFor(summary: InstallSummary, strict: boolean): number {
  return strict && summary.failures.length > 0 ? 2 : 0;
}
