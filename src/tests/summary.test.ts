import { describe, it, expect } from 'vitest';
import path from 'path';
import {
  buildToolReport,
  collectFailures,
  exitCodeFor,
  formatToolReport,
  printInstallSummary,
} from '../installer/summary.js';
import { getToolById } from '../installer/tools.js';
import type { InstallSummary, ToolDefinition } from '../installer/types.js';
import { makeContext, makeExecutable, tempRoot } from './helpers.js';

function tool(id: string): ToolDefinition {
  const found = getToolById(id);
  if (!found) throw new Error(`no tool ${id}`);
  return found;
}

function summaryWith(failures: InstallSummary['failures']): InstallSummary {
  return { steps: [], tools: [], report: [], wordlistsDir: '/w', failures };
}

describe('buildToolReport', () => {
  it('resolves the expected tools in report order', () => {
    const dir = tempRoot();
    const ffuf = makeExecutable(dir, 'ffuf');

    const report = buildToolReport({ PATH: dir });

    expect(report.map((line) => line.name)).toEqual([
      'ffuf',
      'subfinder',
      'nuclei',
      'httpx',
      'naabu',
      'waybackurls',
      'assetfinder',
      'anew',
      'amass',
      'shodan',
    ]);
    expect(report[0]).toEqual({ name: 'ffuf', path: ffuf });
    expect(report[1]).toEqual({ name: 'subfinder', path: null });
  });
});

describe('formatToolReport', () => {
  it('pads names and marks missing tools', () => {
    expect(
      formatToolReport([
        { name: 'ffuf', path: '/home/u/tools/bin/ffuf' },
        { name: 'shodan', path: null },
      ])
    ).toEqual(['  - ffuf         -> /home/u/tools/bin/ffuf', '  - shodan       -> MISSING']);
  });
});

describe('collectFailures', () => {
  it('reports every failed source of a tool in the order they ran', () => {
    const amass = tool('amass');
    const failures = collectFailures(
      [],
      [
        {
          tool: amass,
          status: 'failed',
          source: 'snap',
          cause: 'missing-toolchain',
          message: 'snap is not on PATH',
          earlierFailures: [
            { tool: amass, status: 'failed', source: 'go', cause: 'network', message: 'go install failed' },
          ],
        },
      ]
    );

    expect(failures).toEqual([
      { item: 'amass', source: 'go', cause: 'network', message: 'go install failed' },
      { item: 'amass', source: 'snap', cause: 'missing-toolchain', message: 'snap is not on PATH' },
    ]);
  });

  it('lists failed steps before failed tools', () => {
    const failures = collectFailures(
      [
        { id: 'go', label: 'Go toolchain', status: 'ok' },
        { id: 'wordlists', label: 'Wordlists', status: 'failed', cause: 'network', message: 'clone failed' },
      ],
      [
        { tool: tool('ffuf'), status: 'installed', message: 'Installed' },
        { tool: tool('amass'), status: 'failed', cause: 'not-found', message: 'not on PATH' },
      ]
    );

    expect(failures).toEqual([
      { item: 'Wordlists', cause: 'network', message: 'clone failed' },
      { item: 'amass', cause: 'not-found', message: 'not on PATH' },
    ]);
  });
});

describe('exitCodeFor', () => {
  const failed = summaryWith([{ item: 'amass', cause: 'network', message: 'x' }]);

  it('is 0 without --strict even when items failed', () => {
    expect(exitCodeFor(failed, false)).toBe(0);
  });

  it('is 2 with --strict and at least one failure', () => {
    expect(exitCodeFor(failed, true)).toBe(2);
    expect(exitCodeFor(summaryWith([]), true)).toBe(0);
  });
});

describe('printInstallSummary', () => {
  it('prints the report, failures and wordlist location', () => {
    const { ctx, output } = makeContext();
    const summary: InstallSummary = {
      steps: [],
      tools: [],
      report: [{ name: 'anew', path: null }],
      wordlistsDir: path.join(ctx.config.srcDir, 'OneListForAll'),
      failures: [
        { item: 'shodan', source: 'pip', cause: 'permission', message: 'denied' },
        { item: 'Wordlists', cause: 'network', message: 'clone failed' },
      ],
    };

    printInstallSummary(summary, ctx);

    expect(output[0]).toMatch(new RegExp(`\\] Done\\. Binaries in: ${ctx.config.binDir}$`));
    expect(output[1]).toMatch(/You may need to 'source ~\/\.bashrc' or open a new shell/);
    expect(output.slice(3)).toEqual([
      '  - anew         -> MISSING',
      '\nFailed (2):',
      '  - shodan (pip) [permission]: denied',
      '  - Wordlists [network]: clone failed',
      `\nWordlists: ${summary.wordlistsDir}`,
    ]);
  });
});
