import { afterEach } from 'vitest';
import fs from 'fs';
import os from 'os';
import path from 'path';
import { createContext } from '../installer/index.js';
import type { FetchLike, InstallContext } from '../installer/index.js';
import type { Config } from '../types/index.js';
import { formatCommand } from '../utils/index.js';
import type { CommandResult, CommandRunner, CommandSpec } from '../utils/index.js';

export type Reply = Partial<CommandResult> | ((spec: CommandSpec) => Partial<CommandResult> | undefined);

/**
 * In-process stand-in for the command runner.
 * Replies are matched on the start of the rendered command line; the last match wins.
 */
export class FakeRunner implements CommandRunner {
  calls: CommandSpec[] = [];
  private replies: Array<{ prefix: string; reply: Reply }> = [];

  on(prefix: string, reply: Reply): this {
    this.replies.push({ prefix, reply });
    return this;
  }

  async run(spec: CommandSpec): Promise<CommandResult> {
    this.calls.push(spec);
    const line = formatCommand(spec);
    const match = [...this.replies].reverse().find((r) => line.startsWith(r.prefix));
    const reply = match?.reply;
    const partial = typeof reply === 'function' ? reply(spec) : reply;
    return { exitCode: 0, stdout: '', stderr: '', ...partial };
  }

  lines(): string[] {
    return this.calls.map((spec) => formatCommand(spec));
  }
}

const tempRoots: string[] = [];

export function tempRoot(): string {
  const root = fs.mkdtempSync(path.join(os.tmpdir(), 'recon-bootstrap-'));
  tempRoots.push(root);
  return root;
}

// Every suite using these helpers gets its temp directories removed
afterEach(() => {
  for (const root of tempRoots.splice(0)) {
    fs.rmSync(root, { recursive: true, force: true });
  }
});

/**
 * Write an executable stub and return its path
 */
export function makeExecutable(dir: string, name: string): string {
  fs.mkdirSync(dir, { recursive: true });
  const file = path.join(dir, name);
  fs.writeFileSync(file, '#!/bin/sh\nexit 0\n', { mode: 0o755 });
  return file;
}

export function makeConfig(root: string, overrides: Partial<Config> = {}): Config {
  const toolsDir = path.join(root, 'tools');
  return {
    toolsDir,
    binDir: path.join(toolsDir, 'bin'),
    srcDir: path.join(toolsDir, 'src'),
    home: path.join(root, 'home'),
    platform: 'linux',
    arch: 'x86_64',
    uid: 0,
    dryRun: false,
    force: false,
    strict: false,
    skipWordlists: false,
    logLevel: 'silent',
    ...overrides,
  };
}

export interface TestContext {
  ctx: InstallContext;
  runner: FakeRunner;
  output: string[];
  /** Directory on PATH holding stub binaries */
  sysBin: string;
  root: string;
}

/**
 * Context with a fake runner, a PATH of one stub directory and captured output
 */
export function makeContext(
  options: {
    config?: Partial<Config>;
    binaries?: string[];
    fetch?: FetchLike;
    runner?: FakeRunner;
  } = {}
): TestContext {
  const root = tempRoot();
  const sysBin = path.join(root, 'sysbin');
  fs.mkdirSync(sysBin, { recursive: true });
  for (const name of options.binaries ?? []) {
    makeExecutable(sysBin, name);
  }

  const config = makeConfig(root, options.config);
  fs.mkdirSync(config.home, { recursive: true });

  const runner = options.runner ?? new FakeRunner();
  const output: string[] = [];
  const ctx = createContext(config, {
    env: { PATH: sysBin, HOME: config.home },
    runner,
    fetch: options.fetch ?? (async () => new Response('unexpected fetch', { status: 500 })),
    tmpDir: root,
    print: (line) => output.push(line),
  });

  return { ctx, runner, output, sysBin, root };
}

/**
 * Reply that drops an executable into a directory, like a successful install would
 */
export function installs(dir: string, ...names: string[]): Reply {
  return () => {
    for (const name of names) {
      makeExecutable(dir, name);
    }
    return undefined;
  };
}
