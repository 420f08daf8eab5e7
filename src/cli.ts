import fs from 'fs';
import { fileURLToPath } from 'url';
import { currentHost, parseArgs, resolveConfig } from './config/index.js';
import type { HostInfo } from './config/index.js';
import {
  createContext,
  exitCodeFor,
  getSourcesFor,
  getToolsForPlatform,
  printInstallSummary,
  runBootstrap,
} from './installer/index.js';
import type { InstallContext } from './installer/index.js';
import type { Platform } from './types/index.js';
import { BootstrapError, logger, messageOf } from './utils/index.js';

export interface CliIo {
  env?: NodeJS.ProcessEnv;
  host?: HostInfo;
  out?: (line: string) => void;
  err?: (line: string) => void;
  /** Replaces parts of the run context (runner, fetch, env) */
  context?: Partial<Omit<InstallContext, 'config'>>;
}

/**
 * Version from package.json (one level above src/ and dist/)
 */
export function readVersion(): string {
  try {
    const pkgPath = fileURLToPath(new URL('../package.json', import.meta.url));
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  } catch (error) {
    logger.debug('Could not read package.json', { error: messageOf(error) });
  }
  return '0.0.0';
}

export const HELP_TEXT = `
recon-bootstrap - install a recon toolkit into $TOOLS_DIR (default ~/tools)

Usage:
  recon-bootstrap [options]

Options:
  --tools-dir <dir>, -t  Install root (overrides TOOLS_DIR)
  --dry-run, -n          Print commands and file changes without running them
  --force, -f            Reinstall tools that are already on PATH
  --skip-wordlists       Do not clone or update OneListForAll
  --strict               Exit with status 2 when any optional step or tool failed
  --verbose, -v          Debug logging on stderr
  --list, -l             List the tools installed on this platform
  --version              Show the version
  --help, -h             Show this help message

Environment:
  TOOLS_DIR                   Install root (binaries in bin/, repositories in src/)
  RECON_BOOTSTRAP_LOG_LEVEL   trace, debug, info, warn (default), error, fatal, silent

Installs:
  ffuf, subfinder, nuclei, httpx, naabu, assetfinder, anew, waybackurls, amass (Go / snap)
  shodan (pip), wappalyzer (npm), OneListForAll wordlists (git)
`;

/**
 * One line per tool: name, sources, description
 */
export function formatToolList(platform: Platform): string[] {
  return getToolsForPlatform(platform).map((tool) => {
    const sources = getSourcesFor(tool, platform)
      .map((source) => `${source.kind}:${source.packages.join('|')}`)
      .join(', ');
    return `  ${tool.name.padEnd(12)} ${tool.description} (${sources})`;
  });
}

/**
 * Run the CLI and return the exit status. Never throws.
 */
export async function runCli(argv: string[], io: CliIo = {}): Promise<number> {
  const out = io.out ?? ((line: string) => console.log(line));
  const err = io.err ?? ((line: string) => console.error(line));

  try {
    const options = parseArgs(argv);

    if (options.help) {
      out(HELP_TEXT);
      return 0;
    }
    if (options.version) {
      out(readVersion());
      return 0;
    }

    const config = resolveConfig(options, io.env ?? process.env, io.host ?? currentHost());
    logger.setLevel(config.logLevel);

    if (options.list) {
      for (const line of formatToolList(config.platform)) {
        out(line);
      }
      return 0;
    }

    const ctx = createContext(config, { print: out, ...io.context });
    const summary = await runBootstrap(ctx);
    printInstallSummary(summary, ctx);
    return exitCodeFor(summary, config.strict);
  } catch (error) {
    logger.error('Bootstrap aborted', {
      error: messageOf(error),
      code: error instanceof BootstrapError ? error.code : undefined,
    });
    err(`ERROR: ${messageOf(error)}`);
    return 1;
  }
}
