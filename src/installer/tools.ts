/**
 * Tool definitions for the recon installer
 */

import type { Platform } from '../types/index.js';
import type { InstallerKind, InstallSource, ToolDefinition } from './types.js';

function goTool(id: string, description: string, module: string): ToolDefinition {
  return {
    id,
    name: id,
    description,
    sources: [{ kind: 'go', packages: [module] }],
    binaries: [id],
    linkIntoBin: false,
  };
}

/**
 * All supported tools, in install order
 */
export const SUPPORTED_TOOLS: ToolDefinition[] = [
  goTool('ffuf', 'Fast web fuzzer', 'github.com/ffuf/ffuf/v2@latest'),
  goTool(
    'subfinder',
    'Passive subdomain discovery',
    'github.com/projectdiscovery/subfinder/v2/cmd/subfinder@latest'
  ),
  goTool(
    'nuclei',
    'Template-based vulnerability scanner',
    'github.com/projectdiscovery/nuclei/v3/cmd/nuclei@latest'
  ),
  goTool('httpx', 'HTTP probing toolkit', 'github.com/projectdiscovery/httpx/cmd/httpx@latest'),
  goTool('naabu', 'Port scanner', 'github.com/projectdiscovery/naabu/v2/cmd/naabu@latest'),
  goTool('assetfinder', 'Related domain finder', 'github.com/tomnomnom/assetfinder@latest'),
  goTool('anew', 'Append lines not seen before', 'github.com/tomnomnom/anew@latest'),
  goTool('waybackurls', 'Wayback Machine URL fetcher', 'github.com/tomnomnom/waybackurls@latest'),

  // Amass: Go build everywhere, snap as a Linux fallback
  {
    id: 'amass',
    name: 'amass',
    description: 'In-depth attack surface mapping',
    sources: [
      { kind: 'go', packages: ['github.com/owasp-amass/amass/v4/...@latest'] },
      { kind: 'snap', packages: ['amass'], platforms: ['linux'] },
    ],
    binaries: ['amass'],
    linkIntoBin: false,
  },

  // Shodan CLI (pip --user, linked into bin)
  {
    id: 'shodan',
    name: 'shodan',
    description: 'Shodan command-line client',
    sources: [{ kind: 'pip', packages: ['shodan'] }],
    binaries: ['shodan'],
    linkIntoBin: true,
  },

  // Wappalyzer CLI; the package has shipped under two names
  {
    id: 'wappalyzer',
    name: 'wappalyzer',
    description: 'Technology fingerprinting CLI',
    sources: [{ kind: 'npm', packages: ['wappalyzer', 'wappalyzer-cli'] }],
    binaries: ['wappalyzer', 'wappalyzer-cli'],
    linkIntoBin: true,
  },
];

/**
 * Names listed in the end-of-run sanity check
 */
export const EXPECTED_TOOLS: readonly string[] = [
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
];

/**
 * Get tool by ID
 */
export function getToolById(id: string): ToolDefinition | undefined {
  return SUPPORTED_TOOLS.find((tool) => tool.id === id);
}

/**
 * Get all tool IDs
 */
export function getToolIds(): string[] {
  return SUPPORTED_TOOLS.map((tool) => tool.id);
}

/**
 * Sources of a tool that apply on a platform
 */
export function getSourcesFor(tool: ToolDefinition, platform: Platform): InstallSource[] {
  return tool.sources.filter((source) => !source.platforms || source.platforms.includes(platform));
}

/**
 * Tools installable on a platform
 */
export function getToolsForPlatform(
  platform: Platform,
  tools: ToolDefinition[] = SUPPORTED_TOOLS
): ToolDefinition[] {
  return tools.filter((tool) => getSourcesFor(tool, platform).length > 0);
}

/**
 * Tools with a source of the given kind on a platform
 */
export function getToolsInstalledBy(
  kind: InstallerKind,
  platform: Platform,
  tools: ToolDefinition[] = SUPPORTED_TOOLS
): ToolDefinition[] {
  return tools.filter((tool) =>
    getSourcesFor(tool, platform).some((source) => source.kind === kind)
  );
}
