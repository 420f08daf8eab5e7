/**
 * Upstream endpoints
 */
export const GO_VERSION_URL = 'https://go.dev/VERSION?m=text';
export const GO_DOWNLOAD_BASE_URL = 'https://go.dev/dl';
export const GO_INSTALL_ROOT = '/usr/local';
export const HOMEBREW_INSTALL_SCRIPT_URL =
  'https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh';

/**
 * Where the Homebrew installer puts brew (Apple silicon first)
 */
export const HOMEBREW_BREW_PATHS = ['/opt/homebrew/bin/brew', '/usr/local/bin/brew'];

/**
 * apt packages every later step relies on
 */
export const APT_BASE_PACKAGES = [
  'git',
  'curl',
  'wget',
  'unzip',
  'ca-certificates',
  'build-essential',
  'pkg-config',
  'python3',
  'python3-pip',
  'jq',
  'xz-utils',
  'software-properties-common',
  // naabu links against libpcap
  'libpcap-dev',
];

/**
 * Wordlist repository, tried in order
 */
export const WORDLIST_DIR_NAME = 'OneListForAll';
export const WORDLIST_SOURCES = [
  'https://github.com/six2dez/OneListForAll',
  'https://github.com/danielmiessler/OneListForAll',
];

export const DEFAULT_TOOLS_DIR_NAME = 'tools';
