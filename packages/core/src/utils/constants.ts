// packages/core/src/utils/constants.ts: Shared defaults

/** Stepfile looked up in the project directory */
export const DEFAULT_STEPFILE = 'stepyard.yml';

/** Project configuration file */
export const CONFIG_FILENAME = '.stepyard.yml';

/** Cache root, relative to the project directory */
export const DEFAULT_CACHE_DIR = '.stepyard';

/** Written into each environment directory once it is complete */
export const FINGERPRINT_FILENAME = '.stepyard-fingerprint';

/** Time given to processes between SIGTERM and SIGKILL */
export const DEFAULT_KILL_GRACE_MS = 5000;

/** Environment variable holding extra command line arguments */
export const ADDOPTS_ENV = 'STEPYARD_ADDOPTS';

/** Host variables always forwarded to step commands */
export const BASE_ENV_ALLOWLIST = [
  'PATH',
  'HOME',
  'LANG',
  'LANGUAGE',
  'TMPDIR',
  'TEMP',
  'TMP',
  'USERPROFILE',
  'SystemRoot',
  'COMSPEC',
  'SHELL',
  'http_proxy',
  'https_proxy',
  'no_proxy',
  'NODE_EXTRA_CA_CERTS',
  'SSL_CERT_FILE',
];

/** Default environment installer */
export const DEFAULT_INSTALL_COMMAND = ['npm', 'install', '--no-audit', '--no-fund', '--no-save'];
