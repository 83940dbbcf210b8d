/**
 * Setup configuration
 *
 * Platform defaults, then GITEX_* environment variables, then command line
 * overrides. Every installer reads its paths from the resolved config and
 * never from process state directly.
 */

import * as os from 'os';
import * as path from 'path';
import {
  BINARY_NAMES,
  DEFAULT_SOURCE_PATH,
  UNIX_INSTALL_DIR,
  WINDOWS_INSTALL_DIR
} from './shared-constants';
import { expandTilde } from './installers/utils';

export type SetupPlatform = 'windows' | 'unix';

/**
 * How an existing machine Path entry is detected.
 * `segment` compares whole entries; `legacy` keeps the old `;folder;` substring test.
 */
export type PathMatchMode = 'segment' | 'legacy';

export interface SetupConfig {
  platform: SetupPlatform;
  /** Source path exactly as given, used in messages */
  sourcePath: string;
  /** Source path resolved against the working directory */
  resolvedSourcePath: string;
  sourceName: string;
  installDir: string;
  binaryName: string;
  destinationPath: string;
  updatePath: boolean;
  pathMatch: PathMatchMode;
  stateDir: string;
}

export interface SetupOverrides {
  source?: string;
  target?: string;
  stateDir?: string;
  updatePath?: boolean;
  legacyPathMatch?: boolean;
  cwd?: string;
}

export function toSetupPlatform(platform: NodeJS.Platform): SetupPlatform {
  return platform === 'win32' ? 'windows' : 'unix';
}

function parsePathMatch(value: string | undefined): PathMatchMode | undefined {
  if (value === undefined || value === '') {
    return undefined;
  }
  if (value === 'segment' || value === 'legacy') {
    return value;
  }
  throw new Error(`Invalid GITEX_PATH_MATCH value "${value}" (expected "segment" or "legacy")`);
}

export function resolveSetupConfig(
  overrides: SetupOverrides = {},
  env: NodeJS.ProcessEnv = process.env,
  nodePlatform: NodeJS.Platform = process.platform
): SetupConfig {
  const platform = toSetupPlatform(nodePlatform);
  const cwd = overrides.cwd ?? process.cwd();

  const sourcePath = overrides.source ?? env.GITEX_SOURCE ?? DEFAULT_SOURCE_PATH;
  const installDir = expandTilde(
    overrides.target
    ?? env.GITEX_INSTALL_DIR
    ?? (platform === 'windows' ? WINDOWS_INSTALL_DIR : UNIX_INSTALL_DIR)
  );
  const binaryName = platform === 'windows' ? BINARY_NAMES.WINDOWS : BINARY_NAMES.UNIX;

  const pathMatch: PathMatchMode = overrides.legacyPathMatch
    ? 'legacy'
    : parsePathMatch(env.GITEX_PATH_MATCH) ?? 'segment';

  return {
    platform,
    sourcePath,
    resolvedSourcePath: path.resolve(cwd, sourcePath),
    sourceName: path.basename(sourcePath),
    installDir,
    binaryName,
    destinationPath: path.join(installDir, binaryName),
    updatePath: platform === 'windows' && overrides.updatePath !== false,
    pathMatch,
    stateDir: expandTilde(overrides.stateDir ?? env.GITEX_STATE_DIR ?? path.join(os.homedir(), '.gitex'))
  };
}
