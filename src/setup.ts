import * as fs from 'fs';
import * as path from 'path';
import { resolveSetupConfig, SetupConfig, SetupOverrides } from './config';
import { GitexInstaller, GitexInstallerOptions } from './installers/gitex-installer';
import { ElevationError, InstallationError } from './installers/types';
import { describeError } from './installers/utils';
import {
  currentInvocation,
  Invocation,
  isElevated,
  relaunchElevated,
  requiresElevation,
  wasRelaunched
} from './lib/elevation';
import { containsPathEntry } from './lib/path-entries';
import { PATH_DELIMITERS, UNIX_INSTALL_DIR } from './shared-constants';

export interface SetupOptions extends SetupOverrides, GitexInstallerOptions {
  // Set by the relaunched process; skips the elevation check's relaunch
  elevated?: boolean;
  env?: NodeJS.ProcessEnv;
  platform?: NodeJS.Platform;
}

function configFrom(options: SetupOptions): SetupConfig {
  return resolveSetupConfig(options, options.env ?? process.env, options.platform ?? process.platform);
}

function reportFailure(error: unknown): number {
  if (error instanceof InstallationError) {
    console.error(error.message);
  } else {
    console.error('❌ Setup failed:', describeError(error));
  }
  return 1;
}

/**
 * Returns null when this process may carry on, a relaunch's exit code when the
 * work was handed to an elevated process, or throws when elevation is impossible.
 */
async function ensureElevated(config: SetupConfig, options: SetupOptions, invocation: Invocation): Promise<number | null> {
  if (!requiresElevation(config) || await isElevated(config.platform)) {
    return null;
  }

  if (options.elevated || wasRelaunched(invocation.args)) {
    throw new ElevationError('Setup was relaunched but is still not running with administrator rights');
  }

  console.log('🔐 Administrator rights required, relaunching elevated...');
  return relaunchElevated(config, invocation);
}

function warnIfNotOnPath(config: SetupConfig, env: NodeJS.ProcessEnv): void {
  if (config.platform === 'windows' || path.resolve(config.installDir) === UNIX_INSTALL_DIR) {
    return;
  }
  const current = env.PATH ?? '';
  if (!containsPathEntry(current, config.installDir, 'segment', config.platform)) {
    console.warn(`\n⚠️  ${config.installDir} is not in your PATH.`);
    console.warn(`Add it to your PATH (separated by "${PATH_DELIMITERS.unix}") to use 'gitex' from anywhere.`);
  }
}

/**
 * Install the prebuilt gitex binary. Resolves with the process exit code.
 */
export async function runSetup(options: SetupOptions = {}, invocation: Invocation = currentInvocation()): Promise<number> {
  try {
    const config = configFrom({ cwd: invocation.cwd, ...options });

    // Checked before any elevation so a missing build never prompts for rights
    if (!fs.existsSync(config.resolvedSourcePath)) {
      console.error(`Error: ${config.sourceName} not found at ${config.sourcePath}.`);
      return 1;
    }

    const relaunchCode = await ensureElevated(config, options, invocation);
    if (relaunchCode !== null) {
      return relaunchCode;
    }

    const installer = new GitexInstaller(config, options);
    await installer.install();
    warnIfNotOnPath(config, options.env ?? process.env);

    console.log('Setup completed.');
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}

/**
 * Remove the binary and the Path entry that setup added.
 */
export async function runUninstall(options: SetupOptions = {}, invocation: Invocation = currentInvocation()): Promise<number> {
  try {
    const config = configFrom({ cwd: invocation.cwd, ...options });

    const relaunchCode = await ensureElevated(config, options, invocation);
    if (relaunchCode !== null) {
      return relaunchCode;
    }

    await new GitexInstaller(config, options).uninstall();
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function runStatus(options: SetupOptions = {}, invocation: Invocation = currentInvocation()): Promise<number> {
  try {
    const config = configFrom({ cwd: invocation.cwd, ...options });
    const installer = new GitexInstaller(config, options);
    const status = await installer.getStatus();
    const validation = await installer.validate();

    for (const [name, installed] of Object.entries(status)) {
      const label = !installed ? 'not installed' : validation[name] ? 'installed' : 'installed (out of date)';
      console.log(`${installed && validation[name] ? '✓' : '⚠️ '} ${name}: ${label}`);
    }

    return Object.values(status).every(Boolean) && Object.values(validation).every(Boolean) ? 0 : 1;
  } catch (error) {
    return reportFailure(error);
  }
}

export async function runRepair(options: SetupOptions = {}, invocation: Invocation = currentInvocation()): Promise<number> {
  try {
    const config = configFrom({ cwd: invocation.cwd, ...options });

    const relaunchCode = await ensureElevated(config, options, invocation);
    if (relaunchCode !== null) {
      return relaunchCode;
    }

    await new GitexInstaller(config, options).repairInstallation();
    return 0;
  } catch (error) {
    return reportFailure(error);
  }
}
