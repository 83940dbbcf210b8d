import type { SetupConfig, SetupPlatform } from '../config';
import { ElevationError } from '../installers/types';
import { isDirWritable } from '../installers/utils';
import { ELEVATED_FLAG } from '../shared-constants';
import { runCommand, runInherited } from './command-runner';

/**
 * How this process was started, so it can be started again elevated
 */
export interface Invocation {
  execPath: string;
  execArgv: string[];
  // process.argv without the node executable
  args: string[];
  cwd: string;
}

export function currentInvocation(): Invocation {
  return {
    execPath: process.execPath,
    execArgv: process.execArgv,
    args: process.argv.slice(1),
    cwd: process.cwd()
  };
}

const IS_ADMIN_SCRIPT =
  '([Security.Principal.WindowsPrincipal][Security.Principal.WindowsIdentity]::GetCurrent())' +
  '.IsInRole([Security.Principal.WindowsBuiltInRole]::Administrator)';

export async function isElevated(platform: SetupPlatform): Promise<boolean> {
  if (platform === 'windows') {
    const result = await runCommand('powershell.exe', ['-NoProfile', '-NonInteractive', '-Command', IS_ADMIN_SCRIPT]);
    return result.code === 0 && result.stdout.trim() === 'True';
  }
  return typeof process.getuid === 'function' && process.getuid() === 0;
}

/**
 * Machine Path changes always need administrator rights; a plain copy only
 * when the install directory is not writable.
 */
export function requiresElevation(config: SetupConfig): boolean {
  if (config.platform === 'windows' && config.updatePath) {
    return true;
  }
  return !isDirWritable(config.installDir);
}

export function wasRelaunched(args: string[]): boolean {
  return args.includes(ELEVATED_FLAG);
}

// PowerShell single-quoted literal
export function psQuote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

// Start-Process joins ArgumentList with spaces, so arguments containing spaces need their own quotes
function windowsArgument(value: string): string {
  return /[\s"]/.test(value) ? `"${value.replace(/"/g, '\\"')}"` : value;
}

/**
 * Arguments for the elevated run. sudo and RunAs both start the child with a
 * fresh environment, so everything resolved from GITEX_* variables is passed
 * as flags; the later flag wins over one the user typed.
 */
export function relaunchArgs(config: SetupConfig, invocation: Invocation): string[] {
  const args = [
    ...invocation.args,
    '--source', config.resolvedSourcePath,
    '--target', config.installDir,
    '--state-dir', config.stateDir
  ];
  if (config.pathMatch === 'legacy') {
    args.push('--legacy-path-match');
  }
  if (config.platform === 'windows' && !config.updatePath) {
    args.push('--no-path');
  }
  args.push(ELEVATED_FLAG);
  return args;
}

export function buildRunAsScript(config: SetupConfig, invocation: Invocation): string {
  const args = [...invocation.execArgv, ...relaunchArgs(config, invocation)]
    .map(arg => psQuote(windowsArgument(arg)))
    .join(',');
  return [
    'Start-Process',
    `-FilePath ${psQuote(invocation.execPath)}`,
    `-ArgumentList @(${args})`,
    `-WorkingDirectory ${psQuote(invocation.cwd)}`,
    '-Verb RunAs'
  ].join(' ');
}

/**
 * Start the same command again with elevated rights.
 *
 * Windows hands the work to a new elevated process and resolves 0 once it has
 * launched. Unix runs the command under sudo and resolves with its exit code.
 */
export async function relaunchElevated(config: SetupConfig, invocation: Invocation): Promise<number> {
  if (config.platform === 'windows') {
    const result = await runCommand(
      'powershell.exe',
      ['-NoProfile', '-NonInteractive', '-Command', buildRunAsScript(config, invocation)],
      { cwd: invocation.cwd }
    );
    if (result.code !== 0) {
      throw new ElevationError(`Could not start an elevated setup: ${result.stderr.trim() || 'request was declined'}`);
    }
    return 0;
  }

  try {
    return await runInherited(
      'sudo',
      [invocation.execPath, ...invocation.execArgv, ...relaunchArgs(config, invocation)],
      { cwd: invocation.cwd }
    );
  } catch (error) {
    throw new ElevationError(
      `Could not run setup with sudo: ${error instanceof Error ? error.message : String(error)}`,
      error instanceof Error ? error : undefined
    );
  }
}
