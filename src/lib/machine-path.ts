import { runCommand } from './command-runner';

/**
 * Access to the machine-wide Path variable
 */
export interface MachinePathStore {
  read(): Promise<string>;
  write(value: string): Promise<void>;
}

const POWERSHELL_ARGS = ['-NoProfile', '-NonInteractive', '-Command'];

// The new value travels through the child's environment so it never needs quoting
const NEW_PATH_VAR = 'GITEX_NEW_MACHINE_PATH';

const ENVIRONMENT_KEY = "'HKLM:\\SYSTEM\\CurrentControlSet\\Control\\Session Manager\\Environment'";

// Raw registry value: %SystemRoot% style entries stay unexpanded
const READ_SCRIPT =
  `(Get-Item -LiteralPath ${ENVIRONMENT_KEY}).GetValue('Path', '', 'DoNotExpandEnvironmentNames')`;

// Written back as REG_EXPAND_SZ; setting and clearing a throwaway machine
// variable broadcasts the change to running shells
const WRITE_SCRIPT = [
  `Set-ItemProperty -LiteralPath ${ENVIRONMENT_KEY} -Name Path -Value $env:${NEW_PATH_VAR} -Type ExpandString`,
  "[Environment]::SetEnvironmentVariable('GITEX_SETUP_BROADCAST', '1', 'Machine')",
  "[Environment]::SetEnvironmentVariable('GITEX_SETUP_BROADCAST', $null, 'Machine')"
].join('; ');

/**
 * Reads and writes the machine scope Path in the registry. Writing needs
 * administrator rights.
 */
export class PowerShellMachinePathStore implements MachinePathStore {
  constructor(private shell: string = 'powershell.exe') {}

  async read(): Promise<string> {
    const result = await runCommand(this.shell, [...POWERSHELL_ARGS, READ_SCRIPT]);
    if (result.code !== 0) {
      throw new Error(`Could not read the machine Path: ${result.stderr.trim()}`);
    }
    return result.stdout.replace(/\r?\n$/, '');
  }

  async write(value: string): Promise<void> {
    const result = await runCommand(this.shell, [...POWERSHELL_ARGS, WRITE_SCRIPT], {
      env: { ...process.env, [NEW_PATH_VAR]: value }
    });
    if (result.code !== 0) {
      throw new Error(`Could not update the machine Path: ${result.stderr.trim()}`);
    }
  }
}
