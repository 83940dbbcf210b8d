export {
  ComponentInstaller,
  BackupMetadata,
  InstallationState,
  InstallOperation,
  InstallationError,
  SourceNotFoundError,
  ElevationError
} from './types';
export { BackupManager } from './backup-manager';
export { BaseInstaller } from './base-installer';
export { BinaryInstaller } from './binary-installer';
export { MachinePathInstaller } from './path-installer';
export { GitexInstaller, GitexInstallerOptions } from './gitex-installer';
export { expandTilde, isDirWritable, filesMatch } from './utils';
export { resolveSetupConfig, SetupConfig, SetupOverrides, PathMatchMode } from '../config';
export { MachinePathStore, PowerShellMachinePathStore } from '../lib/machine-path';
export { runSetup, runUninstall, runStatus, runRepair } from '../setup';
