import { ComponentInstaller, InstallationError } from './types';
import { BackupManager } from './backup-manager';
import { BinaryInstaller } from './binary-installer';
import { MachinePathInstaller } from './path-installer';
import { describeError } from './utils';
import type { SetupConfig } from '../config';
import { MachinePathStore, PowerShellMachinePathStore } from '../lib/machine-path';

export interface GitexInstallerOptions {
  pathStore?: MachinePathStore;
}

export class GitexInstaller {
  private installers: ComponentInstaller[];
  private backupManager: BackupManager;
  private binaryInstaller: BinaryInstaller;

  constructor(private config: SetupConfig, options: GitexInstallerOptions = {}) {
    this.backupManager = new BackupManager(config.stateDir);
    this.binaryInstaller = new BinaryInstaller(config, this.backupManager);
    this.installers = [this.binaryInstaller];

    if (config.updatePath) {
      const store = options.pathStore ?? new PowerShellMachinePathStore();
      this.installers.push(new MachinePathInstaller(config, store, this.backupManager));
    }
  }

  async install(): Promise<void> {
    console.log(`🔧 Installing gitex into ${this.config.installDir}...\n`);

    // Fail before anything is touched
    this.binaryInstaller.assertSourceExists();

    const installedComponents: string[] = [];

    try {
      for (const installer of this.installers) {
        await installer.install();
        installedComponents.push(installer.getName());
      }

      console.log(`\n✅ gitex is available at ${this.config.destinationPath}`);
    } catch (error) {
      console.error('❌ Installation failed:', describeError(error));

      console.log('\n🔄 Attempting to rollback...');
      try {
        await this.rollback(installedComponents);
        console.log('✓ Rollback completed');
      } catch (rollbackError) {
        console.error('❌ Rollback failed:', describeError(rollbackError));
        console.error('Manual cleanup may be required');
      }

      throw error;
    }
  }

  async uninstall(): Promise<void> {
    console.log('🧹 Removing gitex...\n');

    const errors: Error[] = [];

    // Uninstall in reverse order
    for (const installer of [...this.installers].reverse()) {
      try {
        await installer.uninstall();
      } catch (error) {
        errors.push(error instanceof Error ? error : new Error(String(error)));
        console.error(`⚠️  Failed to uninstall ${installer.getName()}: ${describeError(error)}`);
      }
    }

    try {
      // Backups that could not be restored stay recorded
      const state = await this.backupManager.getInstallationState();
      state.installedComponents = [];
      await this.backupManager.saveInstallationState(state);
    } catch (error) {
      errors.push(error instanceof Error ? error : new Error(String(error)));
      console.error(`⚠️  State cleanup failed: ${describeError(error)}`);
    }

    if (errors.length === 0) {
      console.log('✅ gitex removed');
    } else {
      console.log(`⚠️  Removal completed with ${errors.length} error(s)`);
      throw new InstallationError(
        `Uninstall completed with errors: ${errors.map(e => e.message).join('; ')}`,
        'all',
        'uninstall'
      );
    }
  }

  async getStatus(): Promise<{ [key: string]: boolean }> {
    const status: { [key: string]: boolean } = {};

    for (const installer of this.installers) {
      try {
        status[installer.getName()] = await installer.isInstalled();
      } catch (error) {
        status[installer.getName()] = false;
      }
    }

    return status;
  }

  async validate(): Promise<{ [key: string]: boolean }> {
    const validation: { [key: string]: boolean } = {};

    for (const installer of this.installers) {
      try {
        validation[installer.getName()] = await installer.validate();
      } catch (error) {
        validation[installer.getName()] = false;
      }
    }

    return validation;
  }

  private async rollback(installedComponents: string[]): Promise<void> {
    // Rollback in reverse order of installation
    for (const componentName of [...installedComponents].reverse()) {
      const installer = this.installers.find(i => i.getName() === componentName);
      if (installer) {
        try {
          await installer.uninstall();
          console.log(`✓ Rolled back ${componentName}`);
        } catch (rollbackError) {
          console.error(`❌ Failed to rollback ${componentName}: ${describeError(rollbackError)}`);
        }
      }
    }
  }

  async repairInstallation(): Promise<void> {
    console.log('🔧 Checking gitex installation...\n');

    const status = await this.getStatus();
    const validation = await this.validate();

    let hasIssues = false;

    for (const installer of this.installers) {
      const name = installer.getName();

      if (!status[name]) {
        console.log(`⚠️  ${name} is not installed - reinstalling...`);
        await installer.install();
        hasIssues = true;
      } else if (!validation[name]) {
        console.log(`⚠️  ${name} installation is invalid - repairing...`);
        await installer.install();
        hasIssues = true;
      } else {
        console.log(`✓ ${name} is properly installed`);
      }
    }

    if (!hasIssues) {
      console.log('\n✅ gitex installation is healthy - no repairs needed');
    } else {
      console.log('\n✅ gitex installation repaired successfully');
    }
  }
}
