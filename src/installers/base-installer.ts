import { ComponentInstaller, InstallationError, InstallOperation } from './types';
import { BackupManager } from './backup-manager';
import { describeError } from './utils';

export abstract class BaseInstaller implements ComponentInstaller {
  protected backupManager: BackupManager;

  constructor(backupManager: BackupManager) {
    this.backupManager = backupManager;
  }

  abstract getName(): string;
  abstract doInstall(): Promise<void>;
  abstract doUninstall(): Promise<void>;
  abstract checkInstalled(): Promise<boolean>;
  abstract validateInstallation(): Promise<boolean>;

  /**
   * Installing over an existing installation refreshes it; nothing is skipped.
   */
  async install(): Promise<void> {
    const name = this.getName();

    try {
      if (await this.isInstalled()) {
        console.log(`📦 Refreshing ${name}...`);
      } else {
        console.log(`📦 Installing ${name}...`);
      }

      await this.doInstall();
      await this.markAsInstalled();

      if (!(await this.validate())) {
        throw new InstallationError(`Installation validation failed for ${name}`, name, 'install');
      }

      console.log(`✓ ${name} installed successfully`);
    } catch (error) {
      throw this.wrapError(error, 'install');
    }
  }

  async uninstall(): Promise<void> {
    const name = this.getName();

    try {
      console.log(`🗑️  Uninstalling ${name}...`);

      if (!(await this.isInstalled())) {
        console.log(`⚠️  ${name} is not installed`);
        // Files replaced by an earlier install still go back
        await this.restoreBackupsForComponent();
        await this.markAsUninstalled();
        return;
      }

      await this.doUninstall();
      await this.markAsUninstalled();

      console.log(`✓ ${name} uninstalled successfully`);
    } catch (error) {
      throw this.wrapError(error, 'uninstall');
    }
  }

  async isInstalled(): Promise<boolean> {
    try {
      const state = await this.backupManager.getInstallationState();
      return state.installedComponents.includes(this.getName()) && await this.checkInstalled();
    } catch (error) {
      return false;
    }
  }

  async validate(): Promise<boolean> {
    try {
      return await this.validateInstallation();
    } catch (error) {
      return false;
    }
  }

  protected async createBackup(filePath: string, operation: InstallOperation) {
    return await this.backupManager.createBackup(filePath, this.getName(), operation);
  }

  // Typed errors from a component (missing source, elevation) pass through untouched
  private wrapError(error: unknown, operation: InstallOperation): InstallationError {
    if (error instanceof InstallationError && error.component === this.getName()) {
      return error;
    }
    const name = this.getName();
    return new InstallationError(
      `Failed to ${operation} ${name}: ${describeError(error)}`,
      name,
      operation,
      error instanceof Error ? error : undefined
    );
  }

  private async markAsInstalled(): Promise<void> {
    const state = await this.backupManager.getInstallationState();
    if (!state.installedComponents.includes(this.getName())) {
      state.installedComponents.push(this.getName());
      state.timestamp = Date.now();
      await this.backupManager.saveInstallationState(state);
    }
  }

  private async markAsUninstalled(): Promise<void> {
    const state = await this.backupManager.getInstallationState();
    if (!state.installedComponents.includes(this.getName())) {
      return;
    }
    state.installedComponents = state.installedComponents.filter(c => c !== this.getName());
    state.timestamp = Date.now();
    await this.backupManager.saveInstallationState(state);
  }

  /**
   * A backup is dropped only once it has been put back; one that fails to
   * restore stays on disk and in state for the next uninstall.
   */
  protected async restoreBackupsForComponent(): Promise<void> {
    const backups = await this.backupManager.getBackupsForComponent(this.getName());

    for (const backup of backups) {
      try {
        await this.backupManager.restoreBackup(backup);
        await this.backupManager.removeBackup(backup);
      } catch (error) {
        console.warn(`Failed to restore backup ${backup.backupPath}, keeping it: ${describeError(error)}`);
      }
    }
  }
}
