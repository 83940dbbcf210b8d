import * as fs from 'fs';
import { BaseInstaller } from './base-installer';
import { BackupManager } from './backup-manager';
import { SourceNotFoundError } from './types';
import { filesMatch, isExecutable } from './utils';
import type { SetupConfig } from '../config';
import { BINARY_MODE } from '../shared-constants';

/**
 * Copies the prebuilt executable into the install directory and marks it executable.
 */
export class BinaryInstaller extends BaseInstaller {
  constructor(private config: SetupConfig, backupManager: BackupManager) {
    super(backupManager);
  }

  getName(): string {
    return 'binary';
  }

  assertSourceExists(): void {
    if (!fs.existsSync(this.config.resolvedSourcePath)) {
      throw new SourceNotFoundError(this.config.sourceName, this.config.sourcePath);
    }
  }

  async doInstall(): Promise<void> {
    this.assertSourceExists();

    const { installDir, destinationPath, resolvedSourcePath } = this.config;

    if (!fs.existsSync(installDir)) {
      fs.mkdirSync(installDir, { recursive: true });
      console.log(`✓ Created ${installDir}`);
    }

    // A file we did not put there is kept so uninstall can put it back
    const ownFile = await this.isInstalled();
    if (!ownFile && fs.existsSync(destinationPath) && !filesMatch(resolvedSourcePath, destinationPath)) {
      await this.createBackup(destinationPath, 'install');
    }

    fs.copyFileSync(resolvedSourcePath, destinationPath);
    fs.chmodSync(destinationPath, BINARY_MODE);
    console.log(`✓ Copied ${this.config.sourceName} to ${destinationPath}`);
  }

  async doUninstall(): Promise<void> {
    const { destinationPath } = this.config;

    if (fs.existsSync(destinationPath)) {
      fs.unlinkSync(destinationPath);
      console.log(`✓ Removed ${destinationPath}`);
    }

    await this.restoreBackupsForComponent();
  }

  async checkInstalled(): Promise<boolean> {
    return fs.existsSync(this.config.destinationPath);
  }

  async validateInstallation(): Promise<boolean> {
    const { resolvedSourcePath, destinationPath, platform } = this.config;

    if (!filesMatch(resolvedSourcePath, destinationPath)) {
      return false;
    }

    // Windows has no permission bits to check
    return platform === 'windows' || isExecutable(destinationPath);
  }
}
