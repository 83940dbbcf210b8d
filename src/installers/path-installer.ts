import { BaseInstaller } from './base-installer';
import { BackupManager } from './backup-manager';
import type { SetupConfig } from '../config';
import type { MachinePathStore } from '../lib/machine-path';
import { appendPathEntry, containsPathEntry, removePathEntry } from '../lib/path-entries';
import { PATH_DELIMITERS } from '../shared-constants';

/**
 * Appends the install directory to the machine-wide Path, at most once.
 */
export class MachinePathInstaller extends BaseInstaller {
  constructor(
    private config: SetupConfig,
    private store: MachinePathStore,
    backupManager: BackupManager
  ) {
    super(backupManager);
  }

  getName(): string {
    return 'machine-path';
  }

  async doInstall(): Promise<void> {
    const folder = this.config.installDir;
    const current = await this.store.read();

    if (containsPathEntry(current, folder, this.config.pathMatch, this.config.platform)) {
      console.log(`✓ ${folder} is already on the machine Path`);
      return;
    }

    await this.store.write(appendPathEntry(current, folder, PATH_DELIMITERS[this.config.platform]));
    await this.backupManager.recordPathEntry(folder);
    console.log(`✓ Added ${folder} to the machine Path`);
  }

  async doUninstall(): Promise<void> {
    const folder = this.config.installDir;

    if (!(await this.backupManager.hasPathEntry(folder))) {
      console.log(`⚠️  ${folder} was already on the machine Path before setup, leaving it`);
      return;
    }

    const current = await this.store.read();
    const next = removePathEntry(current, folder, this.config.platform);
    if (next !== current) {
      await this.store.write(next);
      console.log(`✓ Removed ${folder} from the machine Path`);
    }
    await this.backupManager.forgetPathEntry(folder);
  }

  async checkInstalled(): Promise<boolean> {
    const current = await this.store.read();
    return containsPathEntry(current, this.config.installDir, 'segment', this.config.platform);
  }

  async validateInstallation(): Promise<boolean> {
    return this.checkInstalled();
  }
}
