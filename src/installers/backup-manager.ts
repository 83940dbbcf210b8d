import * as fs from 'fs';
import * as path from 'path';
import { BackupMetadata, InstallationState, InstallOperation } from './types';

function emptyState(): InstallationState {
  return {
    backups: [],
    installedComponents: [],
    pathEntries: [],
    timestamp: Date.now()
  };
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

function isBackupMetadata(value: unknown): value is BackupMetadata {
  if (typeof value !== 'object' || value === null) {
    return false;
  }
  const record: Record<string, unknown> = { ...value };
  return typeof record.originalPath === 'string'
    && typeof record.backupPath === 'string'
    && typeof record.timestamp === 'number'
    && typeof record.component === 'string'
    && (record.operation === 'install' || record.operation === 'uninstall');
}

function parseState(content: string): InstallationState | null {
  const parsed: unknown = JSON.parse(content);
  if (typeof parsed !== 'object' || parsed === null) {
    return null;
  }
  const record: Record<string, unknown> = { ...parsed };
  const backups = Array.isArray(record.backups) ? record.backups.filter(isBackupMetadata) : [];
  if (!isStringArray(record.installedComponents)) {
    return null;
  }
  return {
    backups,
    installedComponents: record.installedComponents,
    // State files written before Path tracking have no pathEntries
    pathEntries: isStringArray(record.pathEntries) ? record.pathEntries : [],
    timestamp: typeof record.timestamp === 'number' ? record.timestamp : Date.now()
  };
}

export class BackupManager {
  private stateFile: string;
  private backupDir: string;

  constructor(stateDir: string) {
    this.backupDir = path.join(stateDir, 'backups');
    this.stateFile = path.join(stateDir, 'installation-state.json');
  }

  private ensureBackupDir(): void {
    if (!fs.existsSync(this.backupDir)) {
      fs.mkdirSync(this.backupDir, { recursive: true });
    }
  }

  async createBackup(
    filePath: string,
    component: string,
    operation: InstallOperation
  ): Promise<BackupMetadata | null> {
    if (!fs.existsSync(filePath)) {
      return null;
    }

    const timestamp = Date.now();
    const filename = path.basename(filePath);
    const backupFilename = `${filename}.${component}.${operation}.${timestamp}.backup`;
    const backupPath = path.join(this.backupDir, backupFilename);

    try {
      this.ensureBackupDir();
      fs.copyFileSync(filePath, backupPath);

      const metadata: BackupMetadata = {
        originalPath: filePath,
        backupPath,
        timestamp,
        component,
        operation
      };

      await this.saveBackupMetadata(metadata);
      console.log(`✓ Backed up ${filePath} to ${path.basename(backupPath)}`);
      return metadata;
    } catch (error) {
      throw new Error(`Failed to create backup of ${filePath}: ${error}`);
    }
  }

  async restoreBackup(metadata: BackupMetadata): Promise<void> {
    if (!fs.existsSync(metadata.backupPath)) {
      throw new Error(`Backup file not found: ${metadata.backupPath}`);
    }

    try {
      fs.copyFileSync(metadata.backupPath, metadata.originalPath);
      console.log(`✓ Restored ${metadata.originalPath} from backup`);
    } catch (error) {
      throw new Error(`Failed to restore ${metadata.originalPath}: ${error}`);
    }
  }

  async removeBackup(metadata: BackupMetadata): Promise<void> {
    if (fs.existsSync(metadata.backupPath)) {
      fs.unlinkSync(metadata.backupPath);
    }
    await this.removeBackupMetadata(metadata);
  }

  async getInstallationState(): Promise<InstallationState> {
    if (!fs.existsSync(this.stateFile)) {
      return emptyState();
    }

    try {
      const state = parseState(fs.readFileSync(this.stateFile, 'utf-8'));
      if (state) {
        return state;
      }
    } catch (error) {
      // unreadable or not JSON, fall through
    }
    console.warn('Failed to read installation state, starting fresh');
    return emptyState();
  }

  async saveInstallationState(state: InstallationState): Promise<void> {
    try {
      this.ensureBackupDir();
      fs.writeFileSync(this.stateFile, JSON.stringify(state, null, 2));
    } catch (error) {
      throw new Error(`Failed to save installation state: ${error}`);
    }
  }

  async recordPathEntry(entry: string): Promise<void> {
    const state = await this.getInstallationState();
    if (!state.pathEntries.includes(entry)) {
      state.pathEntries.push(entry);
      state.timestamp = Date.now();
      await this.saveInstallationState(state);
    }
  }

  async forgetPathEntry(entry: string): Promise<void> {
    const state = await this.getInstallationState();
    state.pathEntries = state.pathEntries.filter(e => e !== entry);
    state.timestamp = Date.now();
    await this.saveInstallationState(state);
  }

  async hasPathEntry(entry: string): Promise<boolean> {
    const state = await this.getInstallationState();
    return state.pathEntries.includes(entry);
  }

  private async saveBackupMetadata(metadata: BackupMetadata): Promise<void> {
    const state = await this.getInstallationState();
    state.backups.push(metadata);
    state.timestamp = Date.now();
    await this.saveInstallationState(state);
  }

  private async removeBackupMetadata(metadata: BackupMetadata): Promise<void> {
    const state = await this.getInstallationState();
    state.backups = state.backups.filter(b =>
      b.originalPath !== metadata.originalPath ||
      b.timestamp !== metadata.timestamp
    );
    state.timestamp = Date.now();
    await this.saveInstallationState(state);
  }

  async getBackupsForComponent(component: string): Promise<BackupMetadata[]> {
    const state = await this.getInstallationState();
    return state.backups.filter(b => b.component === component);
  }
}
