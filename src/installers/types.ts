export type InstallOperation = 'install' | 'uninstall';

export interface ComponentInstaller {
  install(): Promise<void>;
  uninstall(): Promise<void>;
  isInstalled(): Promise<boolean>;
  validate(): Promise<boolean>;
  getName(): string;
}

export interface BackupMetadata {
  originalPath: string;
  backupPath: string;
  timestamp: number;
  component: string;
  operation: InstallOperation;
}

export interface InstallationState {
  backups: BackupMetadata[];
  installedComponents: string[];
  // Machine Path entries this tool appended; only these are removed on uninstall
  pathEntries: string[];
  timestamp: number;
}

export class InstallationError extends Error {
  constructor(
    message: string,
    public component: string,
    public operation: InstallOperation,
    public cause?: Error
  ) {
    super(message);
    this.name = 'InstallationError';
  }
}

export class SourceNotFoundError extends InstallationError {
  constructor(public sourceName: string, public sourcePath: string) {
    super(`Error: ${sourceName} not found at ${sourcePath}.`, 'binary', 'install');
    this.name = 'SourceNotFoundError';
  }
}

export class ElevationError extends InstallationError {
  constructor(message: string, cause?: Error) {
    super(message, 'elevation', 'install', cause);
    this.name = 'ElevationError';
  }
}
