import { BackupManager } from './backup-manager';
import { MachinePathInstaller } from './path-installer';
import { createTestConfig, InMemoryPathStore, TEST_STATE_DIR } from '../test-setup';

describe('MachinePathInstaller', () => {
  const folder = 'C:\\GitEx\\';
  let backupManager: BackupManager;
  let mockConsoleLog: jest.SpyInstance;

  function createInstaller(store: InMemoryPathStore, legacyPathMatch = false): MachinePathInstaller {
    const config = createTestConfig({ target: folder, legacyPathMatch }, 'win32');
    return new MachinePathInstaller(config, store, backupManager);
  }

  beforeEach(() => {
    mockConsoleLog = jest.spyOn(console, 'log').mockImplementation(() => {});
    backupManager = new BackupManager(TEST_STATE_DIR);
  });

  describe('install', () => {
    it('should append exactly one segment when the folder is missing', async () => {
      const store = new InMemoryPathStore('C:\\Windows;C:\\Tools');

      await createInstaller(store).install();

      expect(store.value).toBe('C:\\Windows;C:\\Tools;C:\\GitEx\\');
      expect(store.writes).toHaveLength(1);
      expect(await backupManager.hasPathEntry(folder)).toBe(true);
      expect(mockConsoleLog).toHaveBeenCalledWith('✓ Added C:\\GitEx\\ to the machine Path');
    });

    it('should leave the Path unchanged when the folder is already present', async () => {
      const store = new InMemoryPathStore('C:\\GitEx\\;C:\\Windows');

      await createInstaller(store).install();

      expect(store.value).toBe('C:\\GitEx\\;C:\\Windows');
      expect(store.writes).toEqual([]);
      expect(await backupManager.hasPathEntry(folder)).toBe(false);
    });

    it('should be idempotent across runs', async () => {
      const store = new InMemoryPathStore('C:\\Windows');
      const installer = createInstaller(store);

      await installer.install();
      await installer.install();

      expect(store.value).toBe('C:\\Windows;C:\\GitEx\\');
      expect(store.writes).toHaveLength(1);
    });

    it('should append a duplicate in legacy mode when the folder is the last entry', async () => {
      const store = new InMemoryPathStore('C:\\Windows;C:\\GitEx\\');

      await createInstaller(store, true).install();

      expect(store.value).toBe('C:\\Windows;C:\\GitEx\\;C:\\GitEx\\');
    });

    it('should detect a middle entry in legacy mode', async () => {
      const store = new InMemoryPathStore('C:\\Windows;C:\\GitEx\\;C:\\Tools');

      await createInstaller(store, true).install();

      expect(store.writes).toEqual([]);
    });
  });

  describe('uninstall', () => {
    it('should remove the entry it added', async () => {
      const store = new InMemoryPathStore('C:\\Windows');
      const installer = createInstaller(store);
      await installer.install();

      await installer.uninstall();

      expect(store.value).toBe('C:\\Windows');
      expect(await backupManager.hasPathEntry(folder)).toBe(false);
    });

    it('should keep an entry that was there before setup', async () => {
      const store = new InMemoryPathStore('C:\\GitEx\\;C:\\Windows');
      const installer = createInstaller(store);
      await installer.install();

      await installer.uninstall();

      expect(store.value).toBe('C:\\GitEx\\;C:\\Windows');
      expect(mockConsoleLog).toHaveBeenCalledWith('⚠️  C:\\GitEx\\ was already on the machine Path before setup, leaving it');
    });
  });

  describe('validate', () => {
    it('should fail before install and pass after', async () => {
      const store = new InMemoryPathStore('C:\\Windows');
      const installer = createInstaller(store);

      expect(await installer.validate()).toBe(false);
      await installer.install();
      expect(await installer.validate()).toBe(true);
    });
  });
});
