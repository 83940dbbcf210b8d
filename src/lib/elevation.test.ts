import {
  buildRunAsScript,
  Invocation,
  isElevated,
  psQuote,
  relaunchArgs,
  relaunchElevated,
  requiresElevation,
  wasRelaunched
} from './elevation';
import { runCommand, runInherited } from './command-runner';
import { ElevationError } from '../installers/types';
import { resolveSetupConfig, SetupConfig } from '../config';
import { createTestConfig } from '../test-setup';

jest.mock('./command-runner', () => ({
  runCommand: jest.fn(),
  runInherited: jest.fn()
}));

const mockRunCommand = jest.mocked(runCommand);
const mockRunInherited = jest.mocked(runInherited);

const windowsInvocation: Invocation = {
  execPath: 'C:\\Program Files\\nodejs\\node.exe',
  execArgv: [],
  args: ['C:\\tools\\gitex\\dist\\cli\\setup.js'],
  cwd: 'C:\\work'
};

const windowsConfig: SetupConfig = {
  platform: 'windows',
  sourcePath: './dist/gitex.exe',
  resolvedSourcePath: 'C:\\work\\dist\\gitex.exe',
  sourceName: 'gitex.exe',
  installDir: 'C:\\GitEx\\',
  binaryName: 'gitex.exe',
  destinationPath: 'C:\\GitEx\\gitex.exe',
  updatePath: true,
  pathMatch: 'segment',
  stateDir: 'C:\\Users\\dev\\.gitex'
};

const unixInvocation: Invocation = {
  execPath: '/usr/bin/node',
  execArgv: ['--enable-source-maps'],
  args: ['/opt/gitex/dist/cli/setup.js'],
  cwd: '/home/dev/gitex'
};

// Everything that came from GITEX_* variables, which sudo would drop
const unixConfig = resolveSetupConfig(
  { cwd: '/home/dev/gitex' },
  {
    GITEX_INSTALL_DIR: '/opt/tools/bin',
    GITEX_SOURCE: 'build/gitex',
    GITEX_STATE_DIR: '/home/dev/.gitex',
    GITEX_PATH_MATCH: 'legacy'
  },
  'linux'
);

describe('elevation', () => {
  describe('psQuote', () => {
    it('should double single quotes', () => {
      expect(psQuote("it's")).toBe("'it''s'");
    });
  });

  describe('relaunchArgs', () => {
    it('should pass the resolved configuration as flags', () => {
      expect(relaunchArgs(unixConfig, unixInvocation)).toEqual([
        '/opt/gitex/dist/cli/setup.js',
        '--source', '/home/dev/gitex/build/gitex',
        '--target', '/opt/tools/bin',
        '--state-dir', '/home/dev/.gitex',
        '--legacy-path-match',
        '--elevated'
      ]);
    });

    it('should keep a subcommand and turn off the Path update when it was off', () => {
      const invocation = { ...windowsInvocation, args: ['setup.js', 'uninstall'] };

      expect(relaunchArgs({ ...windowsConfig, updatePath: false }, invocation)).toEqual([
        'setup.js',
        'uninstall',
        '--source', 'C:\\work\\dist\\gitex.exe',
        '--target', 'C:\\GitEx\\',
        '--state-dir', 'C:\\Users\\dev\\.gitex',
        '--no-path',
        '--elevated'
      ]);
    });
  });

  describe('buildRunAsScript', () => {
    it('should relaunch the same script elevated in the same directory', () => {
      expect(buildRunAsScript(windowsConfig, windowsInvocation)).toBe(
        "Start-Process -FilePath 'C:\\Program Files\\nodejs\\node.exe' " +
        "-ArgumentList @('C:\\tools\\gitex\\dist\\cli\\setup.js'," +
        "'--source','C:\\work\\dist\\gitex.exe','--target','C:\\GitEx\\'," +
        "'--state-dir','C:\\Users\\dev\\.gitex','--elevated') " +
        "-WorkingDirectory 'C:\\work' -Verb RunAs"
      );
    });

    it('should wrap arguments containing spaces in double quotes', () => {
      const script = buildRunAsScript(
        { ...windowsConfig, installDir: 'D:\\Git Ex' },
        { ...windowsInvocation, args: ['C:\\My Tools\\setup.js'] }
      );
      expect(script).toContain(`@('"C:\\My Tools\\setup.js"',`);
      expect(script).toContain(`'--target','"D:\\Git Ex"',`);
    });
  });

  describe('wasRelaunched', () => {
    it('should look for the relaunch flag', () => {
      expect(wasRelaunched(['setup.js', '--elevated'])).toBe(true);
      expect(wasRelaunched(['setup.js'])).toBe(false);
    });
  });

  describe('isElevated', () => {
    it('should ask PowerShell for the Administrators role on Windows', async () => {
      mockRunCommand.mockResolvedValue({ code: 0, stdout: 'True\r\n', stderr: '' });
      expect(await isElevated('windows')).toBe(true);

      mockRunCommand.mockResolvedValue({ code: 0, stdout: 'False\r\n', stderr: '' });
      expect(await isElevated('windows')).toBe(false);
    });

    describe('on Unix', () => {
      const originalGetuid = process.getuid;

      function setUid(uid: number): void {
        Object.defineProperty(process, 'getuid', { value: () => uid, writable: true, configurable: true });
      }

      afterEach(() => {
        Object.defineProperty(process, 'getuid', { value: originalGetuid, writable: true, configurable: true });
      });

      it('should check for uid 0', async () => {
        setUid(0);
        expect(await isElevated('unix')).toBe(true);

        setUid(1000);
        expect(await isElevated('unix')).toBe(false);
      });
    });
  });

  describe('requiresElevation', () => {
    it('should always require it for a Windows Path update', () => {
      expect(requiresElevation(createTestConfig({}, 'win32'))).toBe(true);
    });

    it('should not require it for a writable directory without a Path update', () => {
      expect(requiresElevation(createTestConfig())).toBe(false);
      expect(requiresElevation(createTestConfig({ updatePath: false }, 'win32'))).toBe(false);
    });
  });

  describe('relaunchElevated', () => {
    it('should resolve 0 once the elevated Windows process has started', async () => {
      mockRunCommand.mockResolvedValue({ code: 0, stdout: '', stderr: '' });

      expect(await relaunchElevated(windowsConfig, windowsInvocation)).toBe(0);
      expect(mockRunCommand).toHaveBeenCalledWith(
        'powershell.exe',
        ['-NoProfile', '-NonInteractive', '-Command', buildRunAsScript(windowsConfig, windowsInvocation)],
        { cwd: 'C:\\work' }
      );
    });

    it('should raise an ElevationError when the prompt is declined', async () => {
      mockRunCommand.mockResolvedValue({ code: 1, stdout: '', stderr: '' });

      const relaunch = relaunchElevated(windowsConfig, windowsInvocation);
      await expect(relaunch).rejects.toBeInstanceOf(ElevationError);
      await expect(relaunch).rejects.toThrow('Could not start an elevated setup: request was declined');
    });

    it('should rerun the command under sudo with the resolved configuration', async () => {
      mockRunInherited.mockResolvedValue(3);

      expect(await relaunchElevated(unixConfig, unixInvocation)).toBe(3);
      expect(mockRunInherited).toHaveBeenCalledWith(
        'sudo',
        [
          '/usr/bin/node',
          '--enable-source-maps',
          '/opt/gitex/dist/cli/setup.js',
          '--source', '/home/dev/gitex/build/gitex',
          '--target', '/opt/tools/bin',
          '--state-dir', '/home/dev/.gitex',
          '--legacy-path-match',
          '--elevated'
        ],
        { cwd: '/home/dev/gitex' }
      );
    });

    it('should wrap a sudo that cannot be started', async () => {
      mockRunInherited.mockRejectedValue(new Error('spawn sudo ENOENT'));

      await expect(relaunchElevated(unixConfig, unixInvocation)).rejects.toThrow('Could not run setup with sudo: spawn sudo ENOENT');
    });
  });
});
