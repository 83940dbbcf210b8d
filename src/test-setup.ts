import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { resolveSetupConfig, SetupConfig, SetupOverrides } from './config';
import type { MachinePathStore } from './lib/machine-path';

// One directory per Jest worker so parallel test files never share state
export const TEST_TEMP_DIR = path.join(os.tmpdir(), `gitex-tests-${process.env.JEST_WORKER_ID ?? '0'}`);
export const TEST_WORK_DIR = path.join(TEST_TEMP_DIR, 'work');
export const TEST_INSTALL_DIR = path.join(TEST_TEMP_DIR, 'install');
export const TEST_STATE_DIR = path.join(TEST_TEMP_DIR, 'state');

export const MOCK_BINARY_CONTENT = 'gitex test binary v1';

function removeTempDir(): void {
  // Clean up any existing test data with retry
  let retries = 3;
  while (retries > 0 && fs.existsSync(TEST_TEMP_DIR)) {
    try {
      fs.rmSync(TEST_TEMP_DIR, { recursive: true, force: true });
      break;
    } catch (error) {
      retries--;
      if (retries === 0) {
        console.warn('Failed to clean up test directory, continuing...');
      }
    }
  }
}

beforeEach(() => {
  jest.clearAllMocks();
  jest.restoreAllMocks();

  removeTempDir();
  fs.mkdirSync(TEST_WORK_DIR, { recursive: true });
});

afterAll(() => {
  removeTempDir();
});

/**
 * Write a fake prebuilt executable at dist/gitex.exe under the work directory
 */
export function createMockBinary(content: string = MOCK_BINARY_CONTENT): string {
  const binaryPath = path.join(TEST_WORK_DIR, 'dist', 'gitex.exe');
  fs.mkdirSync(path.dirname(binaryPath), { recursive: true });
  fs.writeFileSync(binaryPath, content);
  return binaryPath;
}

/**
 * A config that installs from the work directory into temp directories
 */
export function createTestConfig(
  overrides: SetupOverrides = {},
  platform: NodeJS.Platform = 'linux'
): SetupConfig {
  return resolveSetupConfig(
    { cwd: TEST_WORK_DIR, target: TEST_INSTALL_DIR, stateDir: TEST_STATE_DIR, ...overrides },
    {},
    platform
  );
}

/**
 * Machine Path held in memory, with a record of every write
 */
export class InMemoryPathStore implements MachinePathStore {
  writes: string[] = [];

  constructor(public value: string = '') {}

  async read(): Promise<string> {
    return this.value;
  }

  async write(value: string): Promise<void> {
    this.writes.push(value);
    this.value = value;
  }
}
