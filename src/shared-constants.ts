/**
 * Shared constants between the setup program and the gitex command line
 * NEVER duplicate these strings - always import from here
 */

// Where the build drops the prebuilt executable, relative to the invocation directory
export const DEFAULT_SOURCE_PATH = './dist/gitex.exe';

// Fixed install locations
export const WINDOWS_INSTALL_DIR = 'C:\\GitEx\\';
export const UNIX_INSTALL_DIR = '/usr/bin';

export const BINARY_NAMES = {
  WINDOWS: 'gitex.exe',
  UNIX: 'gitex',
} as const;

// Appended to the arguments of an elevated relaunch so it cannot loop
export const ELEVATED_FLAG = '--elevated';

// Section of the global git config holding gitex aliases
export const ALIAS_SECTION = 'aliases';

export const DEFAULT_COMMIT_MESSAGE = 'Default commit';

export const PATH_DELIMITERS = {
  windows: ';',
  unix: ':',
} as const;

// Executable for owner, group and other
export const BINARY_MODE = 0o755;
