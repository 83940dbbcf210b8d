import { runCommand, runInherited } from './command-runner';
import { ALIAS_SECTION } from '../shared-constants';

export interface Alias {
  name: string;
  command: string;
}

export class AliasError extends Error {
  constructor(message: string, public alias: string) {
    super(message);
    this.name = 'AliasError';
  }
}

// git config variable names: a letter, then letters, digits or dashes
const ALIAS_NAME_PATTERN = /^[A-Za-z][A-Za-z0-9-]*$/;

// `git config --unset` exit status when the key does not exist
const GIT_CONFIG_KEY_MISSING = 5;

/**
 * Aliases stored in the global git config under the `aliases` section,
 * so git keeps the rest of ~/.gitconfig intact.
 */
export class AliasStore {
  constructor(private section: string = ALIAS_SECTION) {}

  private key(name: string): string {
    if (!ALIAS_NAME_PATTERN.test(name)) {
      throw new AliasError(`Invalid alias name '${name}': use letters, digits and dashes, starting with a letter`, name);
    }
    return `${this.section}.${name}`;
  }

  private async gitConfig(args: string[]) {
    return runCommand('git', ['config', '--global', ...args]);
  }

  async add(name: string, command: string): Promise<void> {
    const result = await this.gitConfig([this.key(name), command]);
    if (result.code !== 0) {
      throw new AliasError(`Could not save alias '${name}': ${result.stderr.trim()}`, name);
    }
  }

  async get(name: string): Promise<string | undefined> {
    const result = await this.gitConfig(['--get', this.key(name)]);
    return result.code === 0 ? result.stdout.replace(/\r?\n$/, '') : undefined;
  }

  /**
   * Resolves false when the alias did not exist
   */
  async remove(name: string): Promise<boolean> {
    const result = await this.gitConfig(['--unset', this.key(name)]);
    if (result.code === GIT_CONFIG_KEY_MISSING) {
      return false;
    }
    if (result.code !== 0) {
      throw new AliasError(`Could not remove alias '${name}': ${result.stderr.trim()}`, name);
    }
    return true;
  }

  async list(): Promise<Alias[]> {
    const result = await this.gitConfig(['--get-regexp', `^${this.section}\\.`]);
    // exit status 1: no matching keys
    if (result.code !== 0) {
      return [];
    }

    const prefix = `${this.section}.`;
    return result.stdout
      .split('\n')
      .filter(line => line.startsWith(prefix))
      .map(line => {
        const separator = line.indexOf(' ');
        const key = separator === -1 ? line : line.slice(0, separator);
        return {
          name: key.slice(prefix.length),
          command: separator === -1 ? '' : line.slice(separator + 1).replace(/\r$/, '')
        };
      });
  }

  async clear(): Promise<void> {
    const aliases = await this.list();
    if (aliases.length === 0) {
      return;
    }
    const result = await this.gitConfig(['--remove-section', this.section]);
    if (result.code !== 0) {
      throw new AliasError(`Could not clear aliases: ${result.stderr.trim()}`, '*');
    }
  }

  /**
   * Run an alias with extra arguments appended. Resolves with the exit code,
   * or null when no alias has that name.
   */
  async run(name: string, args: string[], cwd?: string): Promise<number | null> {
    const command = await this.get(name);
    if (command === undefined) {
      return null;
    }

    const [executable, ...rest] = command.trim().split(/\s+/);
    if (!executable) {
      throw new AliasError(`Alias '${name}' has an empty command`, name);
    }
    return runInherited(executable, [...rest, ...args], { cwd });
  }
}
