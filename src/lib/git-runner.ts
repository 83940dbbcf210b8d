import * as fs from 'fs';
import * as path from 'path';
import { CommandResult, formatCommand, runCommand } from './command-runner';

/**
 * Run git in a directory and report the outcome on the console
 */
export async function runGit(args: string[], cwd: string): Promise<CommandResult> {
  const display = formatCommand('git', args);
  const result = await runCommand('git', args, { cwd });

  if (result.code === 0) {
    console.log(`'${display}' executed successfully\n${result.stdout}`);
  } else {
    console.error(`Error running '${display}': ${result.stderr}`);
  }
  return result;
}

/**
 * The .git directory directly inside a path, if there is one
 */
export function findGitFolder(dirPath: string): string | null {
  if (!fs.existsSync(dirPath) || !fs.statSync(dirPath).isDirectory()) {
    return null;
  }

  const gitPath = path.join(dirPath, '.git');
  return fs.existsSync(gitPath) && fs.statSync(gitPath).isDirectory() ? gitPath : null;
}

export interface GitProject {
  path: string;
  gitPath: string;
  root: string;
}

export function resolveGitProject(target: string): GitProject | null {
  const absolutePath = path.resolve(target);
  const gitPath = findGitFolder(absolutePath);
  if (!gitPath) {
    return null;
  }
  return { path: absolutePath, gitPath, root: path.dirname(gitPath) };
}

/**
 * `git log --oneline`, newest first. Empty when the log cannot be read.
 */
export async function getCommitList(cwd: string): Promise<string[]> {
  const result = await runCommand('git', ['log', '--oneline'], { cwd });
  if (result.code !== 0) {
    console.error(`Error retrieving commit list: ${result.stderr}`);
    return [];
  }
  return result.stdout.split('\n').map(line => line.trim()).filter(line => line !== '');
}

/**
 * Add, commit and push. Every step runs even if an earlier one fails, so a
 * "nothing to commit" still pushes commits that are already waiting.
 */
export async function push(cwd: string, message: string): Promise<boolean> {
  let ok = true;
  for (const args of [['add', '.'], ['commit', '-m', message], ['push']]) {
    const result = await runGit(args, cwd);
    ok = ok && result.code === 0;
  }
  return ok;
}

export async function pull(cwd: string): Promise<boolean> {
  const result = await runGit(['pull'], cwd);
  return result.code === 0;
}
