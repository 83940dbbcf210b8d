import inquirer from 'inquirer';
import { getCommitList, runGit } from './git-runner';

export interface CherryPickResult {
  applied: string[];
  skipped: string[];
  // The commit whose conflict stopped the run
  abortedAt?: string;
  checkoutFailed: boolean;
}

/**
 * Check out the target branch and apply commits in order.
 * A conflict either skips the commit (autoResolve) or aborts the whole run.
 */
export async function cherryPickCommits(
  commits: string[],
  targetBranch: string,
  cwd: string,
  autoResolve = false
): Promise<CherryPickResult> {
  const result: CherryPickResult = { applied: [], skipped: [], checkoutFailed: false };

  const checkout = await runGit(['checkout', targetBranch], cwd);
  if (checkout.code !== 0) {
    result.checkoutFailed = true;
    return result;
  }

  for (const commit of commits) {
    const pick = await runGit(['cherry-pick', commit], cwd);
    if (pick.code === 0) {
      result.applied.push(commit);
      continue;
    }

    if (autoResolve) {
      await runGit(['cherry-pick', '--skip'], cwd);
      console.log(`Automatically skipped commit ${commit} due to conflicts.`);
      result.skipped.push(commit);
    } else {
      console.log(`Conflict detected while cherry-picking commit ${commit}. Aborting...`);
      await runGit(['cherry-pick', '--abort'], cwd);
      result.abortedAt = commit;
      return result;
    }
  }

  console.log(`Cherry-picked commits ${result.applied.join(', ')} onto ${targetBranch} successfully.`);
  return result;
}

/**
 * The short hash at the start of a `git log --oneline` line
 */
export function commitHash(logLine: string): string {
  return logLine.trim().split(/\s+/)[0];
}

/**
 * Let the user tick commits from the log. Selected commits come back oldest
 * first, the order they apply in.
 */
export async function selectCommitsInteractively(cwd: string): Promise<string[]> {
  const commits = await getCommitList(cwd);
  if (commits.length === 0) {
    console.log('No commits found.');
    return [];
  }

  const { selected } = await inquirer.prompt<{ selected: string[] }>([
    {
      type: 'checkbox',
      name: 'selected',
      message: 'Select commits to cherry-pick (space to toggle, Enter to confirm):',
      choices: commits.map(line => ({ name: line, value: commitHash(line) })),
      pageSize: 15
    }
  ]);

  const order = commits.map(commitHash);
  return [...selected].sort((a, b) => order.indexOf(b) - order.indexOf(a));
}
