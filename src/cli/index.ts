#!/usr/bin/env node

import * as path from 'path';
import { Command } from 'commander';
import { AliasError, AliasStore } from '../lib/alias-store';
import { cherryPickCommits, selectCommitsInteractively } from '../lib/cherry-pick';
import { GitProject, pull, push, resolveGitProject } from '../lib/git-runner';
import { DEFAULT_COMMIT_MESSAGE } from '../shared-constants';

// Import version from package.json
const packageJson = require('../../package.json');

interface CherryPickOptions {
  branch?: string;
  autoResolve?: boolean;
  interactive?: boolean;
}

export function createProgram(aliases: AliasStore = new AliasStore()): Command {
  const program = new Command();

  program
    .name('gitex')
    .description('Shortcuts for everyday git work')
    .version(packageJson.version)
    .option('-p, --path <path>', 'Target path to search', '.');

  // Repository commands need a .git directory directly inside --path
  function requireProject(): GitProject | null {
    const { path: target } = program.opts<{ path: string }>();
    const project = resolveGitProject(target);
    if (!project) {
      console.log(`${path.resolve(target)} is not a git project directory`);
      process.exitCode = 1;
    }
    return project;
  }

  program
    .command('push')
    .description('Add, commit with message, and push')
    .option('-m, --message <message>', 'Commit message', DEFAULT_COMMIT_MESSAGE)
    .action(async (options: { message: string }) => {
      const project = requireProject();
      if (!project) {
        return;
      }
      console.log(`git folder found in: ${project.root}`);
      if (!(await push(project.root, options.message))) {
        process.exitCode = 1;
      }
    });

  program
    .command('pull')
    .description('Pull latest changes')
    .action(async () => {
      const project = requireProject();
      if (!project) {
        return;
      }
      console.log(`git folder found in: ${project.root}`);
      if (!(await pull(project.root))) {
        process.exitCode = 1;
      }
    });

  program
    .command('cherry-pick')
    .description('Cherry-pick commits onto a branch')
    .argument('[commits...]', 'Commits to apply, oldest first')
    .option('-b, --branch <branch>', 'Target branch for cherry-picking')
    .option('--auto-resolve', 'Skip commits that conflict instead of aborting')
    .option('--interactive', 'Pick commits from the log')
    .action(async (commits: string[], options: CherryPickOptions) => {
      const project = requireProject();
      if (!project) {
        return;
      }

      const selected = options.interactive ? await selectCommitsInteractively(project.root) : commits;
      if (selected.length === 0 || !options.branch) {
        console.log('Nothing to cherry-pick: give at least one commit and --branch');
        process.exitCode = 1;
        return;
      }

      const result = await cherryPickCommits(selected, options.branch, project.root, options.autoResolve ?? false);
      if (result.checkoutFailed || result.abortedAt) {
        process.exitCode = 1;
      }
    });

  program
    .command('alias-add')
    .description('Add new alias')
    .argument('<name>', 'Alias name')
    .argument('<command>', 'Command the alias runs')
    .action(async (name: string, command: string) => {
      await aliases.add(name, command);
      console.log(`Alias '${name}' added for command '${command}'`);
    });

  program
    .command('alias-remove')
    .description('Remove alias')
    .argument('<name>', 'Alias name')
    .action(async (name: string) => {
      if (await aliases.remove(name)) {
        console.log(`Alias '${name}' removed.`);
      } else {
        console.log(`Alias '${name}' does not exist.`);
      }
    });

  program
    .command('alias-list')
    .description('List all defined aliases')
    .action(async () => {
      const defined = await aliases.list();
      if (defined.length === 0) {
        console.log('No aliases defined.');
        return;
      }
      for (const alias of defined) {
        console.log(`${alias.name}: ${alias.command}`);
      }
    });

  program
    .command('alias-clear')
    .description('Clear all defined aliases')
    .action(async () => {
      await aliases.clear();
      console.log('All aliases cleared.');
    });

  program
    .command('run-alias')
    .description('Run a command using an alias')
    .argument('<name>', 'Alias name')
    .argument('[args...]', 'Extra arguments appended to the command')
    .allowUnknownOption()
    .action(async (name: string, args: string[]) => {
      const code = await aliases.run(name, args);
      if (code === null) {
        console.log(`Alias '${name}' not found.`);
        process.exitCode = 1;
        return;
      }
      process.exitCode = code;
    });

  return program;
}

// Only run if this file is executed directly
if (require.main === module) {
  createProgram().parseAsync(process.argv).catch((error: unknown) => {
    if (error instanceof AliasError) {
      console.error(`❌ ${error.message}`);
    } else {
      console.error('❌ gitex failed:', error instanceof Error ? error.message : error);
    }
    process.exit(1);
  });
}
