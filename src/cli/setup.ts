#!/usr/bin/env node

import { Command } from 'commander';
import { runRepair, runSetup, runStatus, runUninstall, SetupOptions } from '../setup';

// Import version from package.json
const packageJson = require('../../package.json');

interface SetupFlags {
  source?: string;
  target?: string;
  stateDir?: string;
  path: boolean;
  legacyPathMatch?: boolean;
  elevated?: boolean;
}

function toSetupOptions(flags: SetupFlags): SetupOptions {
  return {
    source: flags.source,
    target: flags.target,
    stateDir: flags.stateDir,
    updatePath: flags.path,
    legacyPathMatch: flags.legacyPathMatch,
    elevated: flags.elevated
  };
}

export function createSetupProgram(): Command {
  const program = new Command();

  program
    .name('gitex-setup')
    .description('Install the prebuilt gitex binary onto this machine')
    .version(packageJson.version)
    .option('--source <path>', 'Prebuilt executable to install (default: ./dist/gitex.exe)')
    .option('--target <dir>', 'Install directory (default: C:\\GitEx\\ on Windows, /usr/bin elsewhere)')
    .option('--state-dir <dir>', 'Where installation state and backups are kept (default: ~/.gitex)')
    .option('--no-path', 'Do not add the install directory to the machine Path (Windows)')
    .option('--legacy-path-match', 'Detect an existing Path entry only when it has ";" on both sides')
    .option('--elevated', 'Set by setup itself when it relaunches with administrator rights')
    .action(async () => {
      process.exitCode = await runSetup(toSetupOptions(program.opts<SetupFlags>()));
    });

  program
    .command('uninstall')
    .description('Remove the installed binary and the Path entry setup added')
    .action(async () => {
      process.exitCode = await runUninstall(toSetupOptions(program.opts<SetupFlags>()));
    });

  program
    .command('status')
    .description('Show whether gitex is installed and up to date')
    .action(async () => {
      process.exitCode = await runStatus(toSetupOptions(program.opts<SetupFlags>()));
    });

  program
    .command('repair')
    .description('Reinstall any missing or out of date component')
    .action(async () => {
      process.exitCode = await runRepair(toSetupOptions(program.opts<SetupFlags>()));
    });

  return program;
}

// Only run if this file is executed directly
if (require.main === module) {
  createSetupProgram().parseAsync(process.argv).catch((error: unknown) => {
    console.error('❌ Setup failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
}
