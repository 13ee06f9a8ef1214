import { Command } from 'commander';

export interface SyncFlags {
  /** Unset unless `--mirror` or `--no-mirror` was given; the configured default applies then. */
  mirror?: boolean;
  verbose?: boolean;
}

export interface StatusFlags {
  limit: string;
}

export interface CliActions {
  sync(flags: SyncFlags): Promise<void>;
  status(flags: StatusFlags): Promise<void>;
  migrate(): Promise<void>;
}

export function createProgram(actions: CliActions): Command {
  const program = new Command();

  program.name('ytmb').description('Mirror a remote music library into a relational store').version('0.1.0');

  program
    .command('sync')
    .description('Fetch the remote library, reconcile it and update the mirror playlist')
    .option('--mirror', 'Update the mirror playlist even when disabled in config')
    .option('--no-mirror', 'Skip the mirror playlist update')
    .option('-v, --verbose', 'Log every step')
    .action((flags: SyncFlags) => actions.sync(flags));

  program
    .command('status')
    .description('Show the most recent sync runs')
    .option('-n, --limit <n>', 'Number of runs to show', '10')
    .action((flags: StatusFlags) => actions.status(flags));

  program
    .command('migrate')
    .description('Create the database schema')
    .action(() => actions.migrate());

  return program;
}
