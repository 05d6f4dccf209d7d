/**
 * CLI Entry Point
 *
 * Commands:
 * - `projects` - List all projects
 * - `report <project>` - Print the mastery report of a project (ID or name)
 * - `reset <project> --yes` - Clear a project's ledger and review schedule
 * - `serve` - Start the HTTP API server
 *
 * Usage:
 * ```bash
 * npm run cli -- projects
 * npm run cli -- report "Algorithms 101" --as-of 2024-03-01
 * npm run cli -- reset prj_abc123 --yes
 * npm run cli -- serve --port 4000
 * ```
 *
 * Reports and resets never call the model, so they work without
 * ANTHROPIC_API_KEY.
 */

import { Command, InvalidArgumentError } from 'commander';
import { createDatabase } from '../storage/db';
import { createServices, startServer, type AppServices } from '../api/server';
import { config } from '../config';
import { API_VERSION } from '../api/routes';
import { runProjectsCommand } from './commands/projects';
import { runReportCommand } from './commands/report';
import { runResetCommand } from './commands/reset';
import { CliError, findProject, parseAsOf } from './commands/shared';
import { dim, red } from './utils/terminal';

interface GlobalOptions {
  db: string;
}

function openServices(program: Command): AppServices {
  const { db } = program.opts<GlobalOptions>();
  return createServices(createDatabase(db));
}

function parsePort(value: string): number {
  const port = Number.parseInt(value, 10);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new InvalidArgumentError('Port must be an integer between 1 and 65535.');
  }
  return port;
}

/**
 * Builds the commander program.
 */
function createProgram(): Command {
  const program = new Command('mastery')
    .description('Concept mastery tracking with targeted quizzes')
    .version(API_VERSION)
    .option('--db <path>', 'SQLite database path', config.database.path);

  program
    .command('projects')
    .alias('ls')
    .description('List all projects')
    .action(async () => {
      const { projects } = openServices(program);
      await runProjectsCommand(projects);
    });

  program
    .command('report <project>')
    .description('Show the mastery report of a project (ID or name)')
    .option('--as-of <date>', 'Report date (YYYY-MM-DD); defaults to today')
    .action(async (idOrName: string, options: { asOf?: string }) => {
      const asOf = parseAsOf(options.asOf);
      const { engine, projects } = openServices(program);
      const project = await findProject(projects, idOrName);
      await runReportCommand(engine, project.id, project.name, {
        asOf,
        threshold: config.mastery.weakThreshold,
      });
    });

  program
    .command('reset <project>')
    .description("Clear a project's concept ledger and review schedule")
    .option('-y, --yes', 'Confirm the reset')
    .action(async (idOrName: string, options: { yes?: boolean }) => {
      const { engine, projects } = openServices(program);
      const project = await findProject(projects, idOrName);
      await runResetCommand(engine, project, options);
    });

  program
    .command('serve')
    .description('Start the HTTP API server')
    .option('-p, --port <port>', 'Preferred port', parsePort, config.server.port)
    .action(async (options: { port: number }) => {
      const running = await startServer(options.port);
      const shutdown = () => {
        running.close().then(
          () => process.exit(0),
          (err: unknown) => {
            console.error('[Server] Error during shutdown:', err);
            process.exit(1);
          }
        );
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });

  return program;
}

async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

main().catch((error: unknown) => {
  if (error instanceof CliError) {
    console.error(red(`Error: ${error.message}`));
    if (error.hint) console.error(dim(error.hint));
  } else {
    const err = error instanceof Error ? error : new Error(String(error));
    console.error(red('\nFatal error:'));
    console.error(dim(err.message));
    if (process.env.DEBUG) {
      console.error(dim(err.stack ?? ''));
    }
  }
  process.exitCode = 1;
});
