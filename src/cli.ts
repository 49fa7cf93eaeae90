/**
 * Task bridge CLI - generated from unified command definitions
 */

import yargs from 'yargs';
import { hideBin } from 'yargs/helpers';
import chalk from './utils/chalk.js';
import { formatConfigExamples, loadConfig } from './config/index.js';
import { createTaskStore } from './storage/index.js';
import { createServiceContext } from './commands/context.js';
import { COMMAND_DEFINITIONS } from './commands/index.js';
import { generateCliCommand, generateCliHandler } from './commands/generators.js';
import { CLI_NAME } from './commands/formatters.js';
import { ServiceContext } from './commands/types.js';
import { getErrorMessage } from './types/errors.js';
import { logger } from './utils/logger.js';

// Global service context
let context: ServiceContext | null = null;

async function initializeContext(): Promise<ServiceContext> {
  if (context) return context;

  const config = loadConfig();
  // Command output owns stdout
  logger.configure({ ...config.logging, stderrOnly: true });

  const store = createTaskStore(config);
  await store.initialize();

  context = createServiceContext(config, store);
  return context;
}

// Build CLI from command definitions
export function buildCli(args: string[]) {
  const cli = yargs(args)
    .scriptName(CLI_NAME)
    .usage('$0 <command> [options]')
    .demandCommand(1, 'You need at least one command before moving on')
    .strict() // Reject unrecognized commands and options
    .fail((msg, err) => {
      if (err) {
        console.error(chalk.red('❌ Error:'), err.message);
      } else {
        console.error(chalk.red('❌ Error:'), msg);
        console.error('\nRun --help to see available commands and options');
      }
      process.exit(1);
    })
    .epilog(formatConfigExamples())
    .help()
    .version()
    .alias('h', 'help');

  // MCP server over stdio
  cli.command('mcp', 'Run as MCP server for stdio transport', {}, async () => {
    const { runMCPServer } = await import('./mcp.js');
    await runMCPServer();
  });

  // Background supervisor; started by dispatch-task, not by hand
  cli.command({
    command: 'supervise',
    describe: false,
    builder: (y) => y
      .option('task-id', { type: 'string', demandOption: true })
      .option('workdir', { type: 'string', demandOption: true })
      .option('prompt', { type: 'string', demandOption: true }),
    handler: async (argv) => {
      const { runSupervisor } = await import('./supervise.js');
      const exitCode = await runSupervisor({
        taskId: argv['task-id'],
        workdir: argv.workdir,
        prompt: argv.prompt,
      });
      process.exit(exitCode);
    },
  });

  for (const def of COMMAND_DEFINITIONS) {
    const commandConfig = generateCliCommand(def);

    cli.command(
      commandConfig.command,
      commandConfig.describe,
      commandConfig.builder,
      async (argv) => {
        const ctx = await initializeContext();
        const handler = generateCliHandler(def, ctx);
        process.exitCode = await handler(argv);
      }
    );
  }

  return cli;
}

export async function runCLI(args: string[] = hideBin(process.argv)): Promise<void> {
  try {
    await buildCli(args).parseAsync();
  } catch (error) {
    console.error(chalk.red('❌ CLI error:'), getErrorMessage(error));
    process.exitCode = 1;
  }
}
