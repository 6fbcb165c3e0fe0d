#!/usr/bin/env node
import chalk from 'chalk';
import { Command } from 'commander';
import { CliError } from '../cliError.js';
import { logger, LogLevel } from '../logger.js';
import { BRAND, DEFAULT_TIMEOUT, HOST, NAME, PORT, UPSTREAM_URL, VERSION } from '../constants.js';
import { start, StartCommandOptions } from './start.js';

export function createProgram(): Command {
    const program = new Command()
        .name(NAME)
        .description(`Run HTTP requests as invocations of the function behind ${BRAND}`)
        .version(VERSION, '-v, --version')
        .helpOption('-h, --help', 'Display help for command')
        .option('-d, --debug', 'Enable debug mode')
        .hook('preAction', preAction);

    program
        .command('start')
        .alias('run')
        .description('Start the proxy server that transforms requests into function invocations')
        .option('-p, --port <port>', 'The port to listen on', String(PORT))
        .option('--host <host>', 'The host to listen on', HOST)
        .option('-u, --upstream <url>', 'The URL of the function invocation endpoint', UPSTREAM_URL)
        .option('-t, --timeout <seconds>', 'The upstream timeout in seconds', String(DEFAULT_TIMEOUT))
        .action(async (options: StartCommandOptions) => {
            await start(options);
        });

    program.addHelpText(
        'after',
        `
Examples:
  npx ${NAME} start
  npx ${NAME} start --port 8080 --upstream http://127.0.0.1:9000
`,
    );

    return program;
}

/**
 * Global hook that always runs before any command.
 */
export function preAction(thisCommand: Command, actionCommand: Command) {
    const { debug } = thisCommand.opts<{ debug?: boolean }>();
    if (debug) process.env.LOG_LEVEL = 'debug';
    logger.drawTitle(actionCommand.name());
}

/**
 * Default error handler for all the errors inside the CLI.
 */
export function handleException(e: unknown) {
    const error = e instanceof Error ? e : new Error(String(e));

    // Show stack trace only for unexpected errors. Not for CLI errors.
    if (!(error instanceof CliError)) {
        const errorStack = (error.stack || '')
            .split('\n')
            .map((line) => line.trim())
            .slice(1)
            .join('\n');
        logger.error(chalk.gray.bold('Stack trace') + '\r\n\r\n' + chalk.gray(errorStack));
    }

    logger.drawTable([error.message], {
        title: 'Error',
        logLevel: LogLevel.ERROR,
    });

    if (error instanceof CliError && error.hasInstructions()) {
        logger.drawTable(error.instructions, {
            title: 'Next Steps',
            logLevel: LogLevel.INFO,
        });
    }
    process.exitCode = 1;
}

if (require.main === module) {
    process.on('uncaughtException', (e) => {
        handleException(e);
        process.exit(1);
    });
    createProgram().parseAsync(process.argv).catch(handleException);
}
