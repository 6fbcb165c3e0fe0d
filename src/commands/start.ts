import chalk from 'chalk';
import http from 'http';
import { BRAND, DEFAULT_TIMEOUT, HOST, INVOCATION_PATH, PORT, UPSTREAM_URL } from '../constants.js';
import { logger, LogLevel } from '../logger.js';
import { CliError } from '../cliError.js';
import { createProxyServer } from '../compute/server/server.js';

export interface StartCommandOptions {
    port?: string | number;
    host?: string;
    upstream?: string;
    timeout?: string | number;
}

export interface StartOptions {
    port: number;
    host: string;
    upstreamUrl: string;
    timeout: number;
}

/**
 * Validates the raw CLI options and fills in the defaults.
 * @throws CliError if any of the options is invalid
 */
export function resolveStartOptions(options: StartCommandOptions = {}): StartOptions {
    const port = Number(options.port ?? PORT);
    if (!Number.isInteger(port) || port < 0 || port > 65535) {
        throw new CliError(`The port '${options.port}' is not valid.`, {
            instructions: [`Please provide a port number between 0 and 65535, e.g. ${chalk.cyan('--port 8080')}`],
        });
    }

    const timeout = Number(options.timeout ?? DEFAULT_TIMEOUT);
    if (!Number.isFinite(timeout) || timeout <= 0) {
        throw new CliError(`The timeout '${options.timeout}' is not valid.`, {
            instructions: [`Please provide the upstream timeout in seconds, e.g. ${chalk.cyan('--timeout 30')}`],
        });
    }

    const upstreamUrl = options.upstream ?? UPSTREAM_URL;
    if (!URL.canParse(upstreamUrl) || !['http:', 'https:'].includes(new URL(upstreamUrl).protocol)) {
        throw new CliError(`The upstream URL '${upstreamUrl}' is not valid.`, {
            instructions: [`Please provide http or https URL of the function invocation endpoint, e.g. ${chalk.cyan('--upstream http://127.0.0.1:9000')}`],
        });
    }

    return {
        port,
        host: options.host ?? HOST,
        upstreamUrl,
        timeout,
    };
}

export async function start(commandOptions: StartCommandOptions = {}): Promise<http.Server> {
    const { port, host, upstreamUrl, timeout } = resolveStartOptions(commandOptions);
    const server = createProxyServer({ upstreamUrl, timeout });

    await new Promise<void>((resolve, reject) => {
        server.once('error', reject);
        server.listen(port, host, () => {
            server.off('error', reject);
            resolve();
        });
    });

    logger.success(`${BRAND} is ready`);
    logger.drawTable(
        [
            `Listening: ${chalk.cyan(`http://${host}:${port}`)}`,
            `Upstream: ${chalk.cyan(`${upstreamUrl.replace(/\/+$/, '')}${INVOCATION_PATH}`)}`,
            `Timeout: ${chalk.cyan(`${timeout}s`)}`,
            ``,
            chalk.gray(`Add ${chalk.cyan('--debug')} flag to see all logs.`),
            chalk.gray(`Press ${chalk.cyan('CTRL+C')} to stop the server.`),
        ],
        { logLevel: LogLevel.SUCCESS },
    );
    return server;
}
