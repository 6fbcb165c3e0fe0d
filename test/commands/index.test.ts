import { jest } from '@jest/globals';
import { createProgram, handleException } from '../../src/commands/index.js';
import { CliError } from '../../src/cliError.js';
import { logger, LogLevel } from '../../src/logger.js';

describe('CLI', () => {
    afterEach(() => {
        process.exitCode = undefined;
        jest.restoreAllMocks();
    });

    it('should register the start command with its alias', () => {
        const program = createProgram();
        const startCommand = program.commands.find((command) => command.name() === 'start');

        expect(startCommand).toBeDefined();
        expect(startCommand?.aliases()).toEqual(['run']);
        expect(startCommand?.options.map((option) => option.long)).toEqual(['--port', '--host', '--upstream', '--timeout']);
    });

    it('should draw error and next steps for CLI errors', () => {
        const drawTable = jest.spyOn(logger, 'drawTable').mockImplementation(() => {});
        const error = jest.spyOn(logger, 'error').mockImplementation(() => {});

        handleException(new CliError('The port is not valid.', { instructions: ['Use --port 8080'] }));

        expect(error).not.toHaveBeenCalled();
        expect(drawTable).toHaveBeenNthCalledWith(1, ['The port is not valid.'], { title: 'Error', logLevel: LogLevel.ERROR });
        expect(drawTable).toHaveBeenNthCalledWith(2, ['Use --port 8080'], { title: 'Next Steps', logLevel: LogLevel.INFO });
        expect(process.exitCode).toBe(1);
    });

    it('should log stack trace for unexpected errors', () => {
        const drawTable = jest.spyOn(logger, 'drawTable').mockImplementation(() => {});
        const error = jest.spyOn(logger, 'error').mockImplementation(() => {});

        handleException(new Error('Unexpected'));

        expect(error).toHaveBeenCalledTimes(1);
        expect(drawTable).toHaveBeenCalledTimes(1);
        expect(process.exitCode).toBe(1);
    });
});
