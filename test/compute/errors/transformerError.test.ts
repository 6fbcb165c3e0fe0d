import { TransformerError } from '../../../src/compute/errors/transformerError.js';
import { EnvelopeSerializationError } from '../../../src/compute/errors/envelopeSerializationError.js';
import { ForwardError } from '../../../src/compute/errors/forwardError.js';
import { UpstreamTimeoutError } from '../../../src/compute/errors/upstreamTimeoutError.js';
import { BRAND, VERSION } from '../../../src/constants.js';

describe('TransformerError', () => {
    it('should use 500 status and default title', () => {
        const error = new TransformerError('Something broke');

        expect(error.message).toBe('Something broke');
        expect(error.statusCode).toBe(500);
        expect(error.title).toBe('Transformer Error');
        expect(error.component).toBe(`${BRAND} v${VERSION}`);
        expect(error.errorType()).toBe('TransformerError');
    });

    it('should use generic message when none is given', () => {
        const error = new TransformerError();

        expect(error.message).toBe(`The unknown error occurred in the ${BRAND}. Please see the stack trace in the logs for more details.`);
    });

    describe('fromError', () => {
        it('should return the same instance for transformer errors', () => {
            const error = new ForwardError('Upstream is down');

            expect(TransformerError.fromError(error)).toBe(error);
        });

        it('should wrap generic errors and keep the message, stack and cause', () => {
            const original = new TypeError('Cannot read properties of undefined');
            const error = TransformerError.fromError(original);

            expect(error).toBeInstanceOf(TransformerError);
            expect(error.message).toBe('Cannot read properties of undefined');
            expect(error.stack).toBe(original.stack);
            expect(error.cause).toBe(original);
            expect(error.statusCode).toBe(500);
        });

        it('should wrap thrown non-error values', () => {
            const error = TransformerError.fromError('plain failure');

            expect(error.message).toBe('plain failure');
        });
    });

    describe('toResponse', () => {
        it('should return plain-text response with the message', () => {
            const response = new ForwardError('Upstream is down').toResponse();

            expect(response.statusCode).toBe(502);
            expect(response.headers).toEqual({ 'content-type': 'text/plain; charset=utf-8' });
            expect(response.body.toString()).toBe('Upstream is down\n');
        });
    });

    describe('toJSON', () => {
        it('should include details without stack by default', () => {
            const error = new UpstreamTimeoutError('Too slow', { requestId: 'req-7' });

            expect(error.toJSON(false)).toEqual({
                errorStatus: 504,
                errorTitle: 'Upstream Timeout Error',
                errorMessage: 'Too slow',
                errorStack: undefined,
                requestId: 'req-7',
                component: `${BRAND} v${VERSION}`,
            });
        });

        it('should include stack lines when requested', () => {
            const error = new TransformerError('With stack', { stack: 'Error: With stack\n    at line' });

            expect(error.toJSON(true).errorStack).toEqual(['Error: With stack', '    at line']);
        });
    });

    describe('subclasses', () => {
        it('should prefix envelope serialization errors', () => {
            const error = new EnvelopeSerializationError('cyclic structure');

            expect(error.message).toBe('Envelope serialization error: cyclic structure');
            expect(error.statusCode).toBe(500);
            expect(error.title).toBe('Envelope Serialization Error');
        });

        it('should describe envelope serialization errors without cause', () => {
            expect(new EnvelopeSerializationError().message).toBe('Envelope serialization error: unknown error');
        });

        it('should use gateway status codes for upstream failures', () => {
            expect(new ForwardError('down').statusCode).toBe(502);
            expect(new UpstreamTimeoutError('slow').statusCode).toBe(504);
        });

        it('should allow to override the status code', () => {
            expect(new ForwardError('down', { statusCode: 503 }).statusCode).toBe(503);
        });
    });
});
