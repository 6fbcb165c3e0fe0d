import { Response } from '../router/response.js';
import { BRAND, CONTENT_TYPES, HEADERS, STATUS_CODES, VERSION } from '../../constants.js';

export interface TransformerErrorOptions {
    title?: string;
    statusCode?: number;
    stack?: string;
    cause?: unknown;
    requestId?: string;
}

export class TransformerError extends Error {
    title: string;
    statusCode: number;
    requestId?: string;

    constructor(message?: string, options: TransformerErrorOptions = {}) {
        super(message || `The unknown error occurred in the ${BRAND}. Please see the stack trace in the logs for more details.`, { cause: options.cause });
        this.title = options.title || 'Transformer Error';
        this.statusCode = options.statusCode || STATUS_CODES.StatusInternalServerError;
        this.stack = options.stack || this.stack;
        this.requestId = options.requestId;
    }

    get component() {
        return `${BRAND} v${VERSION}`;
    }

    /**
     * Wraps any thrown value into TransformerError,
     * preserving the message and stack trace of the original error.
     */
    static fromError(e: unknown): TransformerError {
        if (e instanceof TransformerError) {
            return e;
        }
        if (e instanceof Error) {
            return new TransformerError(e.message, { stack: e.stack, cause: e });
        }
        return new TransformerError(String(e));
    }

    /**
     * The caller always receives a plain-text diagnostic,
     * the details for operators go to the logs through toJSON().
     */
    toResponse() {
        return new Response(`${this.message}\n`, {
            statusCode: this.statusCode,
            headers: {
                [HEADERS.ContentType]: CONTENT_TYPES.Text,
            },
        });
    }

    toJSON(includeStack = process.env.LOG_LEVEL === 'debug') {
        return {
            errorStatus: this.statusCode,
            errorTitle: this.title,
            errorMessage: this.message,
            errorStack: includeStack ? this.stack?.split('\n') : undefined,
            requestId: this.requestId,
            component: this.component,
        };
    }

    errorType() {
        // Don't use `this.constructor.name`.
        // We want to return same string for all child instances of TransformerError.
        return 'TransformerError';
    }
}
