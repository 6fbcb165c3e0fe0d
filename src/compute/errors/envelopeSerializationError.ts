import { TransformerError, TransformerErrorOptions } from './transformerError.js';
import { STATUS_CODES } from '../../constants.js';

export class EnvelopeSerializationError extends TransformerError {
    constructor(message?: string, options: TransformerErrorOptions = {}) {
        super(`Envelope serialization error: ${message || 'unknown error'}`, {
            title: 'Envelope Serialization Error',
            statusCode: STATUS_CODES.StatusInternalServerError,
            ...options,
        });
    }
}
