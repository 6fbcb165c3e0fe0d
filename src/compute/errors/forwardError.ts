import { TransformerError, TransformerErrorOptions } from './transformerError.js';
import { STATUS_CODES } from '../../constants.js';

export class ForwardError extends TransformerError {
    constructor(message?: string, options: TransformerErrorOptions = {}) {
        super(message, {
            title: 'Forward Error',
            statusCode: STATUS_CODES.StatusBadGateway,
            ...options,
        });
    }
}
