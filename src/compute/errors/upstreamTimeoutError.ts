import { TransformerError, TransformerErrorOptions } from './transformerError.js';
import { STATUS_CODES } from '../../constants.js';

export class UpstreamTimeoutError extends TransformerError {
    constructor(message?: string, options: TransformerErrorOptions = {}) {
        super(message, {
            title: 'Upstream Timeout Error',
            statusCode: STATUS_CODES.StatusGatewayTimeout,
            ...options,
        });
    }
}
