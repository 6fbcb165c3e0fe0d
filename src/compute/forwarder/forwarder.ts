import { OutboundRequest } from '../transformer/outboundRequest.js';
import { Response } from '../router/response.js';

/**
 * Delivers the rewritten request to the function invocation endpoint
 * and writes the reply into the response for the original caller.
 */
export interface Forwarder {
    forward(request: OutboundRequest, response: Response, signal?: AbortSignal): Promise<void>;
}
