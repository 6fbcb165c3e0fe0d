import { INVOCATION_PATH, NAME } from '../../constants.js';
import { logger } from '../../logger.js';
import { TransformerError } from '../errors/transformerError.js';
import { Forwarder } from '../forwarder/forwarder.js';
import { Request } from '../router/request.js';
import { Response } from '../router/response.js';
import { buildInvocationEvent, BuildInvocationEventOptions } from './envelope.js';
import { OutboundRequest } from './outboundRequest.js';
import { EventSerializer, rewriteRequest, serializeInvocationEvent } from './rewriter.js';

/**
 * The transformer has no configurable fields.
 */
export type TransformerConfig = Record<string, never>;

export function createConfig(): TransformerConfig {
    return {};
}

export interface TransformerOptions extends BuildInvocationEventOptions {
    stringify?: EventSerializer;
}

/**
 * Rewrites every inbound HTTP request into invocation of the function
 * and hands it to the next forwarder.
 */
export class LambdaRequestTransformer {
    constructor(
        readonly next: Forwarder,
        readonly config: TransformerConfig = createConfig(),
        readonly name: string = NAME,
        protected options: TransformerOptions = {},
    ) {}

    /**
     * Builds the outbound request from the inbound one.
     * The original method and path are captured in the snapshot first,
     * the inbound request stays unchanged.
     * @throws EnvelopeSerializationError
     */
    transform(request: Request): OutboundRequest {
        const snapshot = request.toSnapshot();
        const event = buildInvocationEvent(snapshot, this.options);
        const serializedEvent = serializeInvocationEvent(event, this.options.stringify);
        logger.debug(`[${this.name}][Request]: ${event.routeKey} => POST ${INVOCATION_PATH}`, {
            requestId: event.requestContext.requestId,
        });
        return rewriteRequest(request.headers, serializedEvent);
    }

    /**
     * Transforms the request and forwards it.
     * If the event cannot be serialized, the error response is written instead
     * and the forwarder is never called.
     */
    async handle(request: Request, response: Response, signal?: AbortSignal): Promise<void> {
        let outboundRequest: OutboundRequest;
        try {
            outboundRequest = this.transform(request);
        } catch (e) {
            if (!(e instanceof TransformerError)) throw e;
            logger.error(`[${this.name}][Error]: ${e.message}`, e.toJSON());
            const errorResponse = e.toResponse();
            response.writeHead(errorResponse.statusCode, errorResponse.headers);
            response.end(errorResponse.body);
            return;
        }

        return this.next.forward(outboundRequest, response, signal);
    }
}
