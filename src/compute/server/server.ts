import http from 'http';
import { DEFAULT_TIMEOUT, HEADERS, UPSTREAM_URL } from '../../constants.js';
import { logger } from '../../logger.js';
import { TransformerError } from '../errors/transformerError.js';
import { HttpForwarder } from '../forwarder/httpForwarder.js';
import { Request } from '../router/request.js';
import { Response } from '../router/response.js';
import { createConfig, LambdaRequestTransformer } from '../transformer/transformer.js';

export interface ProxyServerOptions {
    upstreamUrl?: string;
    /** Upstream timeout in seconds */
    timeout?: number;
    transformer?: LambdaRequestTransformer;
}

/**
 * Creates the HTTP server that turns every request
 * into invocation of the function behind the upstream URL.
 */
export function createProxyServer(options: ProxyServerOptions = {}): http.Server {
    const transformer =
        options.transformer ??
        new LambdaRequestTransformer(
            new HttpForwarder({
                upstreamUrl: options.upstreamUrl ?? UPSTREAM_URL,
                timeout: options.timeout ?? DEFAULT_TIMEOUT,
            }),
            createConfig(),
        );

    return http.createServer(async (nodeRequest, nodeResponse) => handleNodeRequest(transformer, nodeRequest, nodeResponse));
}

/**
 * Handles single request of the server.
 * Never rejects, all errors are written as plain-text response to the caller.
 */
export async function handleNodeRequest(transformer: LambdaRequestTransformer, nodeRequest: http.IncomingMessage, nodeResponse: http.ServerResponse): Promise<void> {
    let request: Request | undefined;
    const response = Response.fromNodeResponse(nodeResponse);

    // Stop the upstream request when the caller goes away before the response is finished
    const abortController = new AbortController();
    nodeResponse.on('close', () => {
        if (!nodeResponse.writableFinished) abortController.abort();
    });

    try {
        request = Request.fromNodeRequest(nodeRequest);
        logger.debug(`[Server][Request]: ${request.method} ${request.path}`);

        await transformer.handle(request, response, abortController.signal);
        logger.debug(`[Server][Response]: ${response.statusCode} in ${response.duration}ms`);
    } catch (e) {
        const error = TransformerError.fromError(e);
        error.requestId = request?.getHeader(HEADERS.XRequestId);
        logger.error(`[Server][Error]: ${error.message}`, error.toJSON());

        if (abortController.signal.aborted) return;
        if (nodeResponse.headersSent) {
            // The head is already on the wire, the only option is to cut the response.
            nodeResponse.destroy();
            return;
        }
        error.toResponse().toNodeResponse(nodeResponse);
    }
}
