import http from 'http';
import https from 'https';
import { DEFAULT_TIMEOUT, HEADERS, UPSTREAM_URL } from '../../constants.js';
import { logger } from '../../logger.js';
import { ForwardError } from '../errors/forwardError.js';
import { UpstreamTimeoutError } from '../errors/upstreamTimeoutError.js';
import { Response } from '../router/response.js';
import { OutboundRequest } from '../transformer/outboundRequest.js';
import { Forwarder } from './forwarder.js';

// Headers that describe only the connection to the upstream
// and must not be copied to the response for the original caller.
const HOP_BY_HOP_HEADERS: string[] = [HEADERS.Connection, HEADERS.KeepAlive, HEADERS.TransferEncoding];

/**
 * The part of http.ClientRequest the forwarder works with.
 */
export interface UpstreamRequest {
    on(event: 'error', listener: (error: Error) => void): unknown;
    on(event: 'timeout', listener: () => void): unknown;
    write(chunk: Buffer): unknown;
    end(): unknown;
    destroy(error?: Error): unknown;
}

/**
 * The part of http.IncomingMessage the forwarder works with.
 */
export interface UpstreamResponse {
    statusCode?: number;
    headers: http.IncomingHttpHeaders;
    on(event: 'data', listener: (chunk: Buffer) => void): unknown;
    on(event: 'end', listener: () => void): unknown;
    on(event: 'error', listener: (error: Error) => void): unknown;
}

export type RequestFn = (url: URL, options: http.RequestOptions, onResponse: (response: UpstreamResponse) => void) => UpstreamRequest;

export interface HttpForwarderOptions {
    upstreamUrl?: string;
    /** Timeout in seconds */
    timeout?: number;
    requestFn?: RequestFn;
}

// We use http/https libs instead of fetch,
// so the upstream body is streamed back to the caller as it is, without decompressing it.
const defaultRequestFn: RequestFn = (url, options, onResponse) =>
    url.protocol === 'https:' ? https.request(url, options, onResponse) : http.request(url, options, onResponse);

/**
 * Forwards the outbound request to the invocation endpoint over HTTP
 * and streams the reply back to the original caller.
 */
export class HttpForwarder implements Forwarder {
    upstreamUrl: URL;
    timeout: number;
    protected requestFn: RequestFn;

    constructor(options: HttpForwarderOptions = {}) {
        this.upstreamUrl = new URL(options.upstreamUrl ?? UPSTREAM_URL);
        this.timeout = options.timeout ?? DEFAULT_TIMEOUT;
        this.requestFn = options.requestFn ?? defaultRequestFn;
    }

    /**
     * Returns the URL of the upstream endpoint for the given path.
     * Path prefix of the upstream URL is kept.
     * @example
     * http://127.0.0.1:9000/prefix + /invocations => http://127.0.0.1:9000/prefix/invocations
     */
    getTargetUrl(path: string): URL {
        const prefix = this.upstreamUrl.pathname.replace(/\/+$/, '');
        return new URL(`${this.upstreamUrl.origin}${prefix}${path}`);
    }

    forward(request: OutboundRequest, response: Response, signal?: AbortSignal): Promise<void> {
        const targetUrl = this.getTargetUrl(request.path);
        const timeout = Math.max(this.timeout * 1000, 500);

        return new Promise<void>((resolve, reject) => {
            const options: http.RequestOptions = {
                method: request.method,
                headers: {
                    ...request.headers,
                    [HEADERS.Host]: targetUrl.host,
                },
                timeout,
                signal,
            };

            logger.debug(`[Forwarder][Request]: ${request.method} ${targetUrl}`);
            const upstreamRequest = this.requestFn(targetUrl, options, (upstreamResponse) => {
                response.statusCode = upstreamResponse.statusCode || 502;
                for (const [key, value] of Object.entries(upstreamResponse.headers)) {
                    if (value === undefined || HOP_BY_HOP_HEADERS.includes(key.toLowerCase())) continue;
                    response.setHeader(key, value);
                }
                response.writeHead();

                upstreamResponse.on('data', (chunk) => response.write(chunk));
                upstreamResponse.on('end', () => {
                    logger.debug(`[Forwarder][Response]: ${response.statusCode}`);
                    response.end();
                    resolve();
                });
                upstreamResponse.on('error', (error) => {
                    reject(new ForwardError(`The upstream response from '${targetUrl}' was interrupted: ${error.message}`, { cause: error }));
                });
            });

            upstreamRequest.on('error', (error) => {
                reject(new ForwardError(`Failed to forward the request to '${targetUrl}': ${error.message}`, { cause: error }));
            });

            upstreamRequest.on('timeout', () => {
                upstreamRequest.destroy();
                reject(new UpstreamTimeoutError(`The function on '${targetUrl}' did not respond within ${timeout / 1000} seconds.`));
            });

            upstreamRequest.write(request.body);
            upstreamRequest.end();
        });
    }
}
