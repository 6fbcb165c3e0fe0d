import http from 'http';
import { HEADERS } from '../../constants.js';
import { RequestSnapshot } from '../transformer/requestSnapshot.js';
import { joinHostPort } from '../transformer/clientAddress.js';

export interface RequestOptions {
    host?: string;
    httpVersion?: string;
    remoteAddress?: string;
    method?: string;
    headers?: Record<string, string | string[]>;
}

export interface RequestTarget {
    /** Only present for absolute-form targets, e.g. http://api.example.com/users */
    host?: string;
    path: string;
    rawQueryString: string;
}

// Scheme and authority of absolute-form target
const TARGET_ORIGIN_PATTERN = /^[a-z][a-z0-9+.-]*:\/\/[^/?]*/i;

/**
 * Splits the request target into path and query exactly as the client sent them.
 * Nothing is decoded, encoded or normalized, dot segments stay in the path.
 * @example
 * parseRequestTarget("/a/../b?q='x'") => { path: '/a/../b', rawQueryString: "q='x'" }
 * parseRequestTarget('http://api.example.com:8080/status?full=true') => { host: 'api.example.com:8080', path: '/status', rawQueryString: 'full=true' }
 */
export function parseRequestTarget(target: string): RequestTarget {
    const origin = TARGET_ORIGIN_PATTERN.exec(target)?.[0];
    const rest = origin ? target.slice(origin.length) : target;
    const queryStart = rest.indexOf('?');

    return {
        host: origin && URL.canParse(origin) ? new URL(origin).host : undefined,
        path: queryStart === -1 ? rest : rest.slice(0, queryStart),
        rawQueryString: queryStart === -1 ? '' : rest.slice(queryStart + 1),
    };
}

export class Request {
    host: string = 'localhost';
    /** The path exactly as it was sent by the client, without decoding. */
    path: string = '/';
    rawQueryString: string = '';
    httpVersion: string = '1.1';
    method: string = 'GET';
    headers: Record<string, string | string[]> = {};
    remoteAddress: string = '127.0.0.1';

    constructor(target: string = '/', options: RequestOptions = {}) {
        const { host, path, rawQueryString } = parseRequestTarget(target);
        this.host = options.host ?? host ?? this.host;
        this.path = path;
        this.rawQueryString = rawQueryString;
        this.httpVersion = options.httpVersion ?? this.httpVersion;
        this.remoteAddress = options.remoteAddress ?? this.remoteAddress;
        this.method = options.method ?? this.method;
        this.setHeaders(options.headers || {});
    }

    setHeader(key: string, value: string | string[]): void {
        this.headers[key.toLowerCase()] = value;
    }

    addHeader(key: string, value: string | string[]): void {
        this.headers[key.toLowerCase()] = [...this.getHeaderArray(key), ...(Array.isArray(value) ? value : [value])];
    }

    setHeaders(headers: Record<string, string | string[]>): void {
        for (const [key, value] of Object.entries(headers)) {
            this.setHeader(key, value);
        }
    }

    getHeader(key: string) {
        return this.headers[key.toLowerCase()]?.toString();
    }

    /**
     * Returns all values of the header in the order they were received.
     * Values are not split by comma, so values such as user-agent stay intact.
     */
    getHeaderArray(key: string): string[] {
        const value = this.headers[key.toLowerCase()];
        if (value === undefined) return [];
        return Array.isArray(value) ? value : [value];
    }

    deleteHeader(key: string) {
        delete this.headers[key.toLowerCase()];
    }

    /**
     * Captures read-only view of the request.
     * The host header is carried in the host field and is not repeated in the headers.
     */
    toSnapshot(): RequestSnapshot {
        const headers: Record<string, string[]> = {};
        for (const key of Object.keys(this.headers)) {
            if (key === HEADERS.Host) continue;
            headers[key] = [...this.getHeaderArray(key)];
        }

        return {
            method: this.method,
            path: this.path,
            rawQueryString: this.rawQueryString,
            host: this.host,
            headers,
            remoteAddress: this.remoteAddress,
            protocol: `HTTP/${this.httpVersion}`,
        };
    }

    /**
     * Creates the request from the Node.js incoming message.
     * The body is never read, the stream stays untouched.
     */
    static fromNodeRequest(nodeRequest: http.IncomingMessage): Request {
        const target = parseRequestTarget(nodeRequest.url || '/');
        const request = new Request();
        request.path = target.path;
        request.rawQueryString = target.rawQueryString;

        // Keep repeated headers as separate values in their original order
        for (const [key, values] of Object.entries(nodeRequest.headersDistinct)) {
            if (!values || values.length === 0) continue;
            request.headers[key.toLowerCase()] = values.length === 1 ? values[0] : values;
        }

        // The host from absolute-form target (proxy requests) takes precedence over the host header
        request.host = target.host || request.getHeader(HEADERS.Host) || '';
        request.httpVersion = nodeRequest.httpVersion || '1.1';
        request.method = nodeRequest.method || 'GET';
        request.remoteAddress = joinHostPort(nodeRequest.socket.remoteAddress || '', nodeRequest.socket.remotePort);

        return request;
    }
}
