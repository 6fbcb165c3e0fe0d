import http from 'http';

export type OnWriteHeadCallback = (statusCode: number, headers: Record<string, string | string[]>) => void;
export type OnWriteCallback = (chunk: string | Buffer) => void;
export type OnEndCallback = () => void;

export interface ResponseOptions {
    statusCode?: number;
    headers?: Record<string, string | string[]>;
    onWriteHead?: OnWriteHeadCallback;
    onWrite?: OnWriteCallback;
    onEnd?: OnEndCallback;
}

/**
 * The response that is sent back to the original caller.
 * Without callbacks, it buffers the whole body in memory.
 * With callbacks, the head and every chunk are passed through as soon as they are written.
 */
export class Response {
    statusCode: number;
    headers: Record<string, string | string[]> = {};
    chunks: Array<string | Buffer> = [];
    headersSent: boolean = false;
    ended: boolean = false;
    startTime: number = Date.now();

    protected onWriteHead?: OnWriteHeadCallback;
    protected onWrite?: OnWriteCallback;
    protected onEnd?: OnEndCallback;

    constructor(body: string | Buffer | undefined | null = undefined, options: ResponseOptions = {}) {
        this.statusCode = options.statusCode ?? 200;
        this.chunks = body ? [body] : [];
        this.setHeaders(options.headers ?? {});

        this.onWriteHead = options.onWriteHead;
        this.onWrite = options.onWrite;
        this.onEnd = options.onEnd;
    }

    setHeader(key: string, value: string | string[]) {
        this.headers[key.toLowerCase()] = value;
    }

    addHeader(key: string, value: string | string[]) {
        key = key.toLowerCase();
        const existing = this.headers[key];
        const existingValues = existing === undefined ? [] : Array.isArray(existing) ? existing : [existing];
        this.headers[key] = [...existingValues, ...(Array.isArray(value) ? value : [value])];
    }

    setHeaders(headers: Record<string, string | string[]>): void {
        for (const [key, value] of Object.entries(headers)) {
            this.setHeader(key, value);
        }
    }

    getHeader(key: string) {
        return this.headers[key.toLowerCase()]?.toString();
    }

    deleteHeader(key: string): void {
        delete this.headers[key.toLowerCase()];
    }

    get body(): Buffer {
        return Buffer.concat(this.chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk) : chunk)));
    }

    get duration(): number {
        return Date.now() - this.startTime;
    }

    writeHead(statusCode?: number, headers?: Record<string, string | string[]>): void {
        if (this.headersSent) return;
        this.headersSent = true;
        if (statusCode) this.statusCode = statusCode;
        if (headers) this.setHeaders(headers);
        this.onWriteHead?.(this.statusCode, this.headers);

        // Flush everything that was buffered before the head was written
        if (this.onWrite) {
            for (const chunk of this.chunks) this.onWrite(chunk);
            this.chunks = [];
        }
    }

    write(chunk: string | Buffer): void {
        if (this.ended) return;
        if (this.onWrite && this.headersSent) {
            this.onWrite(chunk);
            return;
        }
        this.chunks.push(chunk);
    }

    end(chunk?: string | Buffer): void {
        if (this.ended) return;
        if (chunk) this.write(chunk);
        this.writeHead();
        this.ended = true;
        this.onEnd?.();
    }

    /**
     * Creates a response that streams everything
     * directly into the given Node.js server response.
     */
    static fromNodeResponse(nodeResponse: http.ServerResponse): Response {
        return new Response(undefined, {
            onWriteHead: (statusCode, headers) => nodeResponse.writeHead(statusCode, headers),
            onWrite: (chunk) => nodeResponse.write(chunk),
            onEnd: () => nodeResponse.end(),
        });
    }

    /**
     * Writes the whole buffered response into the given Node.js server response.
     */
    toNodeResponse(nodeResponse: http.ServerResponse): void {
        const body = this.body;
        nodeResponse.writeHead(this.statusCode, { ...this.headers, 'content-length': body.length.toString() });
        nodeResponse.end(body);
    }
}
