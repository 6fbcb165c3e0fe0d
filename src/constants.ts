export const NAME = 'lambda-request-transformer';
export const VERSION = '1.0.0';

export const BRAND = 'Lambda Request Transformer';

// Default ports and upstream
// These can be overridden by ENV variables or by the CLI flags of the start command.
// e.g: LAMBDA_UPSTREAM_URL=http://127.0.0.1:9000 PORT=8080 npx lambda-request-transformer start
export const HOST = process.env.HOST || '0.0.0.0';
export const PORT = Number(process.env.PORT || 8080);
export const UPSTREAM_URL = process.env.LAMBDA_UPSTREAM_URL || 'http://127.0.0.1:9000';

// Default upstream timeout in seconds
export const DEFAULT_TIMEOUT = Number(process.env.LAMBDA_UPSTREAM_TIMEOUT || 30);

// The path of the Runtime Interface Emulator invocation endpoint.
// Every transformed request is sent to this path, regardless of the original one.
export const INVOCATION_PATH = '/2015-03-31/functions/function/invocations';

// Fixed values of the HTTP API v2.0 event envelope
export const EVENT_VERSION = '2.0';
export const EVENT_TYPE = 'REQUEST';
export const LOCAL_CONTEXT_ID = 'local';

export const HEADERS = {
    Host: 'host',
    UserAgent: 'user-agent',
    Connection: 'connection',
    KeepAlive: 'keep-alive',
    ContentType: 'content-type',
    ContentLength: 'content-length',
    TransferEncoding: 'transfer-encoding',

    // Custom headers
    XSessionId: 'x-session-id',
    XRequestId: 'x-request-id',
};

export const CONTENT_TYPES = {
    Json: 'application/json',
    Text: 'text/plain; charset=utf-8',
} as const;

export const STATUS_CODES = {
    StatusInternalServerError: 500,
    StatusBadGateway: 502,
    StatusGatewayTimeout: 504,
} as const;
