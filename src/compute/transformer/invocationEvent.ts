/**
 * The HTTP API v2.0 event envelope
 * that the function invocation endpoint expects in the body.
 * @example
 * {
 *   "version": "2.0",
 *   "type": "REQUEST",
 *   "routeKey": "GET /users",
 *   "rawPath": "/users",
 *   "rawQueryString": "page=2",
 *   "headers": { "accept": "application/json" },
 *   "requestContext": { ... },
 *   "body": "",
 *   "isBase64Encoded": false,
 *   "identitySource": []
 * }
 */
export interface InvocationEvent {
    version: '2.0';
    type: 'REQUEST';
    routeKey: string;
    rawPath: string;
    rawQueryString: string;
    headers: Record<string, string>;
    requestContext: InvocationEventRequestContext;
    body: '';
    isBase64Encoded: false;
    identitySource: string[];
}

export interface InvocationEventRequestContext {
    accountId: string;
    apiId: string;
    domainName: string;
    domainPrefix: string;
    http: InvocationEventHttp;
    requestId: string;
    routeKey: string;
    stage: string;
    time: string;
    timeEpoch: number;
}

export interface InvocationEventHttp {
    method: string;
    path: string;
    protocol: string;
    sourceIp: string;
    userAgent: string;
}
