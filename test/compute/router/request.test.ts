import http from 'http';
import { Socket } from 'net';
import { parseRequestTarget, Request } from '../../../src/compute/router/request.js';
import { buildInvocationEvent } from '../../../src/compute/transformer/envelope.js';

interface NodeRequestOptions {
    method?: string;
    url?: string;
    httpVersion?: string;
    headers?: Record<string, string[]>;
    remoteAddress?: string;
    remotePort?: number;
}

function createNodeRequest(options: NodeRequestOptions = {}): http.IncomingMessage {
    const socket = new Socket();
    Object.defineProperty(socket, 'remoteAddress', { value: options.remoteAddress });
    Object.defineProperty(socket, 'remotePort', { value: options.remotePort });

    const nodeRequest = new http.IncomingMessage(socket);
    nodeRequest.method = options.method ?? 'GET';
    nodeRequest.url = options.url ?? '/';
    nodeRequest.httpVersion = options.httpVersion ?? '1.1';
    Object.defineProperty(nodeRequest, 'headersDistinct', { value: options.headers ?? {} });
    return nodeRequest;
}

describe('Request', () => {
    describe('initialization', () => {
        it('should initialize with defaults', () => {
            const request = new Request();

            expect(request.method).toBe('GET');
            expect(request.host).toBe('localhost');
            expect(request.path).toBe('/');
            expect(request.rawQueryString).toBe('');
            expect(request.headers).toEqual({});
        });

        it('should take host, path and query from URL', () => {
            const request = new Request('https://app.example.com:8443/api/v1/data?id=123&category=books', { method: 'POST' });

            expect(request.host).toBe('app.example.com:8443');
            expect(request.path).toBe('/api/v1/data');
            expect(request.rawQueryString).toBe('id=123&category=books');
            expect(request.method).toBe('POST');
        });

        it('should keep the path encoded', () => {
            const request = new Request('http://example.com/files/a%20b.txt');
            expect(request.path).toBe('/files/a%20b.txt');
        });

        it('should normalize header names to lowercase', () => {
            const request = new Request('http://example.com', {
                headers: {
                    'Content-Type': 'application/json',
                    'X-Tag': ['a', 'b'],
                },
            });

            expect(request.headers).toEqual({ 'content-type': 'application/json', 'x-tag': ['a', 'b'] });
            expect(request.getHeader('CONTENT-TYPE')).toBe('application/json');
        });
    });

    describe('headers', () => {
        it('should add values to existing header', () => {
            const request = new Request('http://example.com', { headers: { 'x-tag': 'a' } });
            request.addHeader('X-Tag', ['b', 'c']);

            expect(request.getHeaderArray('x-tag')).toEqual(['a', 'b', 'c']);
            expect(request.getHeader('x-tag')).toBe('a,b,c');
        });

        it('should not split single value by comma', () => {
            const request = new Request('http://example.com', { headers: { 'user-agent': 'Mozilla/5.0 (KHTML, like Gecko)' } });
            expect(request.getHeaderArray('user-agent')).toEqual(['Mozilla/5.0 (KHTML, like Gecko)']);
        });

        it('should delete header', () => {
            const request = new Request('http://example.com', { headers: { accept: '*/*' } });
            request.deleteHeader('Accept');
            expect(request.getHeader('accept')).toBeUndefined();
            expect(request.getHeaderArray('accept')).toEqual([]);
        });
    });

    describe('toSnapshot', () => {
        it('should capture the request facts', () => {
            const request = new Request('http://api.example.com/orders?status=open', {
                method: 'PATCH',
                remoteAddress: '198.51.100.4:40000',
                httpVersion: '2.0',
                headers: { host: 'api.example.com', accept: 'application/json', 'x-tag': ['a', 'b'] },
            });

            expect(request.toSnapshot()).toEqual({
                method: 'PATCH',
                path: '/orders',
                rawQueryString: 'status=open',
                host: 'api.example.com',
                headers: {
                    accept: ['application/json'],
                    'x-tag': ['a', 'b'],
                },
                remoteAddress: '198.51.100.4:40000',
                protocol: 'HTTP/2.0',
            });
        });

        it('should not be affected by later changes of the request', () => {
            const request = new Request('http://example.com/a', { headers: { 'x-tag': ['a'] } });
            const snapshot = request.toSnapshot();
            request.addHeader('x-tag', 'b');
            request.method = 'POST';

            expect(snapshot.headers['x-tag']).toEqual(['a']);
            expect(snapshot.method).toBe('GET');
        });
    });

    describe('fromNodeRequest', () => {
        it('should create the request from the node request', () => {
            const request = Request.fromNodeRequest(
                createNodeRequest({
                    method: 'PUT',
                    url: '/items/7?draft=1',
                    headers: {
                        host: ['shop.example.com:3000'],
                        'x-tag': ['a', 'b', 'c'],
                        'user-agent': ['test-agent/1.0'],
                    },
                    remoteAddress: '192.0.2.10',
                    remotePort: 52000,
                }),
            );

            expect(request.method).toBe('PUT');
            expect(request.path).toBe('/items/7');
            expect(request.rawQueryString).toBe('draft=1');
            expect(request.host).toBe('shop.example.com:3000');
            expect(request.remoteAddress).toBe('192.0.2.10:52000');
            expect(request.getHeaderArray('x-tag')).toEqual(['a', 'b', 'c']);
            expect(request.getHeader('user-agent')).toBe('test-agent/1.0');
            expect(request.toSnapshot().protocol).toBe('HTTP/1.1');
        });

        it('should wrap IPv6 remote address into brackets', () => {
            const request = Request.fromNodeRequest(createNodeRequest({ remoteAddress: '::1', remotePort: 8080 }));
            expect(request.remoteAddress).toBe('[::1]:8080');
        });

        it('should use host from absolute-form target', () => {
            const request = Request.fromNodeRequest(
                createNodeRequest({
                    url: 'http://proxy.example.com:8080/status?full=true',
                    headers: { host: ['other.example.com'] },
                }),
            );

            expect(request.host).toBe('proxy.example.com:8080');
            expect(request.path).toBe('/status');
            expect(request.rawQueryString).toBe('full=true');
        });

        it('should use empty host and remote address when they are missing', () => {
            const request = Request.fromNodeRequest(createNodeRequest({ url: '/health' }));

            expect(request.host).toBe('');
            expect(request.remoteAddress).toBe('');
            expect(request.path).toBe('/health');
        });

        it('should keep dot segments in the path', () => {
            const request = Request.fromNodeRequest(createNodeRequest({ url: '/a/../b' }));
            const event = buildInvocationEvent(request.toSnapshot());

            expect(event.rawPath).toBe('/a/../b');
            expect(event.routeKey).toBe('GET /a/../b');
            expect(event.requestContext.http.path).toBe('/a/../b');
            expect(Request.fromNodeRequest(createNodeRequest({ url: '/a/./b' })).path).toBe('/a/./b');
        });

        it('should keep path and query characters unencoded', () => {
            expect(Request.fromNodeRequest(createNodeRequest({ url: '/p/{id}' })).path).toBe('/p/{id}');
            expect(Request.fromNodeRequest(createNodeRequest({ url: "/s?q='x'" })).rawQueryString).toBe("q='x'");
            expect(Request.fromNodeRequest(createNodeRequest({ url: '/s?q="x"' })).rawQueryString).toBe('q="x"');
        });

        it('should not read the body', () => {
            const nodeRequest = createNodeRequest({ method: 'POST', url: '/upload' });
            Request.fromNodeRequest(nodeRequest);
            expect(nodeRequest.readableDidRead).toBe(false);
        });
    });

    describe('parseRequestTarget', () => {
        it('should split origin-form target at the first question mark', () => {
            expect(parseRequestTarget('/search?q=a?b&x=1')).toEqual({ host: undefined, path: '/search', rawQueryString: 'q=a?b&x=1' });
        });

        it('should strip only scheme and authority of absolute-form target', () => {
            expect(parseRequestTarget('http://proxy.example.com:8080/a/../b?q=%7B')).toEqual({
                host: 'proxy.example.com:8080',
                path: '/a/../b',
                rawQueryString: 'q=%7B',
            });
        });

        it('should return empty path for absolute-form target without path', () => {
            expect(parseRequestTarget('http://proxy.example.com?x=1')).toEqual({ host: 'proxy.example.com', path: '', rawQueryString: 'x=1' });
        });

        it('should keep asterisk-form target as the path', () => {
            expect(parseRequestTarget('*')).toEqual({ host: undefined, path: '*', rawQueryString: '' });
        });
    });
});
