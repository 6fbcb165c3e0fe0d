export type SplitHostPortResult = { ok: true; host: string; port: string } | { ok: false; reason: string };

/**
 * Splits network address of the form host:port or [host]:port into host and port.
 * IPv6 literals need to be in square brackets, e.g. [::1]:8080.
 * Addresses without port, unbracketed IPv6 literals and malformed brackets
 * are reported as failed result, the function never throws.
 */
export function splitHostPort(address: string): SplitHostPortResult {
    const portSeparator = address.lastIndexOf(':');
    if (portSeparator === -1) {
        return { ok: false, reason: 'missing port in address' };
    }

    let host: string;
    let hostStart = 0;
    let portSearchStart = 0;

    if (address.startsWith('[')) {
        const closingBracket = address.indexOf(']');
        if (closingBracket === -1) {
            return { ok: false, reason: "missing ']' in address" };
        }
        if (closingBracket + 1 === address.length) {
            return { ok: false, reason: 'missing port in address' };
        }
        if (closingBracket + 1 !== portSeparator) {
            const reason = address[closingBracket + 1] === ':' ? 'too many colons in address' : 'missing port in address';
            return { ok: false, reason };
        }
        host = address.slice(1, closingBracket);
        hostStart = 1;
        portSearchStart = closingBracket + 1;
    } else {
        host = address.slice(0, portSeparator);
        if (host.includes(':')) {
            return { ok: false, reason: 'too many colons in address' };
        }
    }

    if (address.slice(hostStart).includes('[')) {
        return { ok: false, reason: "unexpected '[' in address" };
    }
    if (address.slice(portSearchStart).includes(']')) {
        return { ok: false, reason: "unexpected ']' in address" };
    }

    return { ok: true, host, port: address.slice(portSeparator + 1) };
}

/**
 * Returns the client IP from the remote address.
 * If the address cannot be split, it's returned unchanged.
 * @example
 * resolveClientIp('203.0.113.7:51234') => '203.0.113.7'
 * resolveClientIp('[::1]:8080') => '::1'
 * resolveClientIp('unix-socket') => 'unix-socket'
 */
export function resolveClientIp(remoteAddress: string): string {
    const result = splitHostPort(remoteAddress);
    return result.ok ? result.host : remoteAddress;
}

/**
 * Combines host and port into network address.
 * IPv6 literals are wrapped into square brackets.
 * @example
 * joinHostPort('::1', 8080) => '[::1]:8080'
 */
export function joinHostPort(host: string, port?: number | string): string {
    if (port === undefined || port === '') return host;
    return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
