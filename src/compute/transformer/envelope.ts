import { EVENT_TYPE, EVENT_VERSION, HEADERS, LOCAL_CONTEXT_ID } from '../../constants.js';
import { generateRequestId, GenerateRequestIdOptions } from '../../utils/idUtils.js';
import { captureTimestamp } from '../../utils/timeUtils.js';
import { resolveClientIp } from './clientAddress.js';
import { splitDomain } from './domain.js';
import { foldHeaders, getFirstHeaderValue } from './headers.js';
import { InvocationEvent } from './invocationEvent.js';
import { RequestSnapshot } from './requestSnapshot.js';

export interface BuildInvocationEventOptions extends GenerateRequestIdOptions {
    clock?: () => Date;
}

/**
 * Assembles the invocation event from the request snapshot.
 * The request ID and the current time are the only values that are not derived from the snapshot,
 * both are generated exactly once per call.
 */
export function buildInvocationEvent(snapshot: RequestSnapshot, options: BuildInvocationEventOptions = {}): InvocationEvent {
    const { method, path, rawQueryString, host, headers, remoteAddress, protocol } = snapshot;
    const routeKey = `${method} ${path}`;
    const { domainName, domainPrefix } = splitDomain(host);
    const { time, timeEpoch } = captureTimestamp(options.clock?.());
    const sessionId = getFirstHeaderValue(headers, HEADERS.XSessionId);

    return {
        version: EVENT_VERSION,
        type: EVENT_TYPE,
        routeKey,
        rawPath: path,
        rawQueryString,
        headers: foldHeaders(headers),
        requestContext: {
            accountId: LOCAL_CONTEXT_ID,
            apiId: LOCAL_CONTEXT_ID,
            domainName,
            domainPrefix,
            http: {
                method,
                path,
                protocol,
                sourceIp: resolveClientIp(remoteAddress),
                userAgent: getFirstHeaderValue(headers, HEADERS.UserAgent),
            },
            requestId: generateRequestId(options),
            routeKey,
            stage: LOCAL_CONTEXT_ID,
            time,
            timeEpoch,
        },
        body: '',
        isBase64Encoded: false,
        identitySource: sessionId ? [sessionId] : [],
    };
}
