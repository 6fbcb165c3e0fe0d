import { CONTENT_TYPES, HEADERS, INVOCATION_PATH } from '../../constants.js';
import { EnvelopeSerializationError } from '../errors/envelopeSerializationError.js';
import { InvocationEvent } from './invocationEvent.js';
import { OutboundRequest } from './outboundRequest.js';

export type EventSerializer = (event: InvocationEvent) => string | undefined;

const defaultSerializer: EventSerializer = (event) => JSON.stringify(event);

/**
 * Serializes the event into compact JSON.
 * Throws EnvelopeSerializationError if the serializer fails or doesn't return a string,
 * so no partial body is ever forwarded.
 */
export function serializeInvocationEvent(event: InvocationEvent, serialize: EventSerializer = defaultSerializer): string {
    let serialized: string | undefined;
    try {
        serialized = serialize(event);
    } catch (e) {
        throw new EnvelopeSerializationError(e instanceof Error ? e.message : String(e), { cause: e });
    }
    if (typeof serialized !== 'string') {
        throw new EnvelopeSerializationError('the event has no JSON representation');
    }
    return serialized;
}

/**
 * Builds the POST request for the invocation endpoint
 * that carries the serialized event as its body.
 * All other inbound headers are kept, chunked transfer is removed.
 */
export function rewriteRequest(headers: Readonly<Record<string, string | string[]>>, serializedEvent: string): OutboundRequest {
    const body = Buffer.from(serializedEvent, 'utf-8');
    const outboundHeaders: Record<string, string | string[]> = {};
    for (const [key, value] of Object.entries(headers)) {
        const lowerKey = key.toLowerCase();
        if (lowerKey === HEADERS.TransferEncoding || lowerKey === HEADERS.ContentType || lowerKey === HEADERS.ContentLength) continue;
        outboundHeaders[lowerKey] = value;
    }
    outboundHeaders[HEADERS.ContentType] = CONTENT_TYPES.Json;
    outboundHeaders[HEADERS.ContentLength] = body.length.toString();

    return {
        method: 'POST',
        path: INVOCATION_PATH,
        headers: outboundHeaders,
        body,
    };
}
