/**
 * The request that is handed to the forwarder.
 * It's a new value built from the inbound request, the inbound request itself is never changed.
 */
export interface OutboundRequest {
    readonly method: 'POST';
    readonly path: string;
    readonly headers: Readonly<Record<string, string | string[]>>;
    readonly body: Buffer;
}
