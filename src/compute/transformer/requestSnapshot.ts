/**
 * Read-only view of the inbound request,
 * captured before anything about the request is changed.
 */
export interface RequestSnapshot {
    readonly method: string;
    readonly path: string;
    readonly rawQueryString: string;
    /** Value of the host header, may include the port suffix. e.g. api.example.com:8443 */
    readonly host: string;
    /** Multi-valued headers. Values of one name keep the order they were received in. */
    readonly headers: Readonly<Record<string, readonly string[] | undefined>>;
    /** Usually host:port, but any opaque value is accepted. */
    readonly remoteAddress: string;
    /** e.g. HTTP/1.1 */
    readonly protocol: string;
}
