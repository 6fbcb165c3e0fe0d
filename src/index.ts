export * from './logger.js';
export * from './constants.js';
export { CliError } from './cliError.js';
export { Request } from './compute/router/request.js';
export { Response } from './compute/router/response.js';
export { LambdaRequestTransformer, createConfig } from './compute/transformer/transformer.js';
export type { TransformerConfig, TransformerOptions } from './compute/transformer/transformer.js';
export { buildInvocationEvent } from './compute/transformer/envelope.js';
export { serializeInvocationEvent, rewriteRequest } from './compute/transformer/rewriter.js';
export { foldHeaders } from './compute/transformer/headers.js';
export { splitHostPort, resolveClientIp } from './compute/transformer/clientAddress.js';
export { splitDomain } from './compute/transformer/domain.js';
export type { InvocationEvent } from './compute/transformer/invocationEvent.js';
export type { RequestSnapshot } from './compute/transformer/requestSnapshot.js';
export type { OutboundRequest } from './compute/transformer/outboundRequest.js';
export type { Forwarder } from './compute/forwarder/forwarder.js';
export { HttpForwarder } from './compute/forwarder/httpForwarder.js';
export { createProxyServer } from './compute/server/server.js';
export { generateRequestId } from './utils/idUtils.js';
export { captureTimestamp } from './utils/timeUtils.js';
export { TransformerError } from './compute/errors/transformerError.js';
export { EnvelopeSerializationError } from './compute/errors/envelopeSerializationError.js';
export { ForwardError } from './compute/errors/forwardError.js';
export { UpstreamTimeoutError } from './compute/errors/upstreamTimeoutError.js';
