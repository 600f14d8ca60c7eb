export { UndiciTransport, DEFAULT_TRANSPORT_TIMEOUT_MS } from './undici-transport.js';
export type { UndiciTransportOptions } from './undici-transport.js';
export { HTTP_METHODS } from './types.js';
export type { HttpMethod, HttpRequest, HttpResponse, Transport } from './types.js';
