export { ClientResponse } from './response.js';
export { decodeBytes, decodeText, decodeJson, decodeJsonAs } from './decode.js';
export type { DecodeOptions } from './decode.js';
