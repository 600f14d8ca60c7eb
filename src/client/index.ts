export { LazyHttpClient, withClient } from './client.js';
export { RequestBuilder, newRequest, isAbsoluteUrl } from './request.js';
export type { RequestOptions } from './request.js';
export type { PreRequestHook, PostResponseHook, DoOptions } from './types.js';
