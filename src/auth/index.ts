export { BasicAuthenticator, BearerAuthenticator, authenticatorFn, basicAuthHeader } from './authenticator.js';
export type { Authenticator } from './authenticator.js';
