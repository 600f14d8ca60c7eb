export {
  createMockTransport,
  httpResponse,
  mockStatusSequence,
  mockHangingTransport,
} from './transport.mock.js';
export type { MockTransport, SendFn } from './transport.mock.js';
export { ManualTicker } from './ticker.mock.js';
