import { vi, type Mock } from 'vitest';
import type { HttpRequest, HttpResponse, Transport } from '../transport/types.js';

export type SendFn = (request: HttpRequest, signal: AbortSignal) => Promise<HttpResponse>;

export interface MockTransport extends Transport {
  send: Mock<SendFn>;
}

export function createMockTransport(): MockTransport {
  return {
    send: vi.fn<SendFn>(),
  };
}

/**
 * Build a raw response. Objects are serialized as JSON.
 */
export function httpResponse(
  status: number,
  body: string | object = '',
  headers: Record<string, string> = {}
): HttpResponse {
  const text = typeof body === 'string' ? body : JSON.stringify(body);
  return {
    status,
    headers: typeof body === 'string' ? headers : { 'content-type': 'application/json', ...headers },
    body: new TextEncoder().encode(text),
  };
}

/**
 * Answer with the given statuses in order; the last one repeats.
 */
export function mockStatusSequence(transport: MockTransport, statuses: number[]): void {
  let call = 0;
  transport.send.mockImplementation(async () => {
    const status = statuses[Math.min(call, statuses.length - 1)] ?? 200;
    call++;
    return httpResponse(status);
  });
}

/**
 * Never answer; reject with the abort reason once the signal aborts.
 */
export function mockHangingTransport(transport: MockTransport): void {
  transport.send.mockImplementation(
    (_request, signal) =>
      new Promise<HttpResponse>((_resolve, reject) => {
        if (signal.aborted) {
          reject(new Error('aborted before send'));
          return;
        }
        signal.addEventListener('abort', () => reject(new Error('socket aborted')), { once: true });
      })
  );
}
