/**
 * Retry orchestrator
 *
 * Drives one logical request through Executing → Evaluating → Waiting → …
 * until Done:
 *
 * - Executing: one exchange through the transport
 * - Evaluating: the predicate decides whether the outcome is final
 * - Waiting: the backoff wait, raced against cancellation
 *
 * The same prepared request is re-sent on every attempt.
 */

import { cancellationReason, sleep } from '../cancellation/index.js';
import {
  ContextCancelledDuringRetryError,
  RetryExhaustedError,
  TransportError,
} from '../errors/index.js';
import { NoopLogger, logRetry, type Logger } from '../observability/logging.js';
import type { HttpRequest, HttpResponse, Transport } from '../transport/types.js';
import { NoopBackoff } from './backoff.js';
import type { AttemptOutcome, BackoffPolicy, RetryPredicate } from './types.js';

export interface RetryOrchestratorOptions {
  /** Absent means no outcome is ever retried */
  predicate?: RetryPredicate;

  /** Policy owned by this request alone */
  backoff?: BackoffPolicy;

  logger?: Logger;
}

export interface RetryResult {
  response: HttpResponse;

  /** Number of executions, the first included */
  attempts: number;
}

export class RetryOrchestrator {
  private readonly predicate?: RetryPredicate;
  private readonly backoff: BackoffPolicy;
  private readonly logger: Logger;

  constructor(options: RetryOrchestratorOptions = {}) {
    this.predicate = options.predicate;
    this.backoff = options.backoff ?? new NoopBackoff();
    this.logger = options.logger ?? new NoopLogger();
  }

  /**
   * Execute `request` until the predicate accepts the outcome, the backoff
   * gives up or `signal` aborts.
   *
   * @throws RetryExhaustedError when the backoff refuses a retry the predicate asked for
   * @throws ContextCancelledDuringRetryError when `signal` aborts during a backoff wait
   * @throws CancelledError or DeadlineExceededError when `signal` aborts before or during an execution
   * @throws TransportError when the final outcome is a transport failure
   */
  async run(request: HttpRequest, transport: Transport, signal: AbortSignal): Promise<RetryResult> {
    let attempt = 0;

    for (;;) {
      if (signal.aborted) {
        throw cancellationReason(signal);
      }

      attempt++;
      const outcome = await this.execute(request, transport, signal, attempt);

      if (!this.predicate || !this.predicate(outcome)) {
        if (outcome.ok) {
          return { response: outcome.response, attempts: attempt };
        }
        throw outcome.error;
      }

      const step = this.backoff.next();
      if (!step.retry) {
        throw new RetryExhaustedError(
          attempt,
          outcome.ok ? { status: outcome.response.status } : { cause: outcome.error }
        );
      }

      logRetry(this.logger, {
        method: request.method,
        url: request.url,
        attempt,
        delayMs: step.delayMs,
        status: outcome.ok ? outcome.response.status : undefined,
        error: outcome.ok ? undefined : outcome.error.message,
      });

      try {
        await sleep(step.delayMs, signal);
      } catch (error) {
        throw new ContextCancelledDuringRetryError(attempt, error);
      }
    }
  }

  private async execute(
    request: HttpRequest,
    transport: Transport,
    signal: AbortSignal,
    attempt: number
  ): Promise<AttemptOutcome> {
    try {
      const response = await transport.send(request, signal);
      return { ok: true, response, attempt };
    } catch (error) {
      if (signal.aborted) {
        throw cancellationReason(signal);
      }
      const failure = error instanceof TransportError ? error : new TransportError(error, request);
      return { ok: false, error: failure, attempt };
    }
  }
}
