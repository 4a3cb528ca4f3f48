import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SleeperPort } from "../../core/ports/outboundPorts";

export type RetryOptions = {
  attempts: number;
  baseDelayMs: number;
};

/**
 * Retries retryable boundary errors with exponential backoff; the last error is returned on exhaustion.
 */
export class RetryPolicy {
  constructor(
    private readonly options: RetryOptions,
    private readonly sleeper: SleeperPort,
  ) {}

  async execute<T>(
    operation: () => Promise<Result<T, AppBoundaryError>>,
  ): Promise<Result<T, AppBoundaryError>> {
    let result = await operation();

    for (
      let attempt = 1;
      attempt < this.options.attempts && result.isErr() && result.error.retryable;
      attempt += 1
    ) {
      await this.sleeper.sleep(this.options.baseDelayMs * 2 ** (attempt - 1));
      result = await operation();
    }

    return result;
  }
}
