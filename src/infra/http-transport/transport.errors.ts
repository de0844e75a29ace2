import { HttpStatus } from '@nestjs/common';
import { AppError } from '@common/errors/app-error';

export type AttemptErrorKind =
  | 'AttemptTimeout'
  | 'AttemptConnectionError'
  | 'AttemptNonSuccessStatus';

/**
 * A single outbound attempt that did not produce HTTP 200
 */
export abstract class AttemptError extends AppError {
  public abstract readonly kind: AttemptErrorKind;

  // eslint-disable-next-line class-methods-use-this
  public httpStatus(): HttpStatus {
    return HttpStatus.BAD_GATEWAY;
  }
}

export class AttemptTimeoutError extends AttemptError {
  public readonly code = 'ERR_ATTEMPT_TIMEOUT';

  public readonly kind = 'AttemptTimeout';

  constructor(public readonly timeoutMs: number) {
    super(`No response within ${timeoutMs}ms`);
  }
}

export class AttemptConnectionError extends AttemptError {
  public readonly code = 'ERR_ATTEMPT_CONNECTION';

  public readonly kind = 'AttemptConnectionError';

  constructor(reason: string) {
    super(`Connection failed: ${reason}`);
  }
}

export class AttemptNonSuccessStatusError extends AttemptError {
  public readonly code = 'ERR_ATTEMPT_STATUS';

  public readonly kind = 'AttemptNonSuccessStatus';

  constructor(public readonly statusCode: number) {
    super(`Unexpected HTTP status ${statusCode}`);
  }
}

export class AttemptCancelledError extends AppError {
  public readonly code = 'ERR_ATTEMPT_CANCELLED';

  constructor() {
    super('Attempt cancelled');
  }
}
