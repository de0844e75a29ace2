import { HttpStatus } from '@nestjs/common';
import { AppError } from '@common/errors/app-error';
import { DispatchFailure } from '@modules/dispatch/types/dispatch-result';
import { ContentSource } from '../types/content-response';

export class ContentUnavailableAppError extends AppError {
  public readonly code = 'ERR_CONTENT_UNAVAILABLE';

  constructor(
    public readonly source: ContentSource,
    public readonly target: string,
    public readonly failure: DispatchFailure,
  ) {
    super(`Content ${source} failed: ${failure.message}`);
  }

  // eslint-disable-next-line class-methods-use-this
  public httpStatus(): HttpStatus {
    return HttpStatus.BAD_GATEWAY;
  }

  public payload(): object {
    const { lastError } = this.failure;
    return {
      source: this.source,
      target: this.target,
      errorKind: this.failure.errorKind,
      attempts: this.failure.attempts,
      statusCode: this.failure.statusCode,
      lastError: lastError
        ? { code: lastError.code, message: lastError.message }
        : null,
    };
  }
}
