import {
  applyDecorators,
  HttpCode,
  HttpStatus,
  Post,
  UseInterceptors,
  UsePipes,
  ValidationPipe,
} from '@nestjs/common';
import { ValidationFailedAppError } from '@common/errors/validation-failed.app-error';
import { RegisterErrorInterceptor } from '@common/errors/register-error.interceptor';

interface ApiEntryConfig {
  readonly path: string;
}

const Validator = new ValidationPipe({
  transform: true,
  exceptionFactory: (errors) => new ValidationFailedAppError(errors),
});

/**
 * # POST endpoint taking a validated JSON body
 */
export function ApiEntry(
  config: ApiEntryConfig,
): ReturnType<typeof applyDecorators> {
  return applyDecorators(
    Post(config.path),
    HttpCode(HttpStatus.OK),
    UseInterceptors(RegisterErrorInterceptor),
    UsePipes(Validator),
  );
}
