import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpException,
  HttpStatus,
  Injectable,
  Logger,
} from '@nestjs/common';
import { Request, Response } from 'express';
import { AppError } from '@common/errors/app-error';
import { singleLineMessage } from '@common/errors/single-line-message';

export const AVAILABLE_ENDPOINTS = [
  '/',
  '/search',
  '/read',
  '/health',
  '/stats',
];

export interface ApiFailure {
  readonly success: false;
  readonly error: string;
  readonly code?: string;
  readonly payload?: object;
  readonly availableEndpoints?: string[];
  readonly timestamp: string;
}

function display(request: Request): string {
  return `${request.method} ${request.path}`;
}

/**
 * Renders everything a handler throws as a `{ success: false }` body
 */
@Catch()
@Injectable()
export class ApiExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(ApiExceptionFilter.name);

  catch(thrown: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const timestamp = new Date().toISOString();

    if (thrown instanceof AppError) {
      if (thrown.shouldBeLogged()) {
        this.logger.warn(
          `${display(request)} failed with ${thrown.code}: ${thrown.devMessage()}`,
        );
      }
      const body: ApiFailure = {
        success: false,
        code: thrown.code,
        error: thrown.message,
        payload: thrown.payload(),
        timestamp,
      };
      response.status(thrown.httpStatus()).json(body);
      return;
    }

    if (thrown instanceof HttpException) {
      const status = thrown.getStatus();
      const notFound = status === HttpStatus.NOT_FOUND;
      // 404s come from scanners; not worth a log line
      if (!notFound) {
        this.logger.error(`HTTP ${status} on ${display(request)}: ${thrown.message}`);
      }
      const body: ApiFailure = notFound
        ? {
            success: false,
            error: 'Endpoint not found',
            availableEndpoints: AVAILABLE_ENDPOINTS,
            timestamp,
          }
        : { success: false, error: thrown.message, timestamp };
      response.status(status).json(body);
      return;
    }

    const reason =
      thrown instanceof Error ? singleLineMessage(thrown) : JSON.stringify(thrown);
    this.logger.error(`Unexpected error on ${display(request)}: ${reason}`);

    const body: ApiFailure = {
      success: false,
      error: 'Internal server error',
      timestamp,
    };
    response.status(HttpStatus.INTERNAL_SERVER_ERROR).json(body);
  }
}
