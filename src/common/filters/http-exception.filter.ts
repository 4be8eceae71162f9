import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

// Nest exceptions carry either a bare message or { message, error, statusCode }.
function readPayload(exception: HttpException): Pick<HttpExceptionResponse, 'message' | 'error'> {
  const payload = exception.getResponse();
  if (typeof payload === 'string') {
    return { message: payload };
  }

  const fields: Map<string, unknown> = new Map(Object.entries(payload));
  const message = fields.get('message');
  const error = fields.get('error');
  return {
    message: typeof message === 'string' || isStringArray(message) ? message : exception.message,
    error: typeof error === 'string' ? error : undefined,
  };
}

/**
 * Uniform error body for every HttpException.
 * 4xx are logged as warnings, 5xx as errors.
 */
@Catch(HttpException)
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: HttpException, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();
    const statusCode = exception.getStatus();

    const body: HttpExceptionResponse = {
      statusCode,
      ...readPayload(exception),
      timestamp: new Date().toISOString(),
      path: request.url,
    };

    const summary = `${request.method} ${request.url} -> ${statusCode}: ${[body.message].flat().join('; ')}`;
    if (statusCode >= 500) {
      this.logger.error(summary, exception.stack);
    } else {
      this.logger.warn(summary);
    }

    response.status(statusCode).json(body);
  }
}
