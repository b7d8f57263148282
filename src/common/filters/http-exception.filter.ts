import { ArgumentsHost, Catch, ExceptionFilter, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { HttpExceptionResponse } from '../interfaces/http-exception.interface';
import { isRecord, readString } from '../utils/record.util';

// Renders every error as HttpExceptionResponse.
// Unknown errors are logged and reported as a plain 500.
@Catch()
export class HttpExceptionFilter implements ExceptionFilter {
  private readonly logger = new Logger(HttpExceptionFilter.name);

  catch(exception: unknown, host: ArgumentsHost): void {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const body = this.buildResponse(exception, request.url);
    response.status(body.statusCode).json(body);
  }

  buildResponse(exception: unknown, path: string): HttpExceptionResponse {
    const timestamp = new Date().toISOString();

    if (exception instanceof HttpException) {
      const statusCode = exception.getStatus();
      const payload = exception.getResponse();

      if (typeof payload === 'string') {
        return { statusCode, message: payload, timestamp, path };
      }

      return {
        statusCode,
        message: this.readMessage(payload) ?? exception.message,
        error: isRecord(payload) ? readString(payload, 'error') : undefined,
        timestamp,
        path,
      };
    }

    const stack = exception instanceof Error ? exception.stack : String(exception);
    this.logger.error(`Unhandled error on ${path}`, stack);

    return {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: 'Internal server error',
      error: 'Internal Server Error',
      timestamp,
      path,
    };
  }

  // ValidationPipe puts a string[] of constraint messages here
  private readMessage(payload: object): string | string[] | undefined {
    if (!isRecord(payload)) {
      return undefined;
    }
    const { message } = payload;
    if (typeof message === 'string') {
      return message;
    }
    if (Array.isArray(message) && message.every((item): item is string => typeof item === 'string')) {
      return message;
    }
    return undefined;
  }
}
