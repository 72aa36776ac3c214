import { ExceptionFilter, Catch, ArgumentsHost, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { ConfigService } from '@nestjs/config';

export interface ErrorResponseBody {
  success: false;
  statusCode: number;
  message: string;
  path: string;
  timestamp: string;
}

/**
 * Global exception filter for standardized error responses
 * Catches everything a handler throws: HttpExceptions keep their status,
 * anything else becomes a 500 without leaking internals
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
  private readonly logger = new Logger(AllExceptionsFilter.name);

  constructor(private configService: ConfigService) {}

  /**
   * Catches and processes exceptions
   * @param exception - Whatever the handler threw
   * @param host - ArgumentsHost for accessing request/response context
   */
  catch(exception: unknown, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const response = ctx.getResponse<Response>();
    const request = ctx.getRequest<Request>();

    const status = exception instanceof HttpException ? exception.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
    const message = this.messageOf(exception);

    const isDevelopment = this.configService.get<string>('app.environment') === 'development';
    const stack = exception instanceof Error ? exception.stack : undefined;

    // Server errors always carry their stack; client errors only in development
    if (status >= HttpStatus.INTERNAL_SERVER_ERROR || isDevelopment) {
      this.logger.error(`${request.method} ${request.url} failed: ${this.describe(exception)}`, stack);
    } else {
      this.logger.warn(`${request.method} ${request.url} rejected with ${status}: ${message}`);
    }

    const body: ErrorResponseBody = {
      success: false,
      statusCode: status,
      message,
      path: request.url,
      timestamp: new Date().toISOString(),
    };
    response.status(status).json(body);
  }

  private messageOf(exception: unknown): string {
    if (!(exception instanceof HttpException)) {
      return 'Internal server error';
    }

    // Structured responses (e.g. from ValidationPipe) carry the useful message
    const exceptionResponse = exception.getResponse();
    if (typeof exceptionResponse === 'object' && exceptionResponse !== null && 'message' in exceptionResponse) {
      const { message } = exceptionResponse;
      if (typeof message === 'string') {
        return message;
      }
      if (Array.isArray(message)) {
        return message.join(', ');
      }
    }
    return exception.message;
  }

  private describe(exception: unknown): string {
    return exception instanceof Error ? exception.message : String(exception);
  }
}
