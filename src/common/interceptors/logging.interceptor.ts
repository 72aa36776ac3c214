import { Injectable, NestInterceptor, ExecutionContext, CallHandler, HttpException, HttpStatus, Logger } from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap, catchError } from 'rxjs/operators';
import { Request, Response } from 'express';
import { MetricsService } from '../metrics/metrics.service';

/** Requests slower than this are logged at warn level */
const SLOW_REQUEST_MS = 2500;

/**
 * Global logging interceptor for HTTP requests and responses
 * Logs every request with a correlation id and its duration, and feeds the
 * http_server_requests_* metrics once the response is sent
 *
 * Features:
 * - Request correlation IDs for tracing (x-correlation-id)
 * - Slow request warnings
 * - Error logging with the failing status
 * - Route-pattern labels, so path parameters do not multiply series
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
  private readonly logger = new Logger(LoggingInterceptor.name);

  constructor(private readonly metricsService: MetricsService) {}

  /**
   * Intercepts HTTP requests to add logging and monitoring
   * @param context - Execution context containing request details
   * @param next - Call handler for continuing the request pipeline
   * @returns Observable stream with logging applied
   */
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const request = context.switchToHttp().getRequest<Request>();
    const response = context.switchToHttp().getResponse<Response>();
    const startTime = Date.now();

    const { method, url } = request;
    const correlationId = this.correlationIdOf(request);

    // Add correlation ID to response for client-side tracing
    response.setHeader('x-correlation-id', correlationId);
    response.once('finish', () => {
      this.metricsService.recordHttpRequest(
        method,
        this.routeOf(request),
        response.statusCode,
        (Date.now() - startTime) / 1000,
      );
    });

    this.logger.debug(`[${correlationId}] ${method} ${url}`);

    return next.handle().pipe(
      tap(() => {
        const duration = Date.now() - startTime;
        this.logger.log(`[${correlationId}] ${method} ${url} - ${duration}ms`);

        if (duration > SLOW_REQUEST_MS) {
          this.logger.warn(`[${correlationId}] Slow request: ${method} ${url} took ${duration}ms`);
        }
      }),
      catchError((error: unknown) => {
        const duration = Date.now() - startTime;
        const statusCode = error instanceof HttpException ? error.getStatus() : HttpStatus.INTERNAL_SERVER_ERROR;
        const message = error instanceof Error ? error.message : String(error);

        this.logger.error(
          `[${correlationId}] ${method} ${url} - ${statusCode} - ${duration}ms - Error: ${message}`,
          error instanceof Error ? error.stack : undefined,
        );

        throw error; // Re-throw to allow error handling by filters
      }),
    );
  }

  /**
   * Route pattern the request matched, e.g. /api/simulate/:type
   * Falls back to "unmatched" so unknown URLs share one series
   */
  routeOf(request: Request): string {
    const route: unknown = request.route;
    if (typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string') {
      return `${request.baseUrl}${route.path}`;
    }
    return 'unmatched';
  }

  /**
   * Reuses the caller's x-correlation-id or generates one
   * Format: req_{timestamp}_{random_suffix}
   */
  private correlationIdOf(request: Request): string {
    const header = request.headers['x-correlation-id'];
    if (typeof header === 'string' && header.length > 0) {
      return header;
    }
    return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
  }
}
