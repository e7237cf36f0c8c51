import {
  HttpException,
  Injectable,
  NestInterceptor,
  ExecutionContext,
  CallHandler,
} from '@nestjs/common';
import { Observable, tap } from 'rxjs';
import type { Request, Response } from 'express';
import { isPerfEnabled, perfLog } from './perf-logger';

/**
 * Global HTTP timing interceptor. Emits one [PERF] HTTP line per request,
 * failed ones included, when DEBUG=true.
 */
@Injectable()
export class PerfLoggingInterceptor implements NestInterceptor {
  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (!isPerfEnabled() || context.getType() !== 'http') return next.handle();

    const httpCtx = context.switchToHttp();
    const req = httpCtx.getRequest<Request>();
    const operation = `${req.method} ${req.path}`;
    const start = performance.now();

    return next.handle().pipe(
      tap({
        next: () => {
          perfLog('HTTP', operation, performance.now() - start, {
            status: httpCtx.getResponse<Response>().statusCode,
          });
        },
        error: (error: unknown) => {
          perfLog('HTTP', operation, performance.now() - start, {
            status: error instanceof HttpException ? error.getStatus() : 500,
          });
        },
      }),
    );
  }
}
