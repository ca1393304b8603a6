import {
  CallHandler,
  ExecutionContext,
  HttpException,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { Request, Response } from 'express';
import { MetricsService } from './metrics.service';

const OBJECT_ID_SEGMENT = /\/[a-f0-9]{24}(?=\/|$)/gi;

@Injectable()
export class MetricsInterceptor implements NestInterceptor {
  constructor(private readonly metricsService: MetricsService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    if (context.getType() !== 'http') {
      return next.handle();
    }

    const ctx = context.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();

    const startTime = Date.now();

    return next.handle().pipe(
      tap({
        next: () => {
          this.record(request, response.statusCode, startTime);
        },
        error: (error: unknown) => {
          // The response status is not set yet when a handler throws
          const status = error instanceof HttpException ? error.getStatus() : 500;
          this.record(request, status, startTime);
        },
      }),
    );
  }

  private record(request: Request, status: number, startTime: number): void {
    const durationSec = (Date.now() - startTime) / 1000;
    const path = this.normalizePath(this.getRoutePath(request));

    this.metricsService.recordHttpRequest(request.method, path, status, durationSec);
  }

  private getRoutePath(request: Request): string {
    const route: unknown = request.route;
    if (typeof route === 'object' && route !== null && 'path' in route) {
      const { path } = route;
      if (typeof path === 'string') {
        return path;
      }
    }
    return request.path;
  }

  private normalizePath(path: string): string {
    return path.replace(OBJECT_ID_SEGMENT, '/:id');
  }
}
