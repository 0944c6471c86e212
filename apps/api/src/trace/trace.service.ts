import { Injectable } from '@nestjs/common';
import { AsyncLocalStorage } from 'async_hooks';
import { randomUUID } from 'crypto';

/**
 * Request-scoped trace id without request-scoped providers.
 * The middleware opens a context per request; services read it when logging.
 */
@Injectable()
export class TraceService {
  private readonly asyncLocalStorage = new AsyncLocalStorage<{ traceId: string }>();

  run<T>(traceId: string | undefined, fn: () => T): T {
    const id = traceId && traceId.trim() ? traceId.trim() : this.generateTraceId();
    return this.asyncLocalStorage.run({ traceId: id }, fn);
  }

  getTraceId(): string | undefined {
    return this.asyncLocalStorage.getStore()?.traceId;
  }

  private generateTraceId(): string {
    return randomUUID();
  }
}
