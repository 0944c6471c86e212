import { Injectable, NestMiddleware } from '@nestjs/common';
import { IncomingMessage, ServerResponse } from 'http';
import { TraceService } from './trace.service';

/**
 * Attaches a trace_id to each request and echoes it as X-Trace-Id.
 *
 * Nest runs Fastify middleware through middie, which hands over the raw
 * Node request/response rather than FastifyRequest/FastifyReply.
 */
@Injectable()
export class TraceMiddleware implements NestMiddleware {
  constructor(private readonly traceService: TraceService) {}

  use(req: IncomingMessage, res: ServerResponse, next: () => void) {
    // Honor a caller-supplied id (for testing/debugging), otherwise generate one
    const header = req.headers['x-trace-id'];
    const traceIdHeader = Array.isArray(header) ? header[0] : header;

    this.traceService.run(traceIdHeader, () => {
      const traceId = this.traceService.getTraceId();
      if (traceId) {
        res.setHeader('X-Trace-Id', traceId);
      }
      next();
    });
  }
}
