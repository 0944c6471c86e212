import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import { FastifyReply } from 'fastify';
import { ApiErrorDto } from '@nudgeline/shared';
import { ConfigurationError } from '../errors';

/**
 * Maps ConfigurationError to a 500 ApiErrorDto carrying the error message.
 */
@Catch(ConfigurationError)
export class ConfigurationErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(ConfigurationErrorFilter.name);

  catch(exception: ConfigurationError, host: ArgumentsHost) {
    const reply = host.switchToHttp().getResponse<FastifyReply>();

    this.logger.error(`Configuration error: ${exception.message}`, exception.stack);

    const body: ApiErrorDto = {
      statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
      message: exception.message,
      error: 'Configuration Error',
    };

    reply.status(HttpStatus.INTERNAL_SERVER_ERROR).send(body);
  }
}
