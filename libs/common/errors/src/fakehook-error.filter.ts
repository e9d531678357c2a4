import { ExceptionFilter, Catch, ArgumentsHost, Logger } from '@nestjs/common';
import { Request, Response } from 'express';
import { FakehookError } from './fakehook-error';

@Catch(FakehookError)
export class FakehookErrorFilter implements ExceptionFilter {
  private readonly logger = new Logger(FakehookErrorFilter.name);

  catch(exception: FakehookError, host: ArgumentsHost) {
    const ctx = host.switchToHttp();
    const request = ctx.getRequest<Request>();
    const response = ctx.getResponse<Response>();
    const summary = this.describe(exception, request);

    if (exception.httpStatusCode >= 500) {
      this.logger.error(summary, exception.originalError?.stack);
    } else {
      this.logger.warn(summary);
    }

    response.status(exception.httpStatusCode).json(exception.toJSON());
  }

  private describe(exception: FakehookError, request: Request): string {
    let summary = `${request.method} ${request.url} -> ${exception.httpStatusCode} ${exception.code}: ${exception.message}`;
    if (exception.resource) {
      summary += ` [${exception.resource}]`;
    }
    if (exception.metadata) {
      summary += ` ${JSON.stringify(exception.metadata)}`;
    }
    return summary;
  }
}
