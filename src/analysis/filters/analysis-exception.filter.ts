import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';
import { AnalysisError } from '../../common/errors/analysis.errors';

export interface AnalysisErrorBody {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/** Maps analysis errors to `{ error: { code, message, details } }`. */
@Catch(AnalysisError)
export class AnalysisExceptionFilter implements ExceptionFilter<AnalysisError> {
  private readonly logger = new Logger(AnalysisExceptionFilter.name);

  catch(exception: AnalysisError, host: ArgumentsHost): void {
    const response = host.switchToHttp().getResponse<Response>();

    if (exception.statusCode >= HttpStatus.INTERNAL_SERVER_ERROR) {
      this.logger.error(`${exception.code}: ${exception.message}`);
    } else {
      this.logger.warn(`${exception.code}: ${exception.message}`);
    }

    const body: AnalysisErrorBody = {
      error: {
        code: exception.code,
        message: exception.message,
        ...(exception.details ? { details: exception.details } : {}),
      },
    };

    response.status(exception.statusCode).json(body);
  }
}
