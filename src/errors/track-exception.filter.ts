import {
  ArgumentsHost,
  Catch,
  ExceptionFilter,
  HttpStatus,
  Logger,
} from '@nestjs/common';
import type { Response } from 'express';

import { TrackError, TrackErrorKind } from './track.errors';

const STATUS_BY_KIND: Record<TrackErrorKind, HttpStatus> = {
  InvalidInput: HttpStatus.BAD_REQUEST,
  NotFound: HttpStatus.NOT_FOUND,
  Retrieval: HttpStatus.BAD_GATEWAY,
  Propagation: HttpStatus.UNPROCESSABLE_ENTITY,
};

export interface TrackErrorBody {
  statusCode: number;
  error: TrackErrorKind;
  message: string;
}

export function toErrorBody(error: TrackError): TrackErrorBody {
  return {
    statusCode: STATUS_BY_KIND[error.kind],
    error: error.kind,
    message: error.message,
  };
}

@Catch(TrackError)
export class TrackExceptionFilter implements ExceptionFilter<TrackError> {
  private readonly logger = new Logger(TrackExceptionFilter.name);

  catch(exception: TrackError, host: ArgumentsHost): void {
    const body = toErrorBody(exception);
    if (body.statusCode >= 500) {
      this.logger.error(exception.message, exception.stack);
    } else {
      this.logger.warn(exception.message);
    }
    host.switchToHttp().getResponse<Response>().status(body.statusCode).json(body);
  }
}
