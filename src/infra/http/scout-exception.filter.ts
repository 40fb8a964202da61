import {
  type ArgumentsHost,
  Catch,
  ConflictException,
  type ExceptionFilter,
  HttpException,
  NotFoundException,
  ServiceUnavailableException,
  UnprocessableEntityException,
} from '@nestjs/common';
import { BaseExceptionFilter } from '@nestjs/core';

import { type ErrorKind, ScoutError } from '@/modules/leads/domain/errors';

function toHttp(kind: ErrorKind, message: string): HttpException {
  switch (kind) {
    case 'NotFound':
      return new NotFoundException(message);
    case 'ConstraintViolation':
    case 'AmbiguousMerge':
      return new ConflictException(message);
    case 'UnresolvableRow':
      return new UnprocessableEntityException(message);
    case 'ProviderUnavailable':
    case 'FetchFailed':
      return new ServiceUnavailableException(message);
  }
}

/** Maps domain errors onto HTTP status codes; everything else falls through. */
@Catch(ScoutError)
export class ScoutExceptionFilter extends BaseExceptionFilter implements ExceptionFilter {
  catch(exception: ScoutError, host: ArgumentsHost) {
    super.catch(toHttp(exception.kind, exception.message), host);
  }
}
