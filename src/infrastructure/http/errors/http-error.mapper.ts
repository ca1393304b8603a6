import { HttpException } from '@nestjs/common';
import { ApplicationError } from '@application/errors';

export interface ErrorResponseBody {
  statusCode: number;
  error: string;
  message: string;
}

/**
 * Translates an application error into the HTTP exception Nest sends back.
 * The body is `{ statusCode, error: <code>, message }`.
 */
export function toHttpException(error: ApplicationError): HttpException {
  const body: ErrorResponseBody = {
    statusCode: error.statusCode,
    error: error.code,
    message: error.message,
  };
  return new HttpException(body, error.statusCode);
}
