import { NextFunction, Request, Response } from 'express';

import { BadRequestError, CustomError } from '../errors/CustomError';
import { validationErrorType } from '../types/errorType';
// --------------------------------------------------------------

/** body-parser marks unreadable JSON bodies with this type. */
const isBodyParseError = (err: unknown): boolean =>
  typeof err === 'object' &&
  err !== null &&
  'type' in err &&
  err.type === 'entity.parse.failed';

/**
 * Last middleware of the status API. CustomErrors keep their status, code and
 * details; a malformed JSON body is a 400 and anything else becomes a 500
 * without leaking the message.
 *
 * Express recognises error middleware by its four parameters, so `next` stays
 * in the signature even though it is not called.
 */
function errorHandler(
  thrown: CustomError | Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
): void {
  const err = isBodyParseError(thrown)
    ? new BadRequestError('Malformed JSON body')
    : thrown;
  const statusCode: number = err instanceof CustomError ? err.statusCode : 500;
  const code: string =
    err instanceof CustomError ? err.code : 'INTERNAL_SERVER_ERROR';
  const message: string =
    err instanceof CustomError ? err.message : 'An unexpected error occurred';
  const details: validationErrorType[] | undefined =
    err instanceof CustomError ? err.details : undefined;

  const log = statusCode >= 500 ? console.error : console.warn;
  log('[Status] Request failed', {
    statusCode,
    code,
    message: err.message,
    method: req.method,
    url: req.originalUrl,
    stack: statusCode >= 500 ? err.stack : undefined,
  });

  res.status(statusCode).json({
    code,
    message,
    details,
  });
}

export default errorHandler;
