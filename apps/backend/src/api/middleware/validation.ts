import type { NextFunction, Request, RequestHandler } from 'express';
import type { ZodTypeAny } from 'zod';
import type { ErrorResponse } from '@photo-uploader/api-contracts';

interface ValidationSchemas {
  params?: ZodTypeAny;
  query?: ZodTypeAny;
  body?: ZodTypeAny;
}

/** Replaces params/query/body with their parsed values; a ZodError goes to the error handler. */
export function validateRequest<
  TParams = Request['params'],
  TQuery = Request['query'],
  TBody = Request['body'],
  TResBody = unknown
>(schemas: ValidationSchemas): RequestHandler<TParams, TResBody | ErrorResponse, TBody, TQuery> {
  return (req, _res, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params) as TParams;
      }
      if (schemas.query) {
        req.query = schemas.query.parse(req.query) as TQuery;
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body ?? {}) as TBody;
      }
      next();
    } catch (error) {
      next(error);
    }
  };
}
