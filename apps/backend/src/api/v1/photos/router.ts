import { Router, type Request, type RequestHandler } from 'express';
import {
  type DeletePhotoParams,
  type DeletePhotoResponse,
  type ErrorResponse,
  DeletePhotoParamsSchema,
  type GetPhotoParams,
  type GetPhotoResponse,
  GetPhotoParamsSchema,
  type ListPhotosQuery,
  type ListPhotosResponse,
  ListPhotosQuerySchema,
  type UploadPhotoBody,
  type UploadPhotoResponse,
  UploadPhotoBodySchema,
} from '@photo-uploader/api-contracts';
import { validateRequest } from '../../middleware/validation.js';
import { createPhotoHandlers, type PhotoServices } from './handlers.js';

export type PhotosRouterOptions = {
  services: PhotoServices;
  /** Multipart parsing for the `file` field. */
  upload: RequestHandler;
  uploadLimiter: RequestHandler;
};

export function createPhotosRouter(opts: PhotosRouterOptions): Router {
  const router = Router();
  const handlers = createPhotoHandlers(opts.services);

  router.post<Request['params'], UploadPhotoResponse | ErrorResponse, UploadPhotoBody>(
    '/',
    opts.uploadLimiter,
    opts.upload,
    validateRequest<Request['params'], Request['query'], UploadPhotoBody, UploadPhotoResponse>({
      body: UploadPhotoBodySchema,
    }),
    handlers.uploadPhoto
  );

  router.get<Request['params'], ListPhotosResponse | ErrorResponse, unknown, ListPhotosQuery>(
    '/',
    validateRequest<Request['params'], ListPhotosQuery, unknown, ListPhotosResponse>({
      query: ListPhotosQuerySchema,
    }),
    handlers.listPhotos
  );

  router.get<GetPhotoParams, GetPhotoResponse | ErrorResponse>(
    '/:photoId',
    validateRequest<GetPhotoParams, Request['query'], Request['body'], GetPhotoResponse>({
      params: GetPhotoParamsSchema,
    }),
    handlers.getPhoto
  );

  router.get<GetPhotoParams>(
    '/:photoId/image',
    validateRequest<GetPhotoParams>({ params: GetPhotoParamsSchema }),
    handlers.getPhotoImage
  );

  router.delete<DeletePhotoParams, DeletePhotoResponse | ErrorResponse>(
    '/:photoId',
    validateRequest<DeletePhotoParams, Request['query'], Request['body'], DeletePhotoResponse>({
      params: DeletePhotoParamsSchema,
    }),
    handlers.deletePhoto
  );

  return router;
}
