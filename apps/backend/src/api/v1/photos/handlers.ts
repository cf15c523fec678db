import type { NextFunction, Request, Response } from 'express';
import type {
  DeletePhotoParams,
  DeletePhotoResponse,
  ErrorResponse,
  GetPhotoParams,
  GetPhotoResponse,
  ListPhotosQuery,
  ListPhotosResponse,
  UploadPhotoBody,
  UploadPhotoResponse,
} from '@photo-uploader/api-contracts';
import type { GalleryService } from '../../../domain/photo/GalleryService.js';
import type { PhotoService } from '../../../domain/photo/PhotoService.js';
import type { PhotoUploadService } from '../../../domain/photo/PhotoUploadService.js';
import { AppError, ERROR_CODES } from '../../../shared/errors.js';
import { getRequestContext } from '../../../utils/asyncContext.js';
import { toPhotoDto } from './mappers.js';

export type PhotoServices = {
  uploads: PhotoUploadService;
  gallery: GalleryService;
  photos: PhotoService;
};

function tagPhoto(photoId: string): void {
  const ctx = getRequestContext();
  if (ctx) ctx.photoId = photoId;
}

export function createPhotoHandlers(services: PhotoServices) {
  async function uploadPhoto(
    req: Request<Request['params'], UploadPhotoResponse | ErrorResponse, UploadPhotoBody>,
    res: Response<UploadPhotoResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const file = req.file;
      if (!file) {
        throw new AppError({ status: 400, code: ERROR_CODES.MISSING_FILE });
      }

      const { album, description, tags } = req.body;
      const record = await services.uploads.upload({
        originalFilename: file.originalname,
        contentType: file.mimetype,
        body: file.buffer,
        album,
        description,
        tags,
      });
      tagPhoto(record.key);

      const response: UploadPhotoResponse = {
        success: true,
        data: toPhotoDto(record, true),
      };
      res.status(201).location(response.data.imageUrl).json(response);
    } catch (error) {
      next(error);
    }
  }

  async function listPhotos(
    req: Request<Request['params'], ListPhotosResponse | ErrorResponse, unknown, ListPhotosQuery>,
    res: Response<ListPhotosResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const { page, pageSize } = req.query;
      const result = await services.gallery.listGallery({ page, pageSize });

      const response: ListPhotosResponse = {
        success: true,
        data: {
          items: result.items.map((entry) => toPhotoDto(entry.record, entry.available)),
          pagination: {
            total: result.total,
            page: result.page,
            pageSize: result.pageSize,
            hasMore: result.hasMore,
          },
        },
      };
      res.json(response);
    } catch (error) {
      next(error);
    }
  }

  async function getPhoto(
    req: Request<GetPhotoParams, GetPhotoResponse | ErrorResponse>,
    res: Response<GetPhotoResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const { photoId } = req.params;
      tagPhoto(photoId);
      const detail = await services.photos.getPhoto(photoId);
      res.json({ success: true, data: toPhotoDto(detail.record, detail.available) });
    } catch (error) {
      next(error);
    }
  }

  async function getPhotoImage(req: Request<GetPhotoParams>, res: Response, next: NextFunction) {
    try {
      const { photoId } = req.params;
      tagPhoto(photoId);
      const { record, body } = await services.photos.getPhotoImage(photoId);
      res
        .status(200)
        .type(record.contentType)
        .setHeader('Content-Length', String(body.length))
        .setHeader('Cache-Control', 'public, max-age=31536000, immutable')
        .end(body);
    } catch (error) {
      next(error);
    }
  }

  async function deletePhoto(
    req: Request<DeletePhotoParams, DeletePhotoResponse | ErrorResponse>,
    res: Response<DeletePhotoResponse | ErrorResponse>,
    next: NextFunction
  ) {
    try {
      const { photoId } = req.params;
      tagPhoto(photoId);
      await services.photos.deletePhoto(photoId);
      res.json({ success: true, data: { id: photoId, deleted: true } });
    } catch (error) {
      next(error);
    }
  }

  return { uploadPhoto, listPhotos, getPhoto, getPhotoImage, deletePhoto };
}
