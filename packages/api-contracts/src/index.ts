export * from './common/pagination.js';
export * from './common/enums.js';
export * from './common/errors.js';
export * from './common/responses.js';

export * from './entities/photo.js';
export * from './entities/health.js';

export * from './endpoints/photos/list.js';
export * from './endpoints/photos/get.js';
export * from './endpoints/photos/upload.js';
export * from './endpoints/photos/delete.js';
