export { ObjectUploader, type ObjectUploaderOptions } from './uploader.js';
export { runWithConcurrency, type Settled } from './pool.js';
export type {
  BatchUploadOptions,
  BatchUploadResult,
  PreparedUpload,
  UploadRequest,
  UploadResult,
} from './types.js';
