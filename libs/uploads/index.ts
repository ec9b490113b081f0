export type { UploadRejection, UploadValidationResult } from './fileValidation.js';
export {
    ALLOWED_EXTENSIONS,
    DEFAULT_MAX_UPLOAD_BYTES,
    describeRejection,
    extensionOf,
    formatMegabytes,
    MAX_FILES_PER_REQUEST,
    validateUpload
} from './fileValidation.js';
export type { FileStore } from './storage.js';
export { DiskFileStore } from './storage.js';
export { BoundedMemoryStorage } from './boundedMemoryStorage.js';
