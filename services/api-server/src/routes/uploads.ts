import { AsyncResource } from 'node:async_hooks';
import { Router, type RequestHandler } from 'express';
import multer from 'multer';
import { badRequest, HttpError, ValidationError } from '../../../../libs/errors/httpErrors.js';
import { type AccessGuard, requireActive } from '../../../../libs/guards/accessGuard.js';
import { RequestContext } from '../../../../libs/context/requestContext.js';
import { getContextLogger } from '../../../../libs/logging/logger.js';
import { asyncHandler } from '../../../../libs/middleware/asyncHandler.js';
import { createAuthMiddleware } from '../../../../libs/middleware/authenticate.js';
import type { Clock } from '../../../../libs/time/clock.js';
import {
    ALLOWED_EXTENSIONS,
    BoundedMemoryStorage,
    describeRejection,
    type FileStore,
    formatMegabytes,
    MAX_FILES_PER_REQUEST,
    validateUpload
} from '../../../../libs/uploads/index.js';

export interface UploadRouteDeps {
    readonly guard: AccessGuard;
    readonly fileStore: FileStore;
    readonly clock: Clock;
    readonly maxBytes: number;
}

interface UploadFileInfo {
    readonly filename: string;
    readonly content_type: string;
    readonly size: number;
    readonly uploaded_at: string;
}

interface UploadResponse {
    readonly message: string;
    readonly file_info: UploadFileInfo;
    readonly file_url: string | null;
}

const UNKNOWN = 'unknown';

/**
 * Multer failures are client errors. The parser's callback is bound to the
 * caller's async scope so the handler still sees the principal.
 */
function multipart(parse: RequestHandler): RequestHandler {
    return (req, res, next) => {
        parse(req, res, AsyncResource.bind((err?: unknown) => {
            if (err instanceof multer.MulterError) {
                next(err.code === 'LIMIT_FILE_COUNT'
                    ? badRequest(`Maximum ${MAX_FILES_PER_REQUEST} files allowed per request`)
                    : badRequest(err.message));
                return;
            }
            next(err);
        }));
    };
}

export function createUploadRouter(deps: UploadRouteDeps): Router {
    const router = Router();
    const activeOnly = createAuthMiddleware(deps.guard, [requireActive]);
    const storage = new BoundedMemoryStorage(deps.maxBytes);
    const singleFile = multipart(multer({ storage }).single('file'));
    const manyFiles = multipart(multer({ storage, limits: { files: MAX_FILES_PER_REQUEST } }).array('files'));

    const store = async (file: Express.Multer.File): Promise<UploadResponse> => {
        const verdict = validateUpload(file.originalname, file.size, deps.maxBytes);
        if (!verdict.valid) {
            throw badRequest(describeRejection(verdict.reason, deps.maxBytes));
        }

        const storedName = await deps.fileStore.save(verdict.extension, file.buffer);
        getContextLogger(RequestContext.get()).info({ storedName, size: file.size }, 'File uploaded');

        return {
            message: 'File uploaded successfully',
            file_info: {
                filename: file.originalname,
                content_type: file.mimetype,
                size: file.size,
                uploaded_at: deps.clock().toISOString(),
            },
            file_url: `/files/${storedName}`,
        };
    };

    router.get('/info', (_req, res) => {
        res.json({
            max_file_size_mb: formatMegabytes(deps.maxBytes),
            allowed_extensions: [...ALLOWED_EXTENSIONS],
            max_files_per_request: MAX_FILES_PER_REQUEST,
        });
    });

    router.post('/single', activeOnly, singleFile, asyncHandler(async (req, res) => {
        if (!req.file) {
            throw new ValidationError('Upload:Single', [{ loc: 'file', msg: 'Required' }]);
        }
        res.json(await store(req.file));
    }));

    // One result per file; a bad file does not fail the others
    router.post('/multiple', activeOnly, manyFiles, asyncHandler(async (req, res) => {
        const files = Array.isArray(req.files) ? req.files : [];
        if (files.length === 0) {
            throw new ValidationError('Upload:Multiple', [{ loc: 'files', msg: 'Required' }]);
        }

        const results: UploadResponse[] = [];
        for (const file of files) {
            const uploadedAt = deps.clock().toISOString();

            if (file.size > deps.maxBytes) {
                results.push({
                    message: `File ${file.originalname} too large`,
                    file_info: { filename: file.originalname, content_type: UNKNOWN, size: file.size, uploaded_at: uploadedAt },
                    file_url: null,
                });
                continue;
            }

            try {
                results.push(await store(file));
            } catch (error: unknown) {
                if (!(error instanceof HttpError)) {
                    throw error;
                }
                results.push({
                    message: `Error uploading ${file.originalname}: ${error.detail}`,
                    file_info: { filename: file.originalname || UNKNOWN, content_type: UNKNOWN, size: 0, uploaded_at: uploadedAt },
                    file_url: null,
                });
            }
        }

        res.json(results);
    }));

    return router;
}
