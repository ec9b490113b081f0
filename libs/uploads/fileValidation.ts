import path from 'node:path';

export const ALLOWED_EXTENSIONS = ['.jpg', '.jpeg', '.png', '.gif', '.pdf', '.txt', '.docx', '.xlsx'] as const;

export const DEFAULT_MAX_UPLOAD_BYTES = 10 * 1024 * 1024;

export const MAX_FILES_PER_REQUEST = 5;

export type UploadRejection = 'MISSING_FILENAME' | 'EXTENSION_NOT_ALLOWED' | 'TOO_LARGE';

export type UploadValidationResult =
    | { valid: true; extension: string }
    | { valid: false; reason: UploadRejection };

const allowed: ReadonlySet<string> = new Set(ALLOWED_EXTENSIONS);

/**
 * Lower-cased extension of the final path segment, or '' when there is none.
 */
export function extensionOf(filename: string): string {
    return path.extname(path.basename(filename)).toLowerCase();
}

export function validateUpload(filename: string, size: number, maxBytes: number): UploadValidationResult {
    if (filename.trim() === '') {
        return { valid: false, reason: 'MISSING_FILENAME' };
    }

    const extension = extensionOf(filename);
    if (!allowed.has(extension)) {
        return { valid: false, reason: 'EXTENSION_NOT_ALLOWED' };
    }

    if (size > maxBytes) {
        return { valid: false, reason: 'TOO_LARGE' };
    }

    return { valid: true, extension };
}

export function describeRejection(reason: UploadRejection, maxBytes: number): string {
    switch (reason) {
        case 'MISSING_FILENAME':
            return 'No file name provided';
        case 'EXTENSION_NOT_ALLOWED':
            return `File type not allowed. Allowed types: ${ALLOWED_EXTENSIONS.join(', ')}`;
        case 'TOO_LARGE':
            return `File too large. Maximum size: ${formatMegabytes(maxBytes)}MB`;
    }
}

export function formatMegabytes(bytes: number): number {
    return Math.floor(bytes / 1024 / 1024);
}
