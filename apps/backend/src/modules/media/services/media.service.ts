import { v4 as uuid } from 'uuid';
import type { ILogger } from '@everly/types';
import { PayloadTooLargeError, UnsupportedMediaTypeError, ValidationError } from '../../../lib/errors.js';
import { categoryOf, extensionOf, toWholeMegabytes, type MediaCategory } from '../../../lib/files.js';
import type { IFileStorage, IUploadedFile } from '../../../services/storage/file-storage.js';

export interface IMediaRules {
    maxSizeBytes: number;
    allowedTypes: readonly string[];
}

/**
 * Description of a stored upload, returned to the client.
 */
export interface IMediaUpload {
    url: string;
    filename: string;
    originalFilename: string;
    contentType: string;
    fileType: MediaCategory;
    size: number;
}

/**
 * Stores uploaded images, video and audio under a random name.
 *
 * Uploads are not recorded anywhere else: clients keep the returned URL,
 * typically in a diary entry's media content.
 */
export class MediaService {
    constructor(
        private readonly storage: IFileStorage,
        private readonly rules: IMediaRules,
        private readonly logger: ILogger
    ) {}

    /**
     * @throws {ValidationError} If the file is empty
     * @throws {UnsupportedMediaTypeError} If the MIME type is not accepted
     * @throws {PayloadTooLargeError} If the file exceeds the size limit
     */
    async upload(userId: string, file: IUploadedFile): Promise<IMediaUpload> {
        if (file.size === 0) {
            throw new ValidationError('Uploaded file is empty');
        }
        if (!this.rules.allowedTypes.includes(file.mimetype)) {
            throw new UnsupportedMediaTypeError(`File type ${file.mimetype} is not allowed`, {
                allowedTypes: this.rules.allowedTypes
            });
        }
        if (file.size > this.rules.maxSizeBytes) {
            throw new PayloadTooLargeError(
                `File size exceeds maximum allowed size of ${toWholeMegabytes(this.rules.maxSizeBytes)}MB`
            );
        }

        const stored = await this.storage.save(file.buffer, `${uuid()}.${extensionOf(file.originalname)}`);
        this.logger.info({ userId, filename: stored.filename, size: file.size }, 'Media file uploaded');

        return {
            url: stored.url,
            filename: stored.filename,
            originalFilename: file.originalname,
            contentType: file.mimetype,
            fileType: categoryOf(file.mimetype),
            size: file.size
        };
    }
}
