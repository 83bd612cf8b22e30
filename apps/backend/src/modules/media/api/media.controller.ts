import type { Request, Response } from 'express';
import { getAuthContext } from '../../../api/middleware/require-auth.js';
import { ValidationError } from '../../../lib/errors.js';
import type { MediaService } from '../services/media.service.js';

export class MediaController {
    constructor(private readonly mediaService: MediaService) {}

    /**
     * POST /api/v1/media/upload
     *
     * Multipart field: file
     * Response: { url, filename, originalFilename, contentType, fileType, size }
     */
    async upload(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        if (!req.file) {
            throw new ValidationError('No file uploaded', { field: 'file' });
        }
        res.json(await this.mediaService.upload(userId, req.file));
    }
}
