import multer from 'multer';
import type { IApiRouteConfig } from '@everly/types';
import type { MediaController } from './media.controller.js';

/**
 * @param controller - Media controller instance
 * @param maxFileSize - Multipart size limit in bytes
 */
export function createMediaRoutes(controller: MediaController, maxFileSize: number): IApiRouteConfig[] {
    const upload = multer({
        storage: multer.memoryStorage(),
        limits: { fileSize: maxFileSize, files: 1 }
    });

    return [
        {
            method: 'POST',
            path: '/upload',
            requiresAuth: true,
            middleware: [upload.single('file')],
            handler: controller.upload.bind(controller),
            description: 'Upload an image, video or audio file'
        }
    ];
}
