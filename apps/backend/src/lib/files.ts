/**
 * Lower-cased extension of `filename`, or `bin` when it has none or when it
 * contains anything besides letters and digits.
 *
 * @example
 * extensionOf('Trip.JPG'); // 'jpg'
 * extensionOf('README');   // 'bin'
 */
export function extensionOf(filename: string): string {
    const dot = filename.lastIndexOf('.');
    if (dot <= 0 || dot === filename.length - 1) {
        return 'bin';
    }
    const extension = filename.slice(dot + 1).toLowerCase();
    return /^[a-z0-9]+$/.test(extension) ? extension : 'bin';
}

/**
 * Whole megabytes in `bytes`, for error messages.
 */
export function toWholeMegabytes(bytes: number): number {
    return Math.floor(bytes / (1024 * 1024));
}

export const IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
export const VIDEO_TYPES = ['video/mp4', 'video/avi', 'video/mov', 'video/wmv'] as const;
export const AUDIO_TYPES = ['audio/mpeg', 'audio/wav', 'audio/ogg', 'audio/mp3'] as const;

export type MediaCategory = 'image' | 'video' | 'audio' | 'other';

/**
 * Broad category of a MIME type among the accepted upload types.
 */
export function categoryOf(mimetype: string): MediaCategory {
    if (isOneOf(IMAGE_TYPES, mimetype)) {
        return 'image';
    }
    if (isOneOf(VIDEO_TYPES, mimetype)) {
        return 'video';
    }
    if (isOneOf(AUDIO_TYPES, mimetype)) {
        return 'audio';
    }
    return 'other';
}

function isOneOf(types: readonly string[], mimetype: string): boolean {
    return types.includes(mimetype);
}
