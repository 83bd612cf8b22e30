export { MediaModule } from './MediaModule.js';
export type { IMediaModuleConfig, IMediaModuleOverrides } from './MediaModule.js';
export { MediaService } from './services/media.service.js';
export type { IMediaUpload } from './services/media.service.js';
