export { DiariesModule } from './DiariesModule.js';
export type { IDiariesModuleConfig, IDiariesModuleOverrides } from './DiariesModule.js';
export { DiaryService } from './services/index.js';
export type { IDiary, IDiaryEntry, IDiaryRepository } from './database/index.js';
