export type {
    EntryContentType,
    IDiary,
    IDiaryDocument,
    IDiaryEntry,
    IDiaryEntryDocument,
    IMediaContent
} from './IDiaryDocument.js';
export { ENTRY_CONTENT_TYPES } from './IDiaryDocument.js';
export type {
    DiaryChanges,
    IDiaryRepository,
    IEntrySearchCriteria,
    IPageWindow,
    SortOrder
} from './diary.repository.js';
export { buildSearchFilter, DIARIES_COLLECTION, ENTRIES_COLLECTION, MongoDiaryRepository } from './diary.repository.js';
