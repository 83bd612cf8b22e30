export { DiaryService, listKey, toDiary, toEntry, userTag } from './diary.service.js';
export type {
    ICreateDiaryInput,
    ICreateEntryInput,
    IDiaryServiceConfig,
    IEntryListRequest,
    IEntryPage,
    IPageRequest,
    IPagination,
    ISearchInput,
    ISearchResult,
    IUpdateDiaryInput
} from './diary.service.js';
