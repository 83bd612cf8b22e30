import { v4 as uuid } from 'uuid';
import { z } from 'zod';
import type { ICacheService, ILogger } from '@everly/types';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import type {
    DiaryChanges,
    EntryContentType,
    IDiary,
    IDiaryDocument,
    IDiaryEntry,
    IDiaryEntryDocument,
    IDiaryRepository,
    IMediaContent,
    SortOrder
} from '../database/index.js';

/**
 * Paging and caching limits, mapped from the `DIARY_*` environment variables.
 */
export interface IDiaryServiceConfig {
    defaultPageSize: number;
    maxPageSize: number;
    searchResultLimit: number;
    cacheTtlSeconds: number;
}

export interface ICreateDiaryInput {
    title: string;
    description?: string | null;
    coverImage?: string | null;
}

export interface IUpdateDiaryInput {
    title?: string;
    description?: string | null;
    coverImage?: string | null;
}

export interface ICreateEntryInput {
    title: string;
    content?: string | null;
    contentType?: EntryContentType;
    mediaContent?: IMediaContent[];
    location?: [number, number] | null;
    locationName?: string | null;
    tags?: string[];
}

export interface IPageRequest {
    page?: number;
    limit?: number;
}

export interface IEntryListRequest extends IPageRequest {
    sort?: SortOrder;
}

export interface ISearchInput {
    query?: string;
    tags?: string[];
    startDate?: Date;
    endDate?: Date;
}

export interface IPagination {
    currentPage: number;
    totalPages: number;
    totalEntries: number;
    entriesPerPage: number;
}

export interface IEntryPage {
    entries: IDiaryEntry[];
    pagination: IPagination;
}

export interface ISearchResult extends IEntryPage {
    searchInfo: {
        query: string | null;
        tags: string[];
        startDate: Date | null;
        endDate: Date | null;
    };
}

const cachedDiariesSchema = z.array(
    z.object({
        id: z.string(),
        userId: z.string(),
        title: z.string(),
        description: z.string().nullable(),
        coverImage: z.string().nullable(),
        createdAt: z.coerce.date(),
        updatedAt: z.coerce.date()
    })
);

/**
 * Diaries and their entries, always scoped to the requesting user.
 *
 * A user's diary list is cached when a cache is available. Every diary write
 * replaces the user's list generation and invalidates the user's cache tag.
 * A list read remembers the generation it started under and drops its own
 * cache write when a diary write happened in the meantime, so a cached list
 * is never staler than the last write made through this service.
 */
export class DiaryService {
    constructor(
        private readonly repository: IDiaryRepository,
        private readonly cache: ICacheService | undefined,
        private readonly config: IDiaryServiceConfig,
        private readonly logger: ILogger
    ) {}

    async listDiaries(userId: string): Promise<IDiary[]> {
        const cached = await this.readCachedList(userId);
        if (cached) {
            return cached;
        }

        const generation = await this.readGeneration(userId);
        const diaries = (await this.repository.listDiaries(userId)).map(toDiary);
        await this.writeCachedList(userId, diaries, generation);
        return diaries;
    }

    async createDiary(userId: string, input: ICreateDiaryInput): Promise<IDiary> {
        const now = new Date();
        const document: IDiaryDocument = {
            _id: uuid(),
            userId,
            title: input.title,
            description: input.description ?? null,
            coverImage: input.coverImage ?? null,
            createdAt: now,
            updatedAt: now
        };

        await this.repository.insertDiary(document);
        await this.invalidateList(userId);
        this.logger.info({ userId, diaryId: document._id }, 'Diary created');
        return toDiary(document);
    }

    /**
     * @throws {NotFoundError} When the user owns no diary with this id
     */
    async getDiary(userId: string, diaryId: string): Promise<IDiary> {
        return toDiary(await this.requireDiary(userId, diaryId));
    }

    /**
     * @throws {NotFoundError} When the user owns no diary with this id
     */
    async updateDiary(userId: string, diaryId: string, input: IUpdateDiaryInput): Promise<IDiary> {
        const changes: DiaryChanges = { updatedAt: new Date() };
        if (input.title !== undefined) {
            changes.title = input.title;
        }
        if (input.description !== undefined) {
            changes.description = input.description;
        }
        if (input.coverImage !== undefined) {
            changes.coverImage = input.coverImage;
        }

        const updated = await this.repository.updateDiary(userId, diaryId, changes);
        if (!updated) {
            throw new NotFoundError('Diary not found', { diaryId });
        }
        await this.invalidateList(userId);
        return toDiary(updated);
    }

    /**
     * Delete a diary together with all of its entries.
     *
     * The diary goes first, so entry creation for it fails from then on and
     * the entry sweep that follows leaves nothing behind.
     *
     * @returns Number of entries removed with the diary
     * @throws {NotFoundError} When the user owns no diary with this id
     */
    async deleteDiary(userId: string, diaryId: string): Promise<number> {
        if (!(await this.repository.deleteDiary(userId, diaryId))) {
            throw new NotFoundError('Diary not found', { diaryId });
        }
        await this.invalidateList(userId);

        const deletedEntries = await this.repository.deleteEntries(diaryId);

        this.logger.info({ userId, diaryId, deletedEntries }, 'Diary deleted');
        return deletedEntries;
    }

    /**
     * One page of a diary's entries. `limit` is clamped to the configured maximum.
     *
     * @throws {NotFoundError} When the user owns no diary with this id
     */
    async listEntries(userId: string, diaryId: string, request: IEntryListRequest = {}): Promise<IEntryPage> {
        await this.requireDiary(userId, diaryId);

        const { page, limit } = this.resolvePage(request, this.config.maxPageSize);
        const [documents, total] = await Promise.all([
            this.repository.listEntries(diaryId, { skip: (page - 1) * limit, limit }, request.sort ?? 'desc'),
            this.repository.countEntries(diaryId)
        ]);

        return { entries: documents.map(toEntry), pagination: paginate(page, limit, total) };
    }

    /**
     * @throws {NotFoundError} When the user owns no diary with this id
     */
    async createEntry(userId: string, diaryId: string, input: ICreateEntryInput): Promise<IDiaryEntry> {
        await this.requireDiary(userId, diaryId);

        const now = new Date();
        const document: IDiaryEntryDocument = {
            _id: uuid(),
            diaryId,
            userId,
            title: input.title,
            content: input.content ?? null,
            contentType: input.contentType ?? 'text',
            mediaContent: input.mediaContent ?? [],
            location: input.location ?? null,
            locationName: input.locationName ?? null,
            tags: input.tags ?? [],
            createdAt: now,
            updatedAt: now
        };

        await this.repository.insertEntry(document);
        this.logger.debug({ userId, diaryId, entryId: document._id }, 'Diary entry created');
        return toEntry(document);
    }

    /**
     * Search all of the user's entries. `limit` is clamped to the search result limit.
     *
     * @throws {ValidationError} When `startDate` is after `endDate`
     */
    async searchEntries(userId: string, input: ISearchInput, request: IPageRequest = {}): Promise<ISearchResult> {
        if (input.startDate && input.endDate && input.startDate > input.endDate) {
            throw new ValidationError('startDate must not be after endDate');
        }

        const { page, limit } = this.resolvePage(request, this.config.searchResultLimit);
        const { entries, total } = await this.repository.searchEntries(
            { userId, ...input },
            { skip: (page - 1) * limit, limit }
        );

        return {
            entries: entries.map(toEntry),
            searchInfo: {
                query: input.query ?? null,
                tags: input.tags ?? [],
                startDate: input.startDate ?? null,
                endDate: input.endDate ?? null
            },
            pagination: paginate(page, limit, total)
        };
    }

    private resolvePage(request: IPageRequest, maxLimit: number): { page: number; limit: number } {
        return {
            page: request.page ?? 1,
            limit: Math.min(request.limit ?? this.config.defaultPageSize, maxLimit)
        };
    }

    private async requireDiary(userId: string, diaryId: string): Promise<IDiaryDocument> {
        const diary = await this.repository.findDiary(userId, diaryId);
        if (!diary) {
            throw new NotFoundError('Diary not found', { diaryId });
        }
        return diary;
    }

    // Cache failures degrade to database reads; they never fail a request.

    private async readCachedList(userId: string): Promise<IDiary[] | null> {
        if (!this.cache) {
            return null;
        }
        try {
            const cached = cachedDiariesSchema.safeParse(await this.cache.get<unknown>(listKey(userId)));
            return cached.success ? cached.data : null;
        } catch (error) {
            this.logger.warn({ error, userId }, 'Diary list cache read failed');
            return null;
        }
    }

    /**
     * Current list generation, null before the first write. `undefined` means
     * the cache could not be read and the list must not be cached.
     */
    private async readGeneration(userId: string): Promise<string | null | undefined> {
        if (!this.cache) {
            return undefined;
        }
        try {
            const generation = await this.cache.get<unknown>(generationKey(userId));
            return typeof generation === 'string' ? generation : null;
        } catch (error) {
            this.logger.warn({ error, userId }, 'Diary list generation read failed');
            return undefined;
        }
    }

    private async writeCachedList(userId: string, diaries: IDiary[], generation: string | null | undefined): Promise<void> {
        if (!this.cache || generation === undefined) {
            return;
        }
        try {
            if ((await this.readGeneration(userId)) !== generation) {
                return;
            }
            await this.cache.set(listKey(userId), diaries, this.config.cacheTtlSeconds, [userTag(userId)]);

            // A diary write that landed while the list was being stored
            if ((await this.readGeneration(userId)) !== generation) {
                await this.cache.invalidate(userTag(userId));
                this.logger.debug({ userId }, 'Dropped diary list cached across a write');
            }
        } catch (error) {
            this.logger.warn({ error, userId }, 'Diary list cache write failed');
        }
    }

    private async invalidateList(userId: string): Promise<void> {
        if (!this.cache) {
            return;
        }
        try {
            await this.cache.set(generationKey(userId), uuid(), this.config.cacheTtlSeconds);
            await this.cache.invalidate(userTag(userId));
        } catch (error) {
            this.logger.warn({ error, userId }, 'Diary list cache invalidation failed');
        }
    }
}

export function listKey(userId: string): string {
    return `diaries:list:${userId}`;
}

export function generationKey(userId: string): string {
    return `diaries:generation:${userId}`;
}

export function userTag(userId: string): string {
    return `diaries:user:${userId}`;
}

function paginate(page: number, limit: number, total: number): IPagination {
    return {
        currentPage: page,
        totalPages: Math.ceil(total / limit),
        totalEntries: total,
        entriesPerPage: limit
    };
}

export function toDiary(document: IDiaryDocument): IDiary {
    return {
        id: document._id,
        userId: document.userId,
        title: document.title,
        description: document.description,
        coverImage: document.coverImage,
        createdAt: document.createdAt,
        updatedAt: document.updatedAt
    };
}

export function toEntry(document: IDiaryEntryDocument): IDiaryEntry {
    return {
        id: document._id,
        diaryId: document.diaryId,
        userId: document.userId,
        title: document.title,
        content: document.content,
        contentType: document.contentType,
        mediaContent: document.mediaContent,
        location: document.location,
        locationName: document.locationName,
        tags: document.tags,
        createdAt: document.createdAt,
        updatedAt: document.updatedAt
    };
}
