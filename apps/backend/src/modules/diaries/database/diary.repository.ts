import type { mongo } from 'mongoose';
import type { IDatabaseService } from '@everly/types';
import type { IDiaryDocument, IDiaryEntryDocument } from './IDiaryDocument.js';

export const DIARIES_COLLECTION = 'diaries';
export const ENTRIES_COLLECTION = 'diary_entries';

export type DiaryChanges = Partial<Pick<IDiaryDocument, 'title' | 'description' | 'coverImage' | 'updatedAt'>>;

export type SortOrder = 'asc' | 'desc';

/**
 * A window into an ordered result set.
 */
export interface IPageWindow {
    skip: number;
    limit: number;
}

/**
 * Filters of an entry search. Every given filter must match.
 */
export interface IEntrySearchCriteria {
    userId: string;
    /** Case-insensitive substring of the title or content. */
    query?: string;
    /** Entries must carry all of these tags. */
    tags?: string[];
    /** Inclusive lower bound on `createdAt`. */
    startDate?: Date;
    /** Inclusive upper bound on `createdAt`. */
    endDate?: Date;
}

/**
 * Persistence boundary of the diaries module.
 *
 * Diary lookups take the owner's id: a diary owned by someone else is
 * indistinguishable from one that does not exist.
 */
export interface IDiaryRepository {
    /** The user's diaries, newest first. */
    listDiaries(userId: string): Promise<IDiaryDocument[]>;
    findDiary(userId: string, diaryId: string): Promise<IDiaryDocument | null>;
    insertDiary(diary: IDiaryDocument): Promise<void>;
    updateDiary(userId: string, diaryId: string, changes: DiaryChanges): Promise<IDiaryDocument | null>;
    deleteDiary(userId: string, diaryId: string): Promise<boolean>;

    /** @returns Number of entries removed */
    deleteEntries(diaryId: string): Promise<number>;
    listEntries(diaryId: string, window: IPageWindow, sort: SortOrder): Promise<IDiaryEntryDocument[]>;
    countEntries(diaryId: string): Promise<number>;
    insertEntry(entry: IDiaryEntryDocument): Promise<void>;

    /** Matching entries newest first, with the total number of matches. */
    searchEntries(
        criteria: IEntrySearchCriteria,
        window: IPageWindow
    ): Promise<{ entries: IDiaryEntryDocument[]; total: number }>;
}

/**
 * Translate search criteria into a MongoDB filter.
 */
export function buildSearchFilter(criteria: IEntrySearchCriteria): mongo.Filter<IDiaryEntryDocument> {
    const filter: mongo.Filter<IDiaryEntryDocument> = { userId: criteria.userId };

    if (criteria.query) {
        const pattern = new RegExp(escapeRegExp(criteria.query), 'i');
        filter.$or = [{ title: pattern }, { content: pattern }];
    }
    if (criteria.tags && criteria.tags.length > 0) {
        filter.tags = { $all: criteria.tags };
    }
    if (criteria.startDate || criteria.endDate) {
        const range: { $gte?: Date; $lte?: Date } = {};
        if (criteria.startDate) {
            range.$gte = criteria.startDate;
        }
        if (criteria.endDate) {
            range.$lte = criteria.endDate;
        }
        filter.createdAt = range;
    }

    return filter;
}

function escapeRegExp(value: string): string {
    return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * IDiaryRepository over the shared MongoDB connection.
 */
export class MongoDiaryRepository implements IDiaryRepository {
    constructor(private readonly database: IDatabaseService) {}

    async listDiaries(userId: string): Promise<IDiaryDocument[]> {
        return this.diaries().find({ userId }).sort({ createdAt: -1, _id: 1 }).toArray();
    }

    async findDiary(userId: string, diaryId: string): Promise<IDiaryDocument | null> {
        return this.diaries().findOne({ _id: diaryId, userId });
    }

    async insertDiary(diary: IDiaryDocument): Promise<void> {
        await this.diaries().insertOne(diary);
    }

    async updateDiary(userId: string, diaryId: string, changes: DiaryChanges): Promise<IDiaryDocument | null> {
        return this.diaries().findOneAndUpdate(
            { _id: diaryId, userId },
            { $set: changes },
            { returnDocument: 'after' }
        );
    }

    async deleteDiary(userId: string, diaryId: string): Promise<boolean> {
        const result = await this.diaries().deleteOne({ _id: diaryId, userId });
        return result.deletedCount > 0;
    }

    async deleteEntries(diaryId: string): Promise<number> {
        const result = await this.entries().deleteMany({ diaryId });
        return result.deletedCount;
    }

    async listEntries(diaryId: string, window: IPageWindow, sort: SortOrder): Promise<IDiaryEntryDocument[]> {
        const direction = sort === 'asc' ? 1 : -1;
        return this.entries()
            .find({ diaryId })
            .sort({ createdAt: direction, _id: direction })
            .skip(window.skip)
            .limit(window.limit)
            .toArray();
    }

    async countEntries(diaryId: string): Promise<number> {
        return this.entries().countDocuments({ diaryId });
    }

    async insertEntry(entry: IDiaryEntryDocument): Promise<void> {
        await this.entries().insertOne(entry);
    }

    async searchEntries(
        criteria: IEntrySearchCriteria,
        window: IPageWindow
    ): Promise<{ entries: IDiaryEntryDocument[]; total: number }> {
        const filter = buildSearchFilter(criteria);
        const [entries, total] = await Promise.all([
            this.entries().find(filter).sort({ createdAt: -1, _id: -1 }).skip(window.skip).limit(window.limit).toArray(),
            this.entries().countDocuments(filter)
        ]);
        return { entries, total };
    }

    private diaries(): mongo.Collection<IDiaryDocument> {
        return this.database.getCollection<IDiaryDocument>(DIARIES_COLLECTION);
    }

    private entries(): mongo.Collection<IDiaryEntryDocument> {
        return this.database.getCollection<IDiaryEntryDocument>(ENTRIES_COLLECTION);
    }
}
