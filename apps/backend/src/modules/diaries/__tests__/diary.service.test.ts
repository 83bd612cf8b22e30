/// <reference types="vitest" />

import { describe, it, expect, beforeEach, vi } from 'vitest';
import type { ICacheService } from '@everly/types';
import { DiaryService, listKey, type IDiaryServiceConfig } from '../services/diary.service.js';
import type { IDiaryDocument } from '../database/index.js';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import { InMemoryDiaryRepository } from '../../../tests/vitest/mocks/diary-repository.js';
import { InMemoryCacheService } from '../../../tests/vitest/mocks/cache-service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { diaryDocument, entryDocument } from '../../../tests/vitest/helpers/diary-fixtures.js';

const DEFAULT_CONFIG: IDiaryServiceConfig = {
    defaultPageSize: 10,
    maxPageSize: 100,
    searchResultLimit: 50,
    cacheTtlSeconds: 300
};

describe('DiaryService', () => {
    let repository: InMemoryDiaryRepository;
    let cache: InMemoryCacheService;
    let logger: MockLogger;
    let diary: IDiaryDocument;

    function createService(config: Partial<IDiaryServiceConfig> = {}, cacheService: ICacheService | undefined = cache) {
        return new DiaryService(repository, cacheService, { ...DEFAULT_CONFIG, ...config }, logger);
    }

    beforeEach(async () => {
        repository = new InMemoryDiaryRepository();
        cache = new InMemoryCacheService();
        logger = new MockLogger();

        diary = diaryDocument('diary-1', 'user-1');
        await repository.insertDiary(diary);
        for (let day = 1; day <= 5; day++) {
            await repository.insertEntry(entryDocument(`e${day}`, diary, day));
        }
    });

    describe('diaries', () => {
        it('should serve the second list read from the cache', async () => {
            const service = createService();

            const first = await service.listDiaries('user-1');
            const second = await service.listDiaries('user-1');

            expect(repository.listDiariesCalls).toBe(1);
            expect(second).toEqual(first);
            expect(second[0].createdAt).toBeInstanceOf(Date);
            expect(cache.ttls.get('diaries:list:user-1')).toBe(300);
        });

        it('should invalidate the cached list when a diary is created', async () => {
            const service = createService();
            await service.listDiaries('user-1');

            const created = await service.createDiary('user-1', { title: 'Travels' });
            const diaries = await service.listDiaries('user-1');

            expect(repository.listDiariesCalls).toBe(2);
            expect(diaries.map(item => item.id)).toContain(created.id);
        });

        it('should read from the repository every time without a cache', async () => {
            const service = new DiaryService(repository, undefined, DEFAULT_CONFIG, logger);

            await service.listDiaries('user-1');
            await service.listDiaries('user-1');

            expect(repository.listDiariesCalls).toBe(2);
        });

        it('should fall back to the repository when the cache fails', async () => {
            const failing = new InMemoryCacheService();
            failing.get = async () => {
                throw new Error('connection refused');
            };
            const service = createService({}, failing);

            const diaries = await service.listDiaries('user-1');

            expect(diaries.map(item => item.id)).toEqual(['diary-1']);
            expect(logger.warn).toHaveBeenCalledWith(
                expect.objectContaining({ userId: 'user-1' }),
                'Diary list cache read failed'
            );
        });

        it('should not keep a list that was being cached while a diary was created', async () => {
            const store = cache.set.bind(cache);
            let release: () => void = () => {};
            let markWriteStarted: () => void = () => {};
            const writeStarted = new Promise<void>(resolve => {
                markWriteStarted = resolve;
            });
            let holdListWrite = true;
            cache.set = async <T>(key: string, value: T, ttlSeconds?: number, tags?: string[]) => {
                if (key === listKey('user-1') && holdListWrite) {
                    holdListWrite = false;
                    const gate = new Promise<void>(resolve => {
                        release = resolve;
                    });
                    markWriteStarted();
                    await gate;
                }
                await store(key, value, ttlSeconds, tags);
            };
            const service = createService();

            const pending = service.listDiaries('user-1');
            await writeStarted;
            const created = await service.createDiary('user-1', { title: 'Travels' });
            release();
            const before = await pending;
            const after = await service.listDiaries('user-1');

            expect(before.map(item => item.id)).toEqual(['diary-1']);
            expect(after.map(item => item.id).sort()).toEqual(['diary-1', created.id].sort());
            expect(repository.listDiariesCalls).toBe(2);
        });

        it('should skip caching when a diary was written during the repository read', async () => {
            const service = createService();
            const read = repository.listDiaries.bind(repository);
            repository.listDiaries = async (userId: string) => {
                const documents = await read(userId);
                await service.updateDiary('user-1', 'diary-1', { title: 'Renamed' });
                return documents;
            };

            await service.listDiaries('user-1');

            expect(cache.entries.has(listKey('user-1'))).toBe(false);
        });

        it('should create diaries with null optional fields', async () => {
            const created = await createService().createDiary('user-1', { title: 'Travels' });

            expect(created).toMatchObject({ userId: 'user-1', title: 'Travels', description: null, coverImage: null });
            expect(repository.diaries.has(created.id)).toBe(true);
        });

        it('should hide diaries of other users', async () => {
            await expect(createService().getDiary('user-2', 'diary-1')).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should update only the given fields', async () => {
            await repository.updateDiary('user-1', 'diary-1', { description: 'Kept' });

            const updated = await createService().updateDiary('user-1', 'diary-1', { title: 'Renamed' });

            expect(updated.title).toBe('Renamed');
            expect(updated.description).toBe('Kept');
        });

        it('should delete a diary together with its entries only', async () => {
            const other = diaryDocument('diary-2', 'user-1');
            await repository.insertDiary(other);
            await repository.insertEntry(entryDocument('other-entry', other, 1));

            const deleted = await createService().deleteDiary('user-1', 'diary-1');

            expect(deleted).toBe(5);
            expect(repository.diaries.has('diary-1')).toBe(false);
            expect([...repository.entries.keys()]).toEqual(['other-entry']);
        });

        it('should remove the diary before sweeping its entries', async () => {
            const removeDiary = vi.spyOn(repository, 'deleteDiary');
            const removeEntries = vi.spyOn(repository, 'deleteEntries');

            await createService().deleteDiary('user-1', 'diary-1');

            expect(removeDiary.mock.invocationCallOrder[0]).toBeLessThan(removeEntries.mock.invocationCallOrder[0]);
            await expect(
                createService().createEntry('user-1', 'diary-1', { title: 'Late entry' })
            ).rejects.toBeInstanceOf(NotFoundError);
        });

        it('should refuse to delete a diary of another user', async () => {
            await expect(createService().deleteDiary('user-2', 'diary-1')).rejects.toBeInstanceOf(NotFoundError);
            expect(repository.entries.size).toBe(5);
        });
    });

    describe('entries', () => {
        it('should page through entries newest first', async () => {
            const page = await createService().listEntries('user-1', 'diary-1', { page: 2, limit: 2 });

            expect(page.entries.map(entry => entry.id)).toEqual(['e3', 'e2']);
            expect(page.pagination).toEqual({ currentPage: 2, totalPages: 3, totalEntries: 5, entriesPerPage: 2 });
        });

        it('should sort oldest first on request', async () => {
            const page = await createService().listEntries('user-1', 'diary-1', { sort: 'asc' });

            expect(page.entries.map(entry => entry.id)).toEqual(['e1', 'e2', 'e3', 'e4', 'e5']);
            expect(page.pagination.entriesPerPage).toBe(10);
        });

        it('should clamp the page size to the configured maximum', async () => {
            const page = await createService({ maxPageSize: 3 }).listEntries('user-1', 'diary-1', { limit: 50 });

            expect(page.entries).toHaveLength(3);
            expect(page.pagination).toEqual({ currentPage: 1, totalPages: 2, totalEntries: 5, entriesPerPage: 3 });
        });

        it('should create a text entry with empty defaults', async () => {
            const entry = await createService().createEntry('user-1', 'diary-1', { title: 'First day' });

            expect(entry).toMatchObject({
                diaryId: 'diary-1',
                userId: 'user-1',
                title: 'First day',
                content: null,
                contentType: 'text',
                mediaContent: [],
                location: null,
                locationName: null,
                tags: []
            });
            expect(repository.entries.size).toBe(6);
        });

        it('should not add entries to a diary of another user', async () => {
            await expect(
                createService().createEntry('user-2', 'diary-1', { title: 'Intruder' })
            ).rejects.toBeInstanceOf(NotFoundError);
        });
    });

    describe('search', () => {
        it('should match title and content case-insensitively', async () => {
            await repository.insertEntry(entryDocument('e6', diary, 6, { content: 'Walked by the Lake' }));
            await repository.insertEntry(entryDocument('e7', diary, 7, { title: 'lake house' }));

            const result = await createService().searchEntries('user-1', { query: 'LAKE' });

            expect(result.entries.map(entry => entry.id)).toEqual(['e7', 'e6']);
            expect(result.searchInfo).toEqual({ query: 'LAKE', tags: [], startDate: null, endDate: null });
            expect(result.pagination.totalEntries).toBe(2);
        });

        it('should require every given tag', async () => {
            await repository.insertEntry(entryDocument('e6', diary, 6, { tags: ['travel', 'food'] }));
            await repository.insertEntry(entryDocument('e7', diary, 7, { tags: ['travel'] }));

            const result = await createService().searchEntries('user-1', { tags: ['travel', 'food'] });

            expect(result.entries.map(entry => entry.id)).toEqual(['e6']);
        });

        it('should restrict results to the date range', async () => {
            const result = await createService().searchEntries('user-1', {
                startDate: new Date('2024-01-02T00:00:00Z'),
                endDate: new Date('2024-01-03T23:59:59Z')
            });

            expect(result.entries.map(entry => entry.id)).toEqual(['e3', 'e2']);
        });

        it('should never return entries of other users', async () => {
            const foreign = diaryDocument('diary-9', 'user-2');
            await repository.insertDiary(foreign);
            await repository.insertEntry(entryDocument('foreign', foreign, 8, { title: 'Entry e1 copy' }));

            const result = await createService().searchEntries('user-1', { query: 'entry' });

            expect(result.entries.map(entry => entry.id)).toEqual(['e5', 'e4', 'e3', 'e2', 'e1']);
        });

        it('should clamp the page size to the search result limit', async () => {
            const result = await createService({ searchResultLimit: 4 }).searchEntries('user-1', {}, { limit: 10 });

            expect(result.entries).toHaveLength(4);
            expect(result.pagination).toEqual({ currentPage: 1, totalPages: 2, totalEntries: 5, entriesPerPage: 4 });
        });

        it('should reject a start date after the end date', async () => {
            await expect(
                createService().searchEntries('user-1', {
                    startDate: new Date('2024-02-01T00:00:00Z'),
                    endDate: new Date('2024-01-01T00:00:00Z')
                })
            ).rejects.toBeInstanceOf(ValidationError);
        });
    });
});
