/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { buildSearchFilter } from '../database/diary.repository.js';

describe('buildSearchFilter', () => {
    it('should scope to the user when no filter is given', () => {
        expect(buildSearchFilter({ userId: 'user-1' })).toEqual({ userId: 'user-1' });
    });

    it('should match title or content with an escaped case-insensitive pattern', () => {
        const filter = buildSearchFilter({ userId: 'user-1', query: 'a+b (draft)' });

        expect(filter.$or).toEqual([{ title: /a\+b \(draft\)/i }, { content: /a\+b \(draft\)/i }]);
    });

    it('should require all tags and bound the creation date', () => {
        const startDate = new Date('2024-01-01T00:00:00Z');
        const endDate = new Date('2024-01-31T23:59:59Z');

        expect(buildSearchFilter({ userId: 'user-1', tags: ['travel', 'food'], startDate, endDate })).toEqual({
            userId: 'user-1',
            tags: { $all: ['travel', 'food'] },
            createdAt: { $gte: startDate, $lte: endDate }
        });
    });

    it('should ignore an empty tag list', () => {
        expect(buildSearchFilter({ userId: 'user-1', tags: [] })).toEqual({ userId: 'user-1' });
    });
});
