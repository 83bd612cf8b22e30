import { z } from 'zod';
import { ENTRY_CONTENT_TYPES } from '../database/index.js';

const title = z.string().trim().min(1).max(200);
const description = z.string().max(2000).nullable();
const imageUrl = z.string().url().nullable();

export const createDiarySchema = z
    .object({
        title,
        description: description.optional(),
        coverImage: imageUrl.optional()
    })
    .strict();

export type CreateDiaryBody = z.infer<typeof createDiarySchema>;

export const updateDiarySchema = z
    .object({
        title: title.optional(),
        description: description.optional(),
        coverImage: imageUrl.optional()
    })
    .strict()
    .refine(body => Object.keys(body).length > 0, { message: 'Provide at least one field to update' });

export type UpdateDiaryBody = z.infer<typeof updateDiarySchema>;

const tags = z
    .array(z.string().trim().min(1).max(50))
    .max(20)
    .transform(values => [...new Set(values)]);

const mediaContentSchema = z
    .object({
        url: z.string().url(),
        contentType: z.string().min(1),
        thumbnailUrl: z.string().url().nullable().default(null),
        description: z.string().max(500).nullable().default(null)
    })
    .strict();

export const createEntrySchema = z
    .object({
        title,
        content: z.string().max(100_000).nullable().optional(),
        contentType: z.enum(ENTRY_CONTENT_TYPES).default('text'),
        mediaContent: z.array(mediaContentSchema).max(50).default([]),
        location: z.tuple([z.number().min(-180).max(180), z.number().min(-90).max(90)]).nullable().optional(),
        locationName: z.string().max(200).nullable().optional(),
        tags: tags.default([])
    })
    .strict();

export type CreateEntryBody = z.infer<typeof createEntrySchema>;

export const searchEntriesSchema = z
    .object({
        query: z.string().trim().min(1).max(200).optional(),
        tags: tags.optional(),
        startDate: z.coerce.date().optional(),
        endDate: z.coerce.date().optional()
    })
    .strict();

export type SearchEntriesBody = z.infer<typeof searchEntriesSchema>;

// Keeps (page - 1) * limit well inside what MongoDB accepts as a skip
export const MAX_PAGE = 10_000;

const page = z.coerce.number().int().min(1).max(MAX_PAGE).default(1);
const limit = z.coerce.number().int().min(1).optional();

export const entryListQuerySchema = z.object({
    page,
    limit,
    sort: z.enum(['asc', 'desc']).default('desc')
});

export const searchQuerySchema = z.object({ page, limit });
