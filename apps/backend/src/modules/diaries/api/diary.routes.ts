import type { IApiRouteConfig } from '@everly/types';
import { validateBody } from '../../../api/middleware/validate.js';
import type { DiaryController } from './diary.controller.js';
import { createDiarySchema, createEntrySchema, searchEntriesSchema, updateDiarySchema } from './diary.schemas.js';

export function createDiaryRoutes(controller: DiaryController): IApiRouteConfig[] {
    return [
        {
            method: 'POST',
            path: '/search',
            requiresAuth: true,
            middleware: [validateBody(searchEntriesSchema)],
            handler: controller.search.bind(controller),
            description: 'Search entries across all diaries'
        },
        {
            method: 'GET',
            path: '/',
            requiresAuth: true,
            handler: controller.list.bind(controller),
            description: 'List diaries'
        },
        {
            method: 'POST',
            path: '/',
            requiresAuth: true,
            middleware: [validateBody(createDiarySchema)],
            handler: controller.create.bind(controller),
            description: 'Create a diary'
        },
        {
            method: 'GET',
            path: '/:diaryId',
            requiresAuth: true,
            handler: controller.get.bind(controller),
            description: 'Get a diary'
        },
        {
            method: 'PUT',
            path: '/:diaryId',
            requiresAuth: true,
            middleware: [validateBody(updateDiarySchema)],
            handler: controller.update.bind(controller),
            description: 'Update a diary'
        },
        {
            method: 'DELETE',
            path: '/:diaryId',
            requiresAuth: true,
            handler: controller.remove.bind(controller),
            description: 'Delete a diary and its entries'
        },
        {
            method: 'GET',
            path: '/:diaryId/entries',
            requiresAuth: true,
            handler: controller.listEntries.bind(controller),
            description: 'List entries of a diary, paginated'
        },
        {
            method: 'POST',
            path: '/:diaryId/entries',
            requiresAuth: true,
            middleware: [validateBody(createEntrySchema)],
            handler: controller.createEntry.bind(controller),
            description: 'Add an entry to a diary'
        }
    ];
}
