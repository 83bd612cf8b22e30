import type { Request, Response } from 'express';
import { StatusCodes } from 'http-status-codes';
import { getAuthContext } from '../../../api/middleware/require-auth.js';
import type { DiaryService } from '../services/index.js';
import {
    entryListQuerySchema,
    searchQuerySchema,
    type CreateDiaryBody,
    type CreateEntryBody,
    type SearchEntriesBody,
    type UpdateDiaryBody
} from './diary.schemas.js';

/**
 * Controller for the diaries module REST API, mounted at /api/v1/diaries.
 *
 * Every operation is scoped to the authenticated user. Diaries owned by
 * someone else answer 404, exactly like missing ones.
 */
export class DiaryController {
    constructor(private readonly diaryService: DiaryService) {}

    /**
     * GET /api/v1/diaries
     */
    async list(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        res.json(await this.diaryService.listDiaries(userId));
    }

    /**
     * POST /api/v1/diaries
     *
     * Body: { title, description?, coverImage? }
     */
    async create(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: CreateDiaryBody = req.body;
        res.status(StatusCodes.CREATED).json(await this.diaryService.createDiary(userId, body));
    }

    /**
     * GET /api/v1/diaries/:diaryId
     */
    async get(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        res.json(await this.diaryService.getDiary(userId, req.params.diaryId));
    }

    /**
     * PUT /api/v1/diaries/:diaryId
     */
    async update(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: UpdateDiaryBody = req.body;
        res.json(await this.diaryService.updateDiary(userId, req.params.diaryId, body));
    }

    /**
     * DELETE /api/v1/diaries/:diaryId
     *
     * Removes the diary and all of its entries. Responds 204.
     */
    async remove(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        await this.diaryService.deleteDiary(userId, req.params.diaryId);
        res.status(StatusCodes.NO_CONTENT).end();
    }

    /**
     * GET /api/v1/diaries/:diaryId/entries?page&limit&sort
     *
     * Response: { entries, pagination: { currentPage, totalPages, totalEntries, entriesPerPage } }
     */
    async listEntries(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const query = entryListQuerySchema.parse(req.query);
        res.json(await this.diaryService.listEntries(userId, req.params.diaryId, query));
    }

    /**
     * POST /api/v1/diaries/:diaryId/entries
     */
    async createEntry(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: CreateEntryBody = req.body;
        res.status(StatusCodes.CREATED).json(await this.diaryService.createEntry(userId, req.params.diaryId, body));
    }

    /**
     * POST /api/v1/diaries/search?page&limit
     *
     * Body: { query?, tags?, startDate?, endDate? }
     * Response: { entries, searchInfo, pagination }
     */
    async search(req: Request, res: Response): Promise<void> {
        const { userId } = getAuthContext(req);
        const body: SearchEntriesBody = req.body;
        const query = searchQuerySchema.parse(req.query);
        res.json(await this.diaryService.searchEntries(userId, body, query));
    }
}
