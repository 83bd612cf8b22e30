import type { NextFunction, Request, Response } from 'express';

/**
 * Async handler wrapper for Express route handlers.
 *
 * Catches errors thrown by async handlers, and rejections of the promise they
 * return, and passes them to the Express error middleware.
 *
 * @param fn - Route handler, sync or async
 * @returns Wrapped function that forwards failures to next()
 *
 * @example
 * router.post('/endpoint', asyncHandler(async (req, res) => {
 *   const data = await someAsyncOperation();
 *   res.json(data);
 * }));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => void | Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve()
            .then(() => fn(req, res, next))
            .catch(next);
    };
}
