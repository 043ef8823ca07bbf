import type { NextFunction, Request, Response } from 'express';

/**
 * Wrap an async route handler so rejected promises reach the error middleware.
 *
 * @example
 * router.post('/:id/enable', asyncHandler(controller.enable));
 */
export function asyncHandler(
    fn: (req: Request, res: Response, next: NextFunction) => Promise<void>
) {
    return (req: Request, res: Response, next: NextFunction) => {
        Promise.resolve(fn(req, res, next)).catch(next);
    };
}
