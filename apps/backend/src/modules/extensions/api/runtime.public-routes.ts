import { Router } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { RuntimeController } from './runtime.controller.js';

/**
 * Create the public runtime router, mounted at /api/runtime without authentication.
 */
export function createRuntimeRouter(controller: RuntimeController): Router {
    const router = Router();

    /**
     * GET /api/runtime/pages?path=/reports
     */
    router.get('/pages', asyncHandler(controller.getPage));

    /**
     * GET /api/runtime/widgets/:id
     */
    router.get('/widgets/:id', asyncHandler(controller.getWidget));

    return router;
}
