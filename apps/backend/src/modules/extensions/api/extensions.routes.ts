import { Router } from 'express';
import { asyncHandler } from '../../../api/middleware/async-handler.js';
import type { ExtensionsController } from './extensions.controller.js';

/**
 * Create the admin router for extension management.
 *
 * Authentication is applied by the module when mounting at /api/extensions.
 */
export function createExtensionsRouter(controller: ExtensionsController): Router {
    const router = Router();

    router.get('/', asyncHandler(controller.list));

    // Must come before /:id routes
    router.post('/compile', asyncHandler(controller.compile));

    router.post('/', asyncHandler(controller.create));
    router.get('/:id', asyncHandler(controller.get));
    router.patch('/:id', asyncHandler(controller.update));
    router.post('/:id/enable', asyncHandler(controller.enable));
    router.post('/:id/disable', asyncHandler(controller.disable));
    router.delete('/:id', asyncHandler(controller.delete));

    return router;
}
