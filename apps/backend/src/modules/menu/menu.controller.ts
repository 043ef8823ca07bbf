import type { Request, Response } from 'express';
import { z } from 'zod';
import type { IMenuService } from '@enfyra/types';
import { NotFoundError } from '../../lib/errors.js';
import { parseIdParam } from '../../lib/params.js';

/**
 * Zod schema for creating a menu.
 *
 * Validates the body of POST /api/menu. Path normalisation and uniqueness are
 * checked by the service, not here.
 */
const createMenuSchema = z.object({
    /**
     * `mini` for a sidebar group, `menu` for a navigation item. Defaults to `menu`.
     */
    type: z.enum(['mini', 'menu']).optional(),

    label: z.string().min(1).max(200),

    /**
     * Route path, normalised by the service (e.g. `reports/` becomes `/reports`).
     */
    path: z.string().min(1).max(500),

    icon: z.string().max(100).optional(),

    /**
     * Id of the sidebar group this item belongs to. Null or omitted for ungrouped items.
     */
    sidebarId: z.number().int().positive().nullable().optional(),

    /**
     * Sort order within the sidebar group. Lower numbers appear first.
     */
    order: z.number().int().min(0).optional(),

    isEnabled: z.boolean().optional(),
    description: z.string().max(1000).nullable().optional()
});

/**
 * Zod schema for PATCH /api/menu/:id. Every field is optional.
 */
const updateMenuSchema = createMenuSchema.partial();

/**
 * HTTP handlers for the menu API.
 *
 * Endpoints:
 * - GET    /api/menu      - Sidebar tree (public)
 * - GET    /api/menu/:id  - Single menu (public)
 * - POST   /api/menu      - Create (admin)
 * - PATCH  /api/menu/:id  - Update (admin)
 * - DELETE /api/menu/:id  - Delete (admin)
 *
 * Successful responses follow `{ "success": true, ... }`. Handlers throw
 * typed errors which the error middleware turns into
 * `{ "success": false, "error": "..." }` with the matching status.
 */
export class MenuController {
    constructor(private readonly service: IMenuService) {}

    /**
     * **Route:** GET /api/menu
     *
     * **Response:**
     * ```json
     * {
     *   "success": true,
     *   "tree": {
     *     "sidebars": [{ "id": 1, "type": "mini", "label": "Tools", "items": [...] }],
     *     "ungrouped": [...],
     *     "generatedAt": "2025-01-21T12:00:00.000Z"
     *   }
     * }
     * ```
     */
    getTree = async (_req: Request, res: Response): Promise<void> => {
        res.json({ success: true, tree: this.service.getTree() });
    };

    /**
     * **Route:** GET /api/menu/:id
     */
    getById = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const menu = this.service.getById(id);
        if (!menu) {
            throw new NotFoundError(`Menu not found: ${id}`);
        }
        res.json({ success: true, menu });
    };

    /**
     * Create a menu.
     *
     * **Route:** POST /api/menu
     *
     * **Request Body:**
     * ```json
     * { "label": "Reports", "path": "/reports", "sidebarId": 1, "order": 10 }
     * ```
     *
     * Responds 201 with `{ "success": true, "menu": {...} }`; 409 when the path is taken.
     */
    create = async (req: Request, res: Response): Promise<void> => {
        const input = createMenuSchema.parse(req.body);
        const menu = await this.service.create(input);
        res.status(201).json({ success: true, menu });
    };

    /**
     * Apply a partial update.
     *
     * **Route:** PATCH /api/menu/:id
     */
    update = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const patch = updateMenuSchema.parse(req.body);
        const menu = await this.service.update(id, patch);
        res.json({ success: true, menu });
    };

    /**
     * Delete a menu. A linked extension is kept and unlinked.
     *
     * **Route:** DELETE /api/menu/:id
     */
    delete = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        await this.service.delete(id);
        res.json({ success: true });
    };
}
