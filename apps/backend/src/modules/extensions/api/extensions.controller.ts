import type { Request, Response } from 'express';
import { z } from 'zod';
import type { IExtensionService } from '@enfyra/types';
import { NotFoundError } from '../../../lib/errors.js';
import { parseIdParam } from '../../../lib/params.js';

const MAX_SOURCE_LENGTH = 500_000;

const createExtensionSchema = z.object({
    name: z.string().min(1).max(100),
    type: z.enum(['page', 'widget']).optional(),
    description: z.string().max(2000).nullable().optional(),

    /**
     * Semantic version, checked again by the service.
     */
    version: z.string().max(50).optional(),

    isEnabled: z.boolean().optional(),
    isSystem: z.boolean().optional(),

    /**
     * Vue SFC source. Compiled on every save.
     */
    code: z.string().min(1).max(MAX_SOURCE_LENGTH),

    /**
     * Menu the page is reached through. Null unlinks.
     */
    menuId: z.number().int().positive().nullable().optional()
});

const updateExtensionSchema = createExtensionSchema.omit({ isSystem: true }).partial();

const listQuerySchema = z.object({
    type: z.enum(['page', 'widget']).optional(),
    isEnabled: z.enum(['true', 'false']).transform(value => value === 'true').optional(),
    search: z.string().max(200).optional(),
    limit: z.coerce.number().int().min(1).max(200).optional(),
    skip: z.coerce.number().int().min(0).optional()
});

const compileSchema = z.object({
    code: z.string().min(1).max(MAX_SOURCE_LENGTH)
});

/**
 * Admin HTTP handlers for extensions, mounted at /api/extensions behind
 * requireAdmin. The acting user recorded in createdBy/updatedBy comes from
 * `req.actor`.
 */
export class ExtensionsController {
    constructor(private readonly service: IExtensionService) {}

    /**
     * GET /api/extensions?type=page&isEnabled=true&search=report&limit=20&skip=0
     *
     * Responds with `{ success, extensions, stats }`; stats are unfiltered totals.
     */
    list = async (req: Request, res: Response): Promise<void> => {
        const filter = listQuerySchema.parse(req.query);
        const [extensions, stats] = await Promise.all([this.service.list(filter), this.service.getStats()]);
        res.json({ success: true, extensions, stats });
    };

    /**
     * GET /api/extensions/:id
     */
    get = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const extension = await this.service.getById(id);
        if (!extension) {
            throw new NotFoundError(`Extension not found: ${id}`);
        }
        res.json({ success: true, extension });
    };

    /**
     * POST /api/extensions
     *
     * Responds 201. A source that does not compile is rejected with 422 and the
     * issues in `details`.
     */
    create = async (req: Request, res: Response): Promise<void> => {
        const input = createExtensionSchema.parse(req.body);
        const extension = await this.service.create(input, req.actor ?? null);
        res.status(201).json({ success: true, extension });
    };

    /**
     * PATCH /api/extensions/:id
     */
    update = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const patch = updateExtensionSchema.parse(req.body);
        const extension = await this.service.update(id, patch, req.actor ?? null);
        res.json({ success: true, extension });
    };

    /**
     * POST /api/extensions/:id/enable
     */
    enable = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const extension = await this.service.setEnabled(id, true, req.actor ?? null);
        res.json({ success: true, extension });
    };

    /**
     * POST /api/extensions/:id/disable
     */
    disable = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const extension = await this.service.setEnabled(id, false, req.actor ?? null);
        res.json({ success: true, extension });
    };

    /**
     * DELETE /api/extensions/:id
     */
    delete = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        await this.service.delete(id);
        res.json({ success: true });
    };

    /**
     * POST /api/extensions/compile
     *
     * Compiles a source without saving it so the editor can show errors early.
     */
    compile = async (req: Request, res: Response): Promise<void> => {
        const { code } = compileSchema.parse(req.body);
        const result = this.service.compilePreview(code);
        res.json({ success: true, result });
    };
}
