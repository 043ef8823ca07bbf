import type { Request, Response } from 'express';
import type { IExtensionService } from '@enfyra/types';
import { NotFoundError, ValidationError } from '../../../lib/errors.js';
import { parseIdParam } from '../../../lib/params.js';

/**
 * Public handlers the dashboard runtime loads extensions through.
 *
 * Pages are only ever served by menu path and widgets by id; anything disabled
 * or unlinked answers 404.
 */
export class RuntimeController {
    constructor(private readonly service: IExtensionService) {}

    /**
     * GET /api/runtime/pages?path=/reports
     */
    getPage = async (req: Request, res: Response): Promise<void> => {
        const { path } = req.query;
        if (typeof path !== 'string' || !path.trim()) {
            throw new ValidationError('Query parameter "path" is required');
        }

        const extension = await this.service.resolvePage(path);
        if (!extension) {
            throw new NotFoundError(`No page extension for path "${path}"`);
        }
        res.json({ success: true, extension });
    };

    /**
     * GET /api/runtime/widgets/:id
     */
    getWidget = async (req: Request, res: Response): Promise<void> => {
        const id = parseIdParam(req.params.id);
        const extension = await this.service.resolveWidget(id);
        if (!extension) {
            throw new NotFoundError(`No widget extension with id ${id}`);
        }
        res.json({ success: true, extension });
    };
}
