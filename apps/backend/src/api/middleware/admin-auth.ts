import type { NextFunction, Request, Response } from 'express';
import { env } from '../../config/env.js';

const DEFAULT_ACTOR = 'admin';

function firstHeader(value: string | string[] | undefined): string | undefined {
    return Array.isArray(value) ? value[0] : value;
}

/**
 * Admin authentication middleware.
 *
 * Validates admin access using ADMIN_API_TOKEN from environment. Tokens are
 * accepted from the `x-admin-token` header or an `Authorization: Bearer` header,
 * never from the query string.
 *
 * On success `req.actor` is set from the `x-admin-user` header (default
 * `admin`); services record it in the createdBy/updatedBy audit fields.
 */
export function requireAdmin(req: Request, res: Response, next: NextFunction) {
    if (!env.ADMIN_API_TOKEN) {
        res.status(503).json({ success: false, error: 'Admin API disabled' });
        return;
    }

    let candidate = firstHeader(req.headers['x-admin-token']);

    if (!candidate) {
        const authHeader = firstHeader(req.headers['authorization']);
        if (authHeader && authHeader.startsWith('Bearer ')) {
            candidate = authHeader.substring(7);
        }
    }

    if (candidate !== env.ADMIN_API_TOKEN) {
        res.status(401).json({ success: false, error: 'Unauthorized' });
        return;
    }

    const actor = firstHeader(req.headers['x-admin-user'])?.trim();
    req.actor = actor ? actor.slice(0, 100) : DEFAULT_ACTOR;

    next();
}
