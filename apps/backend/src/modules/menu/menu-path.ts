const VALID_MENU_PATH = /^\/[A-Za-z0-9/_-]*$/;

/**
 * Normalise a menu path for storage and lookup.
 *
 * Trims whitespace, forces a single leading slash, collapses repeated slashes
 * and drops a trailing slash (the root path `/` is kept).
 *
 * @example
 * normalizeMenuPath('reports/')      // '/reports'
 * normalizeMenuPath('//tools//logs') // '/tools/logs'
 * normalizeMenuPath('/a b')          // null
 *
 * @returns The normalised path, or null when the input is empty or contains
 *          characters outside `A-Z a-z 0-9 / _ -`
 */
export function normalizeMenuPath(raw: string): string | null {
    const trimmed = raw.trim();
    if (!trimmed) {
        return null;
    }

    let path = `/${trimmed}`.replace(/\/{2,}/g, '/');
    if (path.length > 1 && path.endsWith('/')) {
        path = path.slice(0, -1);
    }

    return VALID_MENU_PATH.test(path) ? path : null;
}
