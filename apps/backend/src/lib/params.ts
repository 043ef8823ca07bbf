import { ValidationError } from './errors.js';

/**
 * Parse a numeric route parameter such as `/api/menu/:id`.
 *
 * @throws ValidationError when the value is not a positive integer
 */
export function parseIdParam(value: string | undefined, name = 'id'): number {
    if (value === undefined || !/^\d+$/.test(value)) {
        throw new ValidationError(`Parameter "${name}" must be a positive integer`);
    }
    const id = Number(value);
    if (!Number.isSafeInteger(id) || id < 1) {
        throw new ValidationError(`Parameter "${name}" must be a positive integer`);
    }
    return id;
}
