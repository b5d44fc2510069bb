import type { z } from 'zod';
import { createGenericError } from '../types/errors.js';

/**
 * Validate raw tool arguments against a schema.
 * Throws an INVALID_ARGUMENT LogicException naming the first bad field.
 */
export function parseArgs<S extends z.ZodTypeAny>(schema: S, rawArgs: unknown): z.infer<S> {
    const parsed = schema.safeParse(rawArgs ?? {});
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? `'${issue.path.join('.')}'` : 'arguments';
        throw createGenericError(
            'INVALID_ARGUMENT',
            `Invalid ${field}: ${issue?.message ?? 'validation failed'}`,
            { issues: parsed.error.issues }
        );
    }
    return parsed.data;
}
