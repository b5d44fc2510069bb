/**
 * Runtime configuration
 *
 * DEFAULTS overridden by TRUTHTABLE_* environment variables.
 */

import { z } from 'zod';
import { DEFAULTS } from './types/options.js';
import type { AppConfig } from './types/options.js';
import { createGenericError } from './types/errors.js';

const EnvSchema = z.object({
    TRUTHTABLE_MAX_VARIABLES: z.coerce.number().int().min(0).max(26).optional(),
    TRUTHTABLE_DELIMITER: z.enum(['comma', 'tab']).optional(),
    TRUTHTABLE_VERBOSITY: z.enum(['minimal', 'standard', 'detailed']).optional(),
});

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
    const parsed = EnvSchema.safeParse(env);
    if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw createGenericError(
            'INVALID_ARGUMENT',
            `Invalid configuration ${issue?.path.join('.') ?? ''}: ${issue?.message ?? 'unknown error'}`,
            { issues: parsed.error.issues }
        );
    }

    const { TRUTHTABLE_MAX_VARIABLES, TRUTHTABLE_DELIMITER, TRUTHTABLE_VERBOSITY } = parsed.data;
    return {
        maxVariables: TRUTHTABLE_MAX_VARIABLES ?? DEFAULTS.maxVariables,
        delimiter: TRUTHTABLE_DELIMITER === 'tab' ? '\t' : DEFAULTS.delimiter,
        verbosity: TRUTHTABLE_VERBOSITY ?? DEFAULTS.verbosity,
    };
}
