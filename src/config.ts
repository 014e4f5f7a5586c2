/**
 * Runtime configuration.
 *
 * Values come from DEFAULTS, overridden by environment variables
 * (the CLI loads a .env file first through dotenv). The library itself
 * runs resolution uncapped; interactive sessions get SHELL_MAX_RESOLUTIONS.
 */

import { z } from 'zod';
import { ConfigurationError } from './types/errors.js';
import { DEFAULTS } from './types/options.js';

export const SHELL_MAX_RESOLUTIONS = 100000;

const integerFromEnv = (fallback: number, min: number) =>
    z.coerce.number().int().min(min).default(fallback);

const envSchema = z.object({
    BELIEF_DEFAULT_ENTRENCHMENT: integerFromEnv(DEFAULTS.entrenchment, Number.MIN_SAFE_INTEGER),
    BELIEF_MAX_RESOLUTIONS: integerFromEnv(SHELL_MAX_RESOLUTIONS, 1),
    BELIEF_MAX_CLAUSES: integerFromEnv(DEFAULTS.maxClauses, 1),
});

export interface BeliefConfig {
    defaultEntrenchment: number;
    maxResolutions: number;
    maxClauses: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): BeliefConfig {
    // Blank variables fall back to their defaults
    const present = Object.fromEntries(
        Object.entries(env).filter(([, value]) => value !== undefined && value.trim() !== '')
    );
    const result = envSchema.safeParse(present);
    if (!result.success) {
        const issue = result.error.issues[0];
        throw new ConfigurationError(
            `Invalid ${issue.path.join('.')}: ${issue.message}`,
            { issues: result.error.issues.map(i => ({ path: i.path.join('.'), message: i.message })) }
        );
    }
    return {
        defaultEntrenchment: result.data.BELIEF_DEFAULT_ENTRENCHMENT,
        maxResolutions: result.data.BELIEF_MAX_RESOLUTIONS,
        maxClauses: result.data.BELIEF_MAX_CLAUSES,
    };
}
