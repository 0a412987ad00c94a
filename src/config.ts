/**
 * Engine configuration, read from the environment.
 *
 * Environment:
 *   TRAITS_LOG_LEVEL=debug|info|warn|error|silent (default: info, silent under NODE_ENV=test)
 *   TRAITS_PRIMARY_POINTS=<positive integer> (default: 30)
 */

import { z } from 'zod';

export const DEFAULT_PRIMARY_POINTS = 30;

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const EngineConfigSchema = z.object({
    logLevel: LogLevelSchema.optional(),
    primaryPoints: z.coerce.number().int().positive().default(DEFAULT_PRIMARY_POINTS)
        .describe('Points a character must spend on primary traits during chargen')
});

export type EngineConfig = z.infer<typeof EngineConfigSchema>;

export class ConfigError extends Error {
    constructor(public issues: string[]) {
        super(`Invalid configuration: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): EngineConfig {
    const result = EngineConfigSchema.safeParse({
        // unset and empty are treated alike
        logLevel: env.TRAITS_LOG_LEVEL?.toLowerCase() || undefined,
        primaryPoints: env.TRAITS_PRIMARY_POINTS || undefined
    });

    if (!result.success) {
        throw new ConfigError(
            result.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
        );
    }
    return result.data;
}

let cachedConfig: EngineConfig | null = null;

export function getConfig(): EngineConfig {
    if (cachedConfig === null) {
        cachedConfig = loadConfig();
    }
    return cachedConfig;
}

/**
 * Drop the cached config so the next getConfig() re-reads the environment
 */
export function resetConfig(): void {
    cachedConfig = null;
}
