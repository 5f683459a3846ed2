/**
 * Runtime configuration, read from the environment.
 *
 * Environment:
 *   ROOMGEN_LOG_LEVEL=debug|info|warn|error|silent   (default: info, silent under NODE_ENV=test)
 *   ROOMGEN_DATA_DIR=<dir>                           directory holding catalog.db (default: cwd)
 *   ROOMGEN_SEED=<string>                            seed for the service's random source
 */

import path from 'path';
import { z } from 'zod';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);
export type LogLevel = z.infer<typeof LogLevelSchema>;

const EnvSchema = z.object({
    ROOMGEN_LOG_LEVEL: z.string().optional()
        .transform(value => value?.trim().toLowerCase())
        .pipe(LogLevelSchema.optional())
        .catch(undefined),
    ROOMGEN_DATA_DIR: z.string().min(1).optional(),
    ROOMGEN_SEED: z.string().min(1).optional(),
    NODE_ENV: z.string().optional()
});

export interface RoomgenConfig {
    logLevel: LogLevel;
    dataDir: string;
    seed?: string;
    isTest: boolean;
}

/**
 * Parse configuration from an environment map. An unrecognised log level
 * falls back to the default rather than failing startup.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): RoomgenConfig {
    const values = EnvSchema.parse(env);

    const isTest = values.NODE_ENV === 'test';

    return {
        logLevel: values.ROOMGEN_LOG_LEVEL ?? (isTest ? 'silent' : 'info'),
        dataDir: values.ROOMGEN_DATA_DIR ?? process.cwd(),
        seed: values.ROOMGEN_SEED,
        isTest
    };
}

/**
 * Catalog database location: in memory for tests, else <dataDir>/catalog.db
 */
export function resolveCatalogPath(config: RoomgenConfig = loadConfig()): string {
    return config.isTest ? ':memory:' : path.join(config.dataDir, 'catalog.db');
}
