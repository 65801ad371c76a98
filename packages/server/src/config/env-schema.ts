import { z } from 'zod';
import { ConfigValidationError } from '../errors';
import type { MarkerStoreConfig } from '../markers/MarkerStore';
import type { FederationManagerConfig } from '../federation/FederationManager';

const EnvSchema = z
    .object({
        NODE_ENV: z
            .enum(['development', 'test', 'production'])
            .default('development'),

        LOG_LEVEL: z
            .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
            .default('info'),

        // Marker Store
        COTMESH_SWEEP_INTERVAL_MS: z.coerce
            .number()
            .int()
            .positive()
            .default(5000),
        COTMESH_STALE_GRACE_MS: z.coerce
            .number()
            .int()
            .nonnegative()
            .default(60000),
        COTMESH_MAX_MARKERS: z.coerce
            .number()
            .int()
            .positive()
            .default(10000),

        // Federation cache
        COTMESH_CACHE_RETENTION_MS: z.coerce
            .number()
            .int()
            .nonnegative()
            .default(60000),
        COTMESH_CACHE_PRUNE_INTERVAL_MS: z.coerce
            .number()
            .int()
            .positive()
            .default(30000),
    })
    .superRefine((data, ctx) => {
        if (data.COTMESH_SWEEP_INTERVAL_MS > data.COTMESH_STALE_GRACE_MS && data.COTMESH_STALE_GRACE_MS > 0) {
            ctx.addIssue({
                code: z.ZodIssueCode.custom,
                message: 'COTMESH_SWEEP_INTERVAL_MS must not exceed COTMESH_STALE_GRACE_MS',
                path: ['COTMESH_SWEEP_INTERVAL_MS'],
            });
        }
    });

export type EnvConfig = z.infer<typeof EnvSchema>;

/**
 * Validate environment variables, applying defaults.
 * @throws ConfigValidationError listing every offending variable
 */
export function validateEnv(env: NodeJS.ProcessEnv = process.env): EnvConfig {
    const result = EnvSchema.safeParse(env);
    if (!result.success) {
        throw new ConfigValidationError('environment', result.error.issues);
    }
    return result.data;
}

export interface EnvDerivedConfig {
    markerStore: Pick<MarkerStoreConfig, 'sweepIntervalMs' | 'staleGracePeriodMs' | 'maxMarkers'>;
    federation: Pick<FederationManagerConfig, 'cacheRetentionMs' | 'cachePruneIntervalMs'>;
}

export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): EnvDerivedConfig {
    const config = validateEnv(env);
    return {
        markerStore: {
            sweepIntervalMs: config.COTMESH_SWEEP_INTERVAL_MS,
            staleGracePeriodMs: config.COTMESH_STALE_GRACE_MS,
            maxMarkers: config.COTMESH_MAX_MARKERS,
        },
        federation: {
            cacheRetentionMs: config.COTMESH_CACHE_RETENTION_MS,
            cachePruneIntervalMs: config.COTMESH_CACHE_PRUNE_INTERVAL_MS,
        },
    };
}
