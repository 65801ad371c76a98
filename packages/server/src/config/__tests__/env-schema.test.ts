import { ConfigValidationError } from '../../errors';
import { loadConfigFromEnv, validateEnv } from '../env-schema';

describe('validateEnv', () => {
    describe('defaults', () => {
        it('applies a default for every variable', () => {
            expect(validateEnv({})).toEqual({
                NODE_ENV: 'development',
                LOG_LEVEL: 'info',
                COTMESH_SWEEP_INTERVAL_MS: 5000,
                COTMESH_STALE_GRACE_MS: 60000,
                COTMESH_MAX_MARKERS: 10000,
                COTMESH_CACHE_RETENTION_MS: 60000,
                COTMESH_CACHE_PRUNE_INTERVAL_MS: 30000,
            });
        });

        it('ignores unrelated variables', () => {
            expect(validateEnv({ PATH: '/usr/bin', HOME: '/root' })).not.toHaveProperty('PATH');
        });
    });

    describe('coercion', () => {
        it('reads numbers from strings', () => {
            const config = validateEnv({
                NODE_ENV: 'production',
                LOG_LEVEL: 'warn',
                COTMESH_MAX_MARKERS: '250',
                COTMESH_STALE_GRACE_MS: '0',
            });

            expect(config.NODE_ENV).toBe('production');
            expect(config.LOG_LEVEL).toBe('warn');
            expect(config.COTMESH_MAX_MARKERS).toBe(250);
            expect(config.COTMESH_STALE_GRACE_MS).toBe(0);
        });
    });

    describe('validation', () => {
        it('rejects values that are not numbers', () => {
            expect(() => validateEnv({ COTMESH_MAX_MARKERS: 'lots' })).toThrow(ConfigValidationError);
        });

        it('rejects non-positive intervals', () => {
            expect(() => validateEnv({ COTMESH_CACHE_PRUNE_INTERVAL_MS: '0' })).toThrow(
                'Invalid environment:\n  - COTMESH_CACHE_PRUNE_INTERVAL_MS: Number must be greater than 0'
            );
        });

        it('rejects an unknown log level', () => {
            expect(() => validateEnv({ LOG_LEVEL: 'loud' })).toThrow(/LOG_LEVEL/);
        });

        it('rejects a sweep interval longer than the grace period', () => {
            expect(() => validateEnv({ COTMESH_SWEEP_INTERVAL_MS: '90000' })).toThrow(
                'Invalid environment:\n  - COTMESH_SWEEP_INTERVAL_MS: COTMESH_SWEEP_INTERVAL_MS must not exceed COTMESH_STALE_GRACE_MS'
            );
        });

        it('allows any sweep interval when the grace period is zero', () => {
            expect(validateEnv({ COTMESH_SWEEP_INTERVAL_MS: '90000', COTMESH_STALE_GRACE_MS: '0' }).COTMESH_SWEEP_INTERVAL_MS).toBe(
                90000
            );
        });

        it('lists every offending variable', () => {
            try {
                validateEnv({ COTMESH_MAX_MARKERS: '-1', COTMESH_CACHE_RETENTION_MS: '-5' });
                throw new Error('expected validation to fail');
            } catch (e) {
                expect(e).toBeInstanceOf(ConfigValidationError);
                const paths = e instanceof ConfigValidationError ? e.issues.map((issue) => issue.path.join('.')) : [];
                expect(paths.sort()).toEqual(['COTMESH_CACHE_RETENTION_MS', 'COTMESH_MAX_MARKERS']);
            }
        });
    });
});

describe('loadConfigFromEnv', () => {
    it('groups settings per component', () => {
        expect(loadConfigFromEnv({ COTMESH_MAX_MARKERS: '250', COTMESH_CACHE_RETENTION_MS: '1000' })).toEqual({
            markerStore: { sweepIntervalMs: 5000, staleGracePeriodMs: 60000, maxMarkers: 250 },
            federation: { cacheRetentionMs: 1000, cachePruneIntervalMs: 30000 },
        });
    });
});
