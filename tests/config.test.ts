import { ConfigError, DEFAULT_PRIMARY_POINTS, loadConfig } from '../src/config.js';

describe('config', () => {
    it('should fall back to defaults', () => {
        const config = loadConfig({});
        expect(config.primaryPoints).toBe(DEFAULT_PRIMARY_POINTS);
        expect(config.logLevel).toBeUndefined();
    });

    it('should treat empty values as unset', () => {
        expect(loadConfig({ TRAITS_LOG_LEVEL: '', TRAITS_PRIMARY_POINTS: '' }).primaryPoints).toBe(30);
    });

    it('should read values from the environment', () => {
        expect(loadConfig({ TRAITS_LOG_LEVEL: 'WARN', TRAITS_PRIMARY_POINTS: '24' })).toEqual({
            logLevel: 'warn',
            primaryPoints: 24
        });
    });

    it('should reject a non-positive point total', () => {
        expect(() => loadConfig({ TRAITS_PRIMARY_POINTS: '-3' })).toThrow(ConfigError);
    });

    it('should name the offending setting', () => {
        try {
            loadConfig({ TRAITS_LOG_LEVEL: 'loud' });
            expect.unreachable();
        } catch (error) {
            expect(error).toBeInstanceOf(ConfigError);
            if (error instanceof ConfigError) {
                expect(error.issues).toHaveLength(1);
                expect(error.issues[0]).toMatch(/^logLevel: /);
            }
        }
    });
});
