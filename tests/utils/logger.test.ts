import type { MockInstance } from 'vitest';
import { createLogger, resetLogLevel, setLogLevel } from '../../src/utils/logger.js';

describe('logger', () => {
    let stderr: MockInstance<Parameters<typeof console.error>, void>;

    beforeEach(() => {
        resetLogLevel();
        stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    });

    afterEach(() => {
        stderr.mockRestore();
        vi.unstubAllEnvs();
        resetLogLevel();
    });

    it('should tag lines with level and nested prefix', () => {
        setLogLevel('debug');
        createLogger('Archetypes').child('Dual').debug('Merged Warrior and Scout');

        expect(stderr).toHaveBeenCalledTimes(1);
        expect(String(stderr.mock.calls[0][0]))
            .toMatch(/^\[\d{2}:\d{2}:\d{2}\.\d{3}\] \[DEBUG\] \[Archetypes:Dual\] Merged Warrior and Scout$/);
    });

    it('should drop messages below the active level', () => {
        setLogLevel('warn');
        const log = createLogger('Chargen');

        log.info('Applied Warrior');
        log.warn('Character is already a Warrior');

        expect(stderr).toHaveBeenCalledTimes(1);
        expect(log.isEnabled('debug')).toBe(false);
        expect(log.isEnabled('error')).toBe(true);
    });

    it('should read the level from TRAITS_LOG_LEVEL', () => {
        vi.stubEnv('TRAITS_LOG_LEVEL', 'Debug');
        expect(createLogger('Env').isEnabled('debug')).toBe(true);
    });

    it('should stay silent under NODE_ENV=test when no level is set', () => {
        vi.stubEnv('TRAITS_LOG_LEVEL', '');
        vi.stubEnv('NODE_ENV', 'test');

        createLogger('Env').error('hidden');
        expect(stderr).not.toHaveBeenCalled();
    });

    it('should ignore an unknown TRAITS_LOG_LEVEL', () => {
        vi.stubEnv('TRAITS_LOG_LEVEL', 'loud');
        vi.stubEnv('NODE_ENV', 'production');

        const log = createLogger('Env');
        expect(log.isEnabled('info')).toBe(true);
        expect(log.isEnabled('debug')).toBe(false);
    });
});
