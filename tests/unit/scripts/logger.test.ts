/**
 * @format
 * Script Logger Unit Tests
 */

import logger, { LogLevel, resolveLogLevel } from '../../../scripts/logger';

describe('logger', () => {
    const saved = { ...process.env };
    let log: jest.SpyInstance;

    beforeEach(() => {
        delete process.env.LOG_LEVEL;
        delete process.env.ENVIRONMENT;
        log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        log.mockClear();
    });

    afterEach(() => {
        process.env = { ...saved };
    });

    describe('resolveLogLevel', () => {
        it('should prefer an explicit LOG_LEVEL', () => {
            process.env.LOG_LEVEL = 'WARN';
            process.env.ENVIRONMENT = 'development';

            expect(resolveLogLevel()).toBe(LogLevel.WARN);
        });

        it('should use info for production and staging', () => {
            process.env.ENVIRONMENT = 'staging';

            expect(resolveLogLevel()).toBe(LogLevel.INFO);
        });

        it('should fall back to debug on an unknown LOG_LEVEL', () => {
            process.env.LOG_LEVEL = 'trace';

            expect(resolveLogLevel()).toBe(LogLevel.DEBUG);
        });
    });

    describe('setEnvironment', () => {
        it('should hide debug output for production', () => {
            logger.setEnvironment('production');
            logger.debug('hidden');

            expect(log).not.toHaveBeenCalled();
        });

        it('should show debug output for development', () => {
            logger.setEnvironment('development');
            logger.debug('shown');

            expect(log).toHaveBeenCalledTimes(1);
        });

        it('should keep an explicit LOG_LEVEL', () => {
            logger.setEnvironment('development');
            process.env.LOG_LEVEL = 'error';
            logger.setEnvironment('production');
            logger.debug('still shown');

            expect(log).toHaveBeenCalledTimes(1);
        });
    });

    it('should print the message after the status mark', () => {
        logger.success('instance/production');

        expect(log).toHaveBeenCalledWith(expect.any(String), 'instance/production');
    });
});
