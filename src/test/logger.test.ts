import { logger, setLogLevel } from '../helpers/logger';
import { muteConsole } from './fixtures';

describe('logger', () => {
    muteConsole();

    afterEach(() => {
        setLogLevel('info');
    });

    it('should drop debug messages at the default level', () => {
        logger.debug('🔍 hidden');
        logger.info('✅ shown');

        expect(console.debug).not.toHaveBeenCalled();
        expect(console.log).toHaveBeenCalledWith('✅ shown');
    });

    it('should drop messages below the configured level', () => {
        setLogLevel('warn');

        logger.info('✅ hidden');
        logger.warn('⚠️  shown');

        expect(console.log).not.toHaveBeenCalled();
        expect(console.warn).toHaveBeenCalledWith('⚠️  shown');
    });

    it('should always print errors with the error object', () => {
        setLogLevel('error');
        const error = new Error('boom');

        logger.warn('⚠️  hidden');
        logger.error('❌ failed:', error);
        logger.error('❌ failed');

        expect(console.warn).not.toHaveBeenCalled();
        expect(console.error).toHaveBeenNthCalledWith(1, '❌ failed:', error);
        expect(console.error).toHaveBeenNthCalledWith(2, '❌ failed');
    });

    it('should pass extra data through at debug level', () => {
        setLogLevel('debug');

        logger.debug('🔍 params', { page: 1 });

        expect(console.debug).toHaveBeenCalledWith('🔍 params', { page: 1 });
    });
});
