// tests/utils/logger.test.ts
// src/main/utils/logger.ts
//
// npx jest tests/utils/logger.test.ts --runInBand --no-cache;
//
import {setDebugEnabled, dbg, info, warn, err} from '../../src/main/utils/logger';

describe('logger', () => {
    let logSpy: jest.SpyInstance;
    let infoSpy: jest.SpyInstance;
    let warnSpy: jest.SpyInstance;
    let errorSpy: jest.SpyInstance;

    beforeEach(() => {
        // restoreMocks:true in jest config - spies must be set again before each test
        logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
        infoSpy = jest.spyOn(console, 'info').mockImplementation(() => undefined);
        warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
        errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);

        setDebugEnabled(false);
    });

    test('dbg does nothing when debug disabled', () => {
        dbg('a', 1);
        expect(logSpy).not.toHaveBeenCalled();
    });

    test('dbg logs when debug enabled', () => {
        setDebugEnabled(true);
        dbg('a', 1);
        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(logSpy).toHaveBeenCalledWith('[EventDays][a]', 1);
    });

    test('info always logs with prefix', () => {
        info('x', 'hello');
        expect(infoSpy).toHaveBeenCalledWith('[EventDays][x]', 'hello');
    });

    test('warn logs with prefix', () => {
        warn('w');
        expect(warnSpy).toHaveBeenCalledWith('[EventDays][w]');
    });

    test('err logs with prefix', () => {
        err('e');
        expect(errorSpy).toHaveBeenCalledWith('[EventDays][e]');
    });

    test('setDebugEnabled affects subsequent dbg calls', () => {
        dbg('no');
        setDebugEnabled(true);
        dbg('yes');
        setDebugEnabled(false);
        dbg('no2');

        expect(logSpy).toHaveBeenCalledTimes(1);
        expect(logSpy).toHaveBeenCalledWith('[EventDays][yes]');
    });
});
