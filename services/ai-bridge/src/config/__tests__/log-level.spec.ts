import { Logger } from '@nestjs/common';
import { applyLogLevel, isBridgeLogLevel, toNestLogLevels } from '../log-level';

describe('log levels', () => {
  it('should enable every level at or above the configured one', () => {
    expect(toNestLogLevels('debug')).toEqual(['fatal', 'error', 'warn', 'log', 'debug', 'verbose']);
    expect(toNestLogLevels('info')).toEqual(['fatal', 'error', 'warn', 'log']);
    expect(toNestLogLevels('warn')).toEqual(['fatal', 'error', 'warn']);
    expect(toNestLogLevels('error')).toEqual(['fatal', 'error']);
  });

  it('should recognise bridge log levels', () => {
    expect(isBridgeLogLevel('info')).toBe(true);
    expect(isBridgeLogLevel('verbose')).toBe(false);
  });

  it('should apply the levels to the Nest logger', () => {
    const overrideLogger = jest.spyOn(Logger, 'overrideLogger').mockImplementation(() => undefined);

    applyLogLevel('error');

    expect(overrideLogger).toHaveBeenCalledWith(['fatal', 'error']);
    overrideLogger.mockRestore();
  });
});
