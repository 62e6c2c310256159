import { describe, it, expect, vi, afterEach } from 'vitest';
import Logger from '../src/logger.js';
import { CipService } from '../src/constants/constants.js';
import type { LogLevel } from '../src/types/eip-types.js';

function collect(logger: Logger): Array<{ level: LogLevel; args: unknown[] }> {
  const seen: Array<{ level: LogLevel; args: unknown[] }> = [];
  logger.watch(({ level, args }) => seen.push({ level, args }));
  return seen;
}

describe('Logger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('should drop messages below the current level', () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const logger = new Logger();
    const seen = collect(logger);
    logger.setLevel('warn');

    logger.info('skipped');
    logger.warn('kept');

    expect(seen).toEqual([{ level: 'warn', args: ['kept'] }]);
    expect(logger.getCounts().warn).toBe(1);
    expect(logger.getCounts().info).toBe(0);
  });

  it('should print the configured header fields from the context', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger();
    logger.disableColors();
    logger.setLogFormat(['level', 'variable', 'size']);

    logger.info('Read done', { variable: 'Speed', size: 4 });

    expect(info).toHaveBeenCalledWith('[INFO][V:Speed][N:4]', 'Read done', '');
  });

  it('should apply category levels to named loggers', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger();
    const seen = collect(logger);
    const session = logger.createLogger('EipSession');

    session.setLevel('error');
    session.info('hidden');
    logger.info('shown');

    expect(seen.map(entry => entry.args)).toEqual([['shown']]);
  });

  it('should mute a CIP service until it is unmuted', () => {
    vi.spyOn(console, 'info').mockImplementation(() => undefined);
    const logger = new Logger();
    const seen = collect(logger);

    logger.mute({ service: CipService.READ_TAG });
    logger.info('read', { service: CipService.READ_TAG });
    logger.unmute({ service: CipService.READ_TAG });
    logger.info('read again', { service: CipService.READ_TAG });

    expect(seen.map(entry => entry.args)).toEqual([['read again']]);
  });

  it('should require a logger name', () => {
    expect(() => new Logger().createLogger('')).toThrow('Logger name required');
  });
});
