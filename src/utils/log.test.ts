import { describe, expect, it } from 'vitest';
import { Logger, type LogLevel } from './log.js';

function collect(level: LogLevel): { logger: Logger; lines: string[] } {
  const lines: string[] = [];
  return { logger: new Logger(level, (lvl, line) => lines.push(`${lvl}|${line}`)), lines };
}

describe('Logger', () => {
  it('drops messages below the configured level', () => {
    const { logger, lines } = collect('warn');

    logger.debug('d');
    logger.info('i');
    logger.warn('w');
    logger.error('e');

    expect(lines.map((l) => l.split('|')[0])).toEqual(['warn', 'error']);
  });

  it('writes nothing when silent', () => {
    const { logger, lines } = collect('silent');
    logger.error('e');
    expect(lines).toEqual([]);
  });

  it('prefixes timestamp, level and scope', () => {
    const { logger, lines } = collect('info');

    logger.child('poll').child('media').info('hello');

    expect(lines).toHaveLength(1);
    expect(lines[0]).toMatch(/^info\|\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z INFO \[poll:media\] hello$/);
  });
});
