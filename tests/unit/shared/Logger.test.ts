import { describe, it, expect } from 'vitest';
import { Logger, errorMessage, isLogLevel } from '../../../src/shared/Logger.js';

describe('Logger', () => {
  it('should write JSON lines with context and data', () => {
    const lines: string[] = [];
    const logger = new Logger('ChunkStore', 'info', (line) => lines.push(line));

    logger.info('Recovered manifest', { entries: 3 });

    expect(lines).toHaveLength(1);
    const entry = JSON.parse(lines[0]);
    expect(entry.level).toBe('info');
    expect(entry.context).toBe('ChunkStore');
    expect(entry.message).toBe('Recovered manifest');
    expect(entry.entries).toBe(3);
  });

  it('should drop messages below the minimum level', () => {
    const lines: string[] = [];
    const logger = new Logger('test', 'warn', (line) => lines.push(line));

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('shown');
    logger.error('shown');

    expect(lines).toHaveLength(2);
  });

  it('should share level and sink with child loggers', () => {
    const lines: string[] = [];
    const child = new Logger('root', 'error', (line) => lines.push(line)).child('Discovery');

    child.warn('hidden');
    child.error('Failed to process file');

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0]).context).toBe('Discovery');
  });

  it('should recognise log levels', () => {
    expect(isLogLevel('debug')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
    expect(isLogLevel(1)).toBe(false);
  });

  it('should describe unknown errors', () => {
    expect(errorMessage(new Error('boom'))).toBe('boom');
    expect(errorMessage('text')).toBe('text');
  });
});
