import { describe, it, expect } from 'vitest';
import type { DestinationStream } from 'pino';
import { createLogger } from '../logging/logger.js';

function capture(): { destination: DestinationStream; records: () => Record<string, unknown>[] } {
  const lines: string[] = [];
  return {
    destination: { write: (line: string) => void lines.push(line) },
    records: () => lines.map((line): Record<string, unknown> => JSON.parse(line)),
  };
}

describe('createLogger', () => {
  it('writes structured records with the module binding', () => {
    const { destination, records } = capture();
    const logger = createLogger({ destination, module: 'loop' });

    logger.info('Iteration started', { iteration: 1 });
    logger.debug('hidden at info level');

    expect(records()).toHaveLength(1);
    expect(records()[0]).toMatchObject({
      level: 30,
      msg: 'Iteration started',
      iteration: 1,
      module: 'loop',
      service: 'taskloop',
    });
  });

  it('serializes errors under err', () => {
    const { destination, records } = capture();
    const logger = createLogger({ destination, level: 'error' });

    logger.warn('dropped');
    logger.error('Run failed', new Error('boom'));

    const [record] = records();
    expect(record?.msg).toBe('Run failed');
    expect(record?.err).toMatchObject({ type: 'Error', message: 'boom' });
  });

  it('stays quiet when silent', () => {
    const { destination, records } = capture();
    createLogger({ destination, level: 'silent' }).error('nothing');
    expect(records()).toEqual([]);
  });
});
