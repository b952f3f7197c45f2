import { describe, expect, it } from 'vitest';
import { createConsoleLogger } from '../src/logger.js';
import { withSpan } from '../src/tracing.js';

function memoryStream() {
  const chunks: string[] = [];
  return { chunks, write: (chunk: string) => chunks.push(chunk) };
}

describe('createConsoleLogger', () => {
  it('writes one line per message at or above the level', () => {
    const stream = memoryStream();
    const logger = createConsoleLogger({ level: 'warn', stream });

    logger.debug('hidden');
    logger.info('hidden');
    logger.warn('careful');
    logger.error('broken');

    expect(stream.chunks).toHaveLength(2);
    expect(stream.chunks[0]?.endsWith(' careful\n')).toBe(true);
    expect(stream.chunks[1]?.endsWith(' broken\n')).toBe(true);
  });

  it('defaults to info', () => {
    const stream = memoryStream();
    const logger = createConsoleLogger({ stream });
    logger.debug('hidden');
    logger.info('shown');
    expect(stream.chunks).toHaveLength(1);
  });
});

describe('withSpan', () => {
  it('returns the result of the wrapped function', async () => {
    await expect(withSpan('test', {}, async () => 42)).resolves.toBe(42);
  });

  it('rethrows errors', async () => {
    await expect(
      withSpan('test', {}, async () => {
        throw new Error('boom');
      }),
    ).rejects.toThrow('boom');
  });
});
