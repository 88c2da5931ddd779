import { describe, it, expect, vi } from 'vitest';
import { PlaybackQueue } from '../../src/engine/PlaybackQueue';
import { SILENT_LOGGER, type Logger } from '../../src/utils/log';

describe('PlaybackQueue', () => {
  it('runs tasks strictly one after another in enqueue order', async () => {
    const queue = new PlaybackQueue(SILENT_LOGGER);
    const log: string[] = [];
    let releaseFirst: () => void = () => {};
    void queue.enqueue(
      () =>
        new Promise<void>((resolve) => {
          log.push('first:start');
          releaseFirst = () => {
            log.push('first:end');
            resolve();
          };
        }),
    );
    void queue.enqueue(async () => {
      log.push('second');
    });

    await Promise.resolve();
    expect(log).toEqual(['first:start']);
    expect(queue.pending).toBe(2);

    releaseFirst();
    await queue.idle();
    expect(log).toEqual(['first:start', 'first:end', 'second']);
    expect(queue.pending).toBe(0);
  });

  it('logs a failing task and keeps going', async () => {
    const error = vi.fn();
    const logger: Logger = { ...SILENT_LOGGER, error };
    const queue = new PlaybackQueue(logger);
    const after = vi.fn();

    void queue.enqueue(async () => {
      throw new Error('decode failed');
    });
    void queue.enqueue(async () => after());
    await queue.idle();

    expect(error).toHaveBeenCalledWith('Animation failed', 'decode failed');
    expect(after).toHaveBeenCalledTimes(1);
  });
});
