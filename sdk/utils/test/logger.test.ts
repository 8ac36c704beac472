import { afterEach, describe, expect, it, vi } from 'vitest';

import { logger } from '../src/logger';

describe('logger', () => {
  afterEach(() => {
    logger.disable();
  });

  it('is silent until enabled', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);

    logger.warn('hidden');
    expect(warn).not.toHaveBeenCalled();

    logger.enable();
    logger.warn('shown', 1);

    expect(logger.isEnabled()).toBe(true);
    expect(warn).toHaveBeenCalledWith('Lantern Logger [warn]:', 'shown', 1);
  });

  it('writes through the console installed at call time', () => {
    const error = vi.fn();
    const previous = console.error;
    console.error = error;

    try {
      logger.enable();
      logger.error('failed');
    } finally {
      console.error = previous;
    }

    expect(error).toHaveBeenCalledWith('Lantern Logger [error]:', 'failed');
  });
});
