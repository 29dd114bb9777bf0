import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, isDebugMode } from '../src/utils/logger';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  it('tags output with its scope when forced on', () => {
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('CodecPool', true);
    logger.log('started', 2);

    expect(logger.scope).toBe('CodecPool');
    expect(spy).toHaveBeenCalledWith('[CodecPool]', 'started', 2);
  });

  it('stays silent outside debug mode', () => {
    vi.stubEnv('PACKEDVEC_DEBUG', '');
    const spy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const logger = createLogger('CodecPool');
    logger.log('started');

    expect(logger.enabled).toBe(false);
    expect(spy).not.toHaveBeenCalled();
  });
});

describe('isDebugMode', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    vi.unstubAllGlobals();
  });

  it('accepts the enabling values of PACKEDVEC_DEBUG', () => {
    for (const value of ['1', 'true', 'TRUE', ' yes ', 'on']) {
      vi.stubEnv('PACKEDVEC_DEBUG', value);
      expect(isDebugMode()).toBe(true);
    }
  });

  it('treats other values as off', () => {
    for (const value of ['false', '0', 'no', 'off', '']) {
      vi.stubEnv('PACKEDVEC_DEBUG', value);
      expect(isDebugMode()).toBe(false);
    }
  });

  it('honours the global flag', () => {
    vi.stubEnv('PACKEDVEC_DEBUG', '');
    vi.stubGlobal('__PACKEDVEC_DEBUG', true);
    expect(isDebugMode()).toBe(true);
  });
});
