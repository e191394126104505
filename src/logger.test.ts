import { describe, it, expect, vi, afterEach } from 'vitest';
import { defaultLogger } from './logger';

describe('defaultLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('prefixes warnings', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    defaultLogger.warn('careful');
    expect(warn).toHaveBeenCalledWith('[scene-census] careful');
  });

  it('prefixes errors', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => {});
    defaultLogger.error("Can't import scene 0");
    expect(error).toHaveBeenCalledWith("[scene-census] Can't import scene 0");
  });
});
