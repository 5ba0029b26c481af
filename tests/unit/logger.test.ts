/**
 * Unit Tests: loggers
 */

import { afterEach, describe, expect, it, vi } from 'vitest';
import { consoleLogger } from '../../restpoll-sdk/src';

describe('consoleLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('drops debug messages', () => {
    const debug = vi.spyOn(console, 'debug').mockImplementation(() => undefined);
    consoleLogger.debug('GET http://localhost:3000/api/v1/pods');
    expect(debug).not.toHaveBeenCalled();
  });

  it('prints info messages with a prefix', () => {
    const info = vi.spyOn(console, 'info').mockImplementation(() => undefined);
    consoleLogger.info('Waiting for completion of operation op-1');
    expect(info).toHaveBeenCalledWith('[restpoll]', 'Waiting for completion of operation op-1');
  });

  it('passes metadata along', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    consoleLogger.warn('slow response', { ms: 1200 });
    expect(warn).toHaveBeenCalledWith('[restpoll]', 'slow response', { ms: 1200 });
  });
});
