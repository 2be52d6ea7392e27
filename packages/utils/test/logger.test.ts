import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';

import { logDebug, logWarning, logError, isDebugEnabled } from '../src/logger.js';

describe('logger', () => {
  let consoleErrorSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    consoleErrorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
  });

  afterEach(() => {
    consoleErrorSpy.mockRestore();
    delete process.env.SHIPLOG_DEBUG;
  });

  describe('SHIPLOG_DEBUG not set', () => {
    it('should not output debug or warning lines', () => {
      logDebug('git', 'running git log');
      logWarning('notes', 'extra note ignored');

      expect(isDebugEnabled()).toBe(false);
      expect(consoleErrorSpy).not.toHaveBeenCalled();
    });

    it('should always output errors', () => {
      logError('config', 'schema missing', new Error('ENOENT'));

      expect(consoleErrorSpy).toHaveBeenCalledTimes(2);
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, expect.stringMatching(/\[ERROR\] \[config\] schema missing$/));
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(2, 'Error: ENOENT');
    });
  });

  describe('SHIPLOG_DEBUG=1', () => {
    beforeEach(() => {
      process.env.SHIPLOG_DEBUG = '1';
    });

    it('should output debug lines with metadata', () => {
      logDebug('tags', 'built reachability', { tags: 2 });

      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, expect.stringMatching(/\[DEBUG\] \[tags\] built reachability$/));
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(2, JSON.stringify({ tags: 2 }, null, 2));
    });

    it('should output warnings with the error message', () => {
      logWarning('notes', 'extra note ignored', new Error('second artifact'));

      expect(consoleErrorSpy).toHaveBeenNthCalledWith(1, expect.stringMatching(/\[WARN\] \[notes\] extra note ignored$/));
      expect(consoleErrorSpy).toHaveBeenNthCalledWith(2, 'Error: second artifact');
    });
  });
});
