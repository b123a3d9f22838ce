/**
 * Error helper tests
 */

import { runInNewContext } from 'node:vm';
import { errorMessage } from '../errors.js';
import { createTempStore } from './helpers.js';

describe('errorMessage', () => {
  it('reads the message of an error from another realm', () => {
    const foreign: unknown = runInNewContext('new Error("from elsewhere")');

    expect(foreign instanceof Error).toBe(false);
    expect(errorMessage(foreign)).toBe('from elsewhere');
  });

  it('reads the message of a plain object', () => {
    expect(errorMessage({ message: 'plain', code: 'ENOENT' })).toBe('plain');
  });

  it('stringifies anything without a message', () => {
    expect(errorMessage('bare string')).toBe('bare string');
    expect(errorMessage({ message: 42 })).toBe('[object Object]');
  });
});

describe('ExchangeStore with missing files', () => {
  it('treats ENOENT from fs as a missing entry', async () => {
    const { store, cleanup } = createTempStore();
    try {
      await store.init();

      expect(await store.delete('responses', 'nope')).toBe(false);
      expect(await store.exists('responses', 'nope')).toBe(false);
      expect(await store.tryRead('responses', 'nope', bytes => bytes)).toEqual({ status: 'absent' });
    } finally {
      cleanup();
    }
  });
});
