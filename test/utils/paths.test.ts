import { fileURLToPath } from 'url';
import { describe, expect, it } from 'vitest';
import { isMainModule } from '../../src/utils/paths.js';

describe('isMainModule', () => {
  it('matches the entry script', () => {
    expect(isMainModule(import.meta.url, fileURLToPath(import.meta.url))).toBe(true);
  });

  it('rejects other scripts', () => {
    expect(isMainModule(import.meta.url, fileURLToPath(new URL('./camelcase.test.ts', import.meta.url)))).toBe(
      false
    );
  });

  it('rejects missing or non-existent entries', () => {
    expect(isMainModule(import.meta.url, undefined)).toBe(false);
    expect(isMainModule(import.meta.url, '/nonexistent/entry.js')).toBe(false);
  });
});
