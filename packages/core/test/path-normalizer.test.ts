import { describe, it, expect } from 'vitest';
import { normalizePath } from '../src/path-normalizer.js';

describe('normalizePath', () => {
  const root = '/home/dev/project';

  it('should make absolute paths relative to the working root', () => {
    expect(normalizePath('/home/dev/project/src/app.js', root)).toBe('src/app.js');
  });

  it('should collapse ./ and ../ segments', () => {
    expect(normalizePath('./src/app.js', root)).toBe('src/app.js');
    expect(normalizePath('src/lib/../app.js', root)).toBe('src/app.js');
    expect(normalizePath('./src/./lib//util.py', root)).toBe('src/lib/util.py');
  });

  it('should be idempotent', () => {
    const once = normalizePath('/home/dev/project/./docs/../src/main.py', root);
    expect(once).toBe('src/main.py');
    expect(normalizePath(once, root)).toBe(once);
  });

  it('should express paths outside the root with ../', () => {
    expect(normalizePath('/home/dev/other/file.js', root)).toBe('../other/file.js');
  });

  it('should return . for the root itself', () => {
    expect(normalizePath('/home/dev/project', root)).toBe('.');
    expect(normalizePath('./', root)).toBe('.');
  });

  it('should not require the file to exist', () => {
    expect(normalizePath('does/not/exist.ts', '/nowhere')).toBe('does/not/exist.ts');
  });

  it('should accept a working root with a trailing slash', () => {
    expect(normalizePath('/srv/app/index.ts', '/srv/app/')).toBe('index.ts');
  });
});
