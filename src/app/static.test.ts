import { describe, it, expect } from 'vitest';
import { resolveStaticPath } from './static.js';

const ROOT = '/srv/www';

describe('resolveStaticPath', () => {
  it('maps the root to the index page', () => {
    expect(resolveStaticPath(ROOT, '/')).toEqual({ kind: 'index' });
  });

  it('maps a file inside the folder', () => {
    expect(resolveStaticPath(ROOT, '/js/app.js')).toEqual({ kind: 'file', file: '/srv/www/js/app.js' });
  });

  it('rejects traversal, plain or encoded', () => {
    expect(resolveStaticPath(ROOT, '/../etc/passwd')).toEqual({ kind: 'invalid' });
    expect(resolveStaticPath(ROOT, '/%2e%2e/%2e%2e/etc/passwd')).toEqual({ kind: 'invalid' });
    expect(resolveStaticPath(ROOT, '/..%2fwww-private/key')).toEqual({ kind: 'invalid' });
  });

  it('rejects undecodable paths and NUL bytes', () => {
    expect(resolveStaticPath(ROOT, '/%E0%A4%A')).toEqual({ kind: 'invalid' });
    expect(resolveStaticPath(ROOT, '/index.html%00.png')).toEqual({ kind: 'invalid' });
  });
});
