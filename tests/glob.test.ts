import { describe, it, expect } from 'vitest';
import { globMatch, globToRegExp } from '../src/core/glob.js';

describe('globMatch', () => {
  it('matches a single segment with *', () => {
    expect(globMatch('/home/dev/*', '/home/dev/webapp')).toBe(true);
    expect(globMatch('/home/dev/*', '/home/dev/webapp/src')).toBe(false);
  });

  it('crosses separators with **', () => {
    expect(globMatch('/home/dev/**', '/home/dev/webapp/src')).toBe(true);
    expect(globMatch('**/webapp', '/home/dev/webapp')).toBe(true);
  });

  it('matches exactly one character with ?', () => {
    expect(globMatch('/srv/app?', '/srv/app1')).toBe(true);
    expect(globMatch('/srv/app?', '/srv/app12')).toBe(false);
    expect(globMatch('/srv/app?', '/srv/app/')).toBe(false);
  });

  it('treats regexp characters literally', () => {
    expect(globMatch('/work/a.b', '/work/a.b')).toBe(true);
    expect(globMatch('/work/a.b', '/work/aXb')).toBe(false);
    expect(globMatch('/work/(x)+', '/work/(x)+')).toBe(true);
  });

  it('is anchored at both ends', () => {
    expect(globMatch('dev', '/home/dev')).toBe(false);
    expect(globToRegExp('/a/*').test('/x/a/b')).toBe(false);
  });
});
