import { describe, expect, it } from 'vitest';
import { globToRegExp, matchesGlob } from '../../src/utils/glob.js';

describe('globToRegExp', () => {
  it.each([
    ['*.png', '^[^/]*\\.png$'],
    ['**/*.png', '^(?:.*/)?[^/]*\\.png$'],
    ['cache/**', '^cache/.*$'],
    ['f_????.exr', '^f_[^/][^/][^/][^/]\\.exr$'],
    ['[!a]b', '^[^a]b$'],
    ['[x', '^\\[x$'],
  ])('translates %s', (pattern, source) => {
    expect(globToRegExp(pattern).source).toBe(source);
  });
});

describe('matchesGlob', () => {
  it('matches the file name when the pattern has no slash', () => {
    expect(matchesGlob('textures/wood.png', '*.png')).toBe(true);
    expect(matchesGlob('textures/wood.png', 'textures*')).toBe(false);
  });

  it('matches any tail of the path when the pattern has a slash', () => {
    expect(matchesGlob('a/tmp/x.txt', 'tmp/*')).toBe(true);
    expect(matchesGlob('a/tmpx/x.txt', 'tmp/*')).toBe(false);
    expect(matchesGlob('a/tmp/deep/x.txt', 'tmp/*')).toBe(false);
    expect(matchesGlob('a/tmp/deep/x.txt', 'tmp/**')).toBe(true);
  });

  it('lets ** match no directories at all', () => {
    expect(matchesGlob('c.png', '**/*.png')).toBe(true);
    expect(matchesGlob('a/b/c.png', '**/*.png')).toBe(true);
  });

  it('matches single characters and classes', () => {
    expect(matchesGlob('a.txt', '?.txt')).toBe(true);
    expect(matchesGlob('ab.txt', '?.txt')).toBe(false);
    expect(matchesGlob('cb', '[!a]b')).toBe(true);
    expect(matchesGlob('ab', '[!a]b')).toBe(false);
  });
});
