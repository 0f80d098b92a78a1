import { describe, it, expect } from 'vitest';
import {
  compareNames,
  createFileTypes,
  createMatcher,
  isHidden,
  matchesPattern,
  shouldExcludeDir,
} from '../../../src/context/index.js';

const fileTypes = createFileTypes();

describe('isHidden', () => {
  it('treats dot-prefixed names as hidden', () => {
    expect(isHidden('.git')).toBe(true);
    expect(isHidden('.env')).toBe(true);
  });

  it('does not hide regular names', () => {
    expect(isHidden('src')).toBe(false);
    expect(isHidden('file.ts')).toBe(false);
  });
});

describe('shouldExcludeDir', () => {
  it('excludes dependency and build directories', () => {
    expect(shouldExcludeDir('node_modules', fileTypes)).toBe(true);
    expect(shouldExcludeDir('dist', fileTypes)).toBe(true);
    expect(shouldExcludeDir('__pycache__', fileTypes)).toBe(true);
    expect(shouldExcludeDir('venv', fileTypes)).toBe(true);
  });

  it('excludes hidden directories', () => {
    expect(shouldExcludeDir('.git', fileTypes)).toBe(true);
    expect(shouldExcludeDir('.venv', fileTypes)).toBe(true);
  });

  it('does not exclude src', () => {
    expect(shouldExcludeDir('src', fileTypes)).toBe(false);
  });
});

describe('matchesPattern', () => {
  it('matches folder name in path', () => {
    expect(matchesPattern('dist/index.js', ['dist'])).toBe(true);
  });

  it('matches nested folder', () => {
    expect(matchesPattern('src/coverage/report.html', ['coverage'])).toBe(true);
  });

  it('matches suffix glob', () => {
    expect(matchesPattern('src/utils.test.ts', ['*.test.ts'])).toBe(true);
  });

  it('matches case-insensitively', () => {
    expect(matchesPattern('Docs/A.MD', ['*.md'])).toBe(true);
    expect(matchesPattern('Build/out.js', ['build'])).toBe(true);
  });

  it('does not match partial segment names', () => {
    expect(matchesPattern('src/distance.ts', ['dist'])).toBe(false);
  });

  it('does not match unrelated paths', () => {
    expect(matchesPattern('src/index.ts', ['dist', 'coverage'])).toBe(false);
  });

  it('ignores blank patterns', () => {
    expect(matchesPattern('src/index.ts', ['', '   '])).toBe(false);
  });
});

describe('createMatcher', () => {
  it('anchors patterns that contain a slash', () => {
    const matches = createMatcher(['src/*.ts']);

    expect(matches('src/a.ts')).toBe(true);
    expect(matches('src/lib/m.ts')).toBe(false);
    expect(matches('other/src/a.ts')).toBe(false);
  });

  it('spans directories with **', () => {
    const matches = createMatcher(['**/fixtures/**']);

    expect(matches('tests/fixtures/data.json')).toBe(true);
    expect(matches('tests/unit/data.json')).toBe(false);
  });

  it('re-includes with a negated pattern', () => {
    const matches = createMatcher(['*.ts', '!*.d.ts']);

    expect(matches('src/a.ts')).toBe(true);
    expect(matches('src/types.d.ts')).toBe(false);
  });

  it('limits a trailing slash to directories', () => {
    const matches = createMatcher(['build/']);

    expect(matches('build', true)).toBe(true);
    expect(matches('build', false)).toBe(false);
  });

  it('matches files below a matching directory', () => {
    expect(createMatcher(['vendor'])('lib/vendor/x/y.js')).toBe(true);
  });

  it('never matches without patterns', () => {
    expect(createMatcher([])('src/a.ts')).toBe(false);
    expect(createMatcher(['  ', '# comment'])('src/a.ts')).toBe(false);
  });
});

describe('compareNames', () => {
  it('orders by code unit, not locale', () => {
    expect(['b', 'B', 'a', '_x'].sort(compareNames)).toEqual(['B', '_x', 'a', 'b']);
  });
});
