import { describe, it, expect } from 'vitest';
import {
  DEFAULT_EXPORT_OPTIONS,
  parsePositiveInteger,
  resolveExportOptions,
  type RawCliOptions,
} from '../../../src/config/options.js';
import { ConfigError } from '../../../src/errors.js';

/** What commander hands over when no flag is typed */
function defaults(overrides: Partial<RawCliOptions> = {}): RawCliOptions {
  return {
    mode: 'export',
    truncateLines: '50',
    include: [],
    exclude: [],
    codeExt: [],
    sort: 'path',
    clipboard: true,
    ...overrides,
  };
}

const noneFromCli = () => false;

function fromCli(...names: (keyof RawCliOptions)[]) {
  return (name: keyof RawCliOptions) => names.includes(name);
}

describe('resolveExportOptions', () => {
  it('falls back to the defaults', () => {
    expect(resolveExportOptions('.', defaults(), {}, noneFromCli)).toEqual({ root: '.', ...DEFAULT_EXPORT_OPTIONS });
  });

  it('takes config values over defaults', () => {
    const options = resolveExportOptions(
      'proj',
      defaults(),
      { mode: 'ack', truncateLines: 10, exclude: ['fixtures'], clipboard: false, toc: true },
      noneFromCli
    );

    expect(options).toMatchObject({ root: 'proj', mode: 'ack', truncateLines: 10, exclude: ['fixtures'], clipboard: false, toc: true });
  });

  it('takes CLI flags over config values', () => {
    const options = resolveExportOptions(
      'proj',
      defaults({ mode: 'describe', truncateLines: '7', exclude: ['tmp'], clipboard: false }),
      { mode: 'ack', truncateLines: 10, exclude: ['fixtures'], clipboard: true },
      fromCli('mode', 'truncateLines', 'exclude', 'clipboard')
    );

    expect(options).toMatchObject({ mode: 'describe', truncateLines: 7, exclude: ['tmp'], clipboard: false });
  });

  it('maps --code-ext to codeExtensions', () => {
    const options = resolveExportOptions('.', defaults({ codeExt: ['.txt'] }), {}, fromCli('codeExt'));
    expect(options.codeExtensions).toEqual(['.txt']);
  });

  it('rejects an unknown mode', () => {
    expect(() => resolveExportOptions('.', defaults({ mode: 'summary' }), {}, fromCli('mode')))
      .toThrow('Invalid mode "summary". Must be one of: export, ack, describe.');
  });

  it('rejects an unknown sort order', () => {
    expect(() => resolveExportOptions('.', defaults({ sort: 'size' }), {}, fromCli('sort')))
      .toThrow('Invalid sort "size". Must be "path" or "name".');
  });

  it('rejects a bad --truncate-lines', () => {
    expect(() => resolveExportOptions('.', defaults({ truncateLines: '0' }), {}, fromCli('truncateLines')))
      .toThrow(ConfigError);
  });
});

describe('parsePositiveInteger', () => {
  it('parses digits', () => {
    expect(parsePositiveInteger(' 12 ', '--n')).toBe(12);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('rejects %j', value => {
    expect(() => parsePositiveInteger(value, '--n')).toThrow(`--n must be a positive integer. Got: ${value}`);
  });
});
