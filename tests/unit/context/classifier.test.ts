import { describe, it, expect } from 'vitest';
import {
  classifyContent,
  classifyFile,
  createFileTypes,
  detectLanguage,
  hasNullByte,
  normalizeExtension,
} from '../../../src/context/index.js';

const fileTypes = createFileTypes();
const text = (s: string) => Buffer.from(s, 'utf-8');

describe('classifyFile', () => {
  it('classifies allow-listed extensions as code', () => {
    expect(classifyFile('src/a.py', text('print(1)\n'), fileTypes)).toBe('code');
    expect(classifyFile('src/index.ts', text('export {};\n'), fileTypes)).toBe('code');
    expect(classifyFile('config.yaml', text('key: value\n'), fileTypes)).toBe('code');
  });

  it('matches extensions case-insensitively', () => {
    expect(classifyFile('APP.PY', text('print(1)\n'), fileTypes)).toBe('code');
  });

  it('classifies special file names as code', () => {
    expect(classifyFile('Dockerfile', text('FROM node:20\n'), fileTypes)).toBe('code');
    expect(classifyFile('tools/Makefile', text('all:\n'), fileTypes)).toBe('code');
  });

  it('classifies other decodable files as text', () => {
    expect(classifyFile('notes.txt', text('hello\n'), fileTypes)).toBe('text');
    expect(classifyFile('server.log', text('started\n'), fileTypes)).toBe('text');
  });

  it('sends files without an extension through sniffing', () => {
    expect(classifyFile('README', text('Read me\n'), fileTypes)).toBe('text');
    expect(classifyFile('blob', Buffer.from([0x41, 0x00, 0x42]), fileTypes)).toBe('binary');
  });

  it('classifies a NUL byte as binary', () => {
    expect(classifyFile('image.dat', Buffer.from([0x89, 0x50, 0x00, 0x01]), fileTypes)).toBe('binary');
  });

  it('lets binary content win over a code extension', () => {
    expect(classifyFile('corrupt.ts', Buffer.from([0x63, 0x6f, 0x00, 0x6e]), fileTypes)).toBe('binary');
  });

  it('classifies invalid UTF-8 as binary', () => {
    expect(classifyFile('data.log', Buffer.from([0xff, 0xfe, 0x41]), fileTypes)).toBe('binary');
  });

  it('finds a NUL byte past the sniff window', () => {
    const bytes = Buffer.concat([Buffer.alloc(9000, 0x61), Buffer.from([0x00])]);
    expect(classifyFile('big.txt', bytes, fileTypes)).toBe('binary');
  });

  it('classifies binary extensions without looking at content', () => {
    expect(classifyFile('logo.png', text('fake-binary'), fileTypes)).toBe('binary');
  });

  it('treats a zero-byte file as empty text', () => {
    expect(classifyContent('empty.txt', Buffer.alloc(0), fileTypes)).toEqual({ classification: 'text', text: '' });
  });

  it('drops a UTF-8 byte order mark', () => {
    expect(classifyContent('bom.txt', text('\uFEFFhello'), fileTypes).text).toBe('hello');
  });
});

describe('createFileTypes', () => {
  it('adds extra code extensions', () => {
    const custom = createFileTypes({ extraCodeExtensions: ['txt', '.LOG'] });

    expect(classifyFile('notes.txt', text('hello\n'), custom)).toBe('code');
    expect(classifyFile('server.log', text('started\n'), custom)).toBe('code');
    expect(classifyFile('notes.txt', text('hello\n'), fileTypes)).toBe('text');
  });

  it('is frozen', () => {
    expect(Object.isFrozen(createFileTypes())).toBe(true);
  });
});

describe('normalizeExtension', () => {
  it('lower-cases and adds the dot', () => {
    expect(normalizeExtension('TS')).toBe('.ts');
    expect(normalizeExtension('.Md')).toBe('.md');
    expect(normalizeExtension('  ')).toBe('');
  });
});

describe('hasNullByte', () => {
  it('only scans up to the limit', () => {
    const bytes = Buffer.from([0x41, 0x42, 0x00]);
    expect(hasNullByte(bytes, 2)).toBe(false);
    expect(hasNullByte(bytes, 3)).toBe(true);
  });
});

describe('detectLanguage', () => {
  it('maps extensions to fence languages', () => {
    expect(detectLanguage('src/app.ts', fileTypes)).toBe('typescript');
    expect(detectLanguage('a.py', fileTypes)).toBe('python');
    expect(detectLanguage('deploy.YML', fileTypes)).toBe('yaml');
  });

  it('maps special file names', () => {
    expect(detectLanguage('Dockerfile', fileTypes)).toBe('dockerfile');
    expect(detectLanguage('LICENSE', fileTypes)).toBe('');
  });

  it('returns an empty string for unknown extensions', () => {
    expect(detectLanguage('notes.txt', fileTypes)).toBe('');
  });
});
