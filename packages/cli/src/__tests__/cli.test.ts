import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import type { MockInstance } from 'vitest';
import { CLIError, EXIT_CODE, run } from '../index';
import { parseApplyList } from '../commands/merge';

const originalCwd = process.cwd();
const tempDirs: string[] = [];

function useTempDir(): void {
  const tmp = fs.mkdtempSync(path.join(os.tmpdir(), 'inikit-cli-test-'));
  tempDirs.push(tmp);
  process.chdir(tmp);
}

function write(file: string, text: string): void {
  fs.writeFileSync(file, text);
}

function read(file: string): string {
  return fs.readFileSync(file, 'utf-8');
}

let log: MockInstance<Parameters<Console['log']>, void>;
let stdout: MockInstance<Parameters<typeof process.stdout.write>, boolean>;

const printed = (): string => stdout.mock.calls.map(call => String(call[0])).join('');
const logged = (index = 0): string => String(log.mock.calls[index][0]);

beforeEach(() => {
  useTempDir();
  log = vi.spyOn(console, 'log').mockImplementation(() => {});
  stdout = vi.spyOn(process.stdout, 'write').mockImplementation(() => true);
});

afterEach(() => {
  vi.restoreAllMocks();
  process.chdir(originalCwd);
  while (tempDirs.length > 0) {
    const dir = tempDirs.pop();
    if (dir) {
      fs.rmSync(dir, { recursive: true, force: true });
    }
  }
});

describe('run', () => {
  it('prints the version', async () => {
    expect(await run(['--version'])).toBe(EXIT_CODE.SUCCESS);
    expect(logged()).toMatch(/^inikit v\d+\.\d+\.\d+$/);
  });

  it('rejects unknown commands and bad global flags', async () => {
    await expect(run(['explode'])).rejects.toThrow(CLIError);
    await expect(run(['fmt', 'a.ini', '--format', 'yaml'])).rejects.toThrow('Invalid --format value: yaml. Use text or json.');
    await expect(run(['fmt', 'a.ini', '--encoding', 'ebcdic'])).rejects.toThrow(/^Invalid --encoding value: ebcdic/);
  });

  it('reports missing files and arguments', async () => {
    await expect(run(['get', 'missing.ini', 's', 'k'])).rejects.toThrow('File not found: missing.ini');
    await expect(run(['get', 'missing.ini'])).rejects.toThrow(
      'Missing <section> <key>. Usage: inikit get <file> <section> <key>'
    );
  });
});

describe('fmt', () => {
  it('prints the canonical form', async () => {
    write('a.ini', 'key=value\n[s]\nx=1\n');
    expect(await run(['fmt', 'a.ini'])).toBe(EXIT_CODE.SUCCESS);
    expect(printed()).toBe('key = value\n\n[s]\nx = 1\n');
  });

  it('--check fails on unformatted files only', async () => {
    write('a.ini', 'key=value\n');
    write('b.ini', 'key = value\n');
    expect(await run(['fmt', 'a.ini', '--check'])).toBe(EXIT_CODE.POLICY_VIOLATION);
    expect(await run(['fmt', 'b.ini', '--check'])).toBe(EXIT_CODE.SUCCESS);
  });

  it('--write rewrites the file in place', async () => {
    write('a.ini', '; top\nkey=value\n[s]   ; note\nx=1\n');
    expect(await run(['fmt', 'a.ini', '--write', '--format', 'json'])).toBe(EXIT_CODE.SUCCESS);
    expect(read('a.ini')).toBe('; top\nkey = value\n\n[s] ; note\nx = 1\n');
    expect(JSON.parse(logged())).toEqual({ file: 'a.ini', changed: true, written: true });
  });
});

describe('check', () => {
  it('lists every malformed line', async () => {
    write('bad.ini', '[ok]\n[broken\nkey2\n');
    expect(await run(['check', 'bad.ini', '--format', 'json'])).toBe(EXIT_CODE.POLICY_VIOLATION);
    const report = JSON.parse(logged());
    expect(report.valid).toBe(false);
    expect(report.parseErrors).toEqual([
      { lineNumber: 2, line: '[broken', reason: 'Missing closing bracket in section declaration' },
      { lineNumber: 3, line: 'key2', reason: 'Missing equals sign in key-value pair' },
    ]);
  });

  it('passes a clean file', async () => {
    write('good.ini', '[s]\nk = v\n');
    expect(await run(['check', 'good.ini'])).toBe(EXIT_CODE.SUCCESS);
  });
});

describe('diff', () => {
  it('prints changes and exits 1 when files differ', async () => {
    write('left.ini', '[a]\nk = 1\n');
    write('right.ini', '[a]\nk = 2\n[b]\n');
    expect(await run(['diff', 'left.ini', 'right.ini'])).toBe(EXIT_CODE.POLICY_VIOLATION);
    expect(logged()).toBe('~ [a]\n  ~ k: 1 -> 2\n+ [b]');
  });

  it('exits 0 for equivalent files', async () => {
    write('left.ini', '[A]\nk=1\n');
    write('right.ini', '; comment\n[a]\nK = 1\n');
    expect(await run(['diff', 'left.ini', 'right.ini'])).toBe(EXIT_CODE.SUCCESS);
    expect(logged()).toBe('No differences.');
  });
});

describe('merge', () => {
  const TARGET = '[a]\nk = 1\nold = x\n';
  const SOURCE = '[a]\nk = 2\nnew = y\n[b]\nz = 3\n';

  it('applies additions and modifications by default', async () => {
    write('target.ini', TARGET);
    write('source.ini', SOURCE);
    expect(await run(['merge', 'target.ini', 'source.ini', '--write', '--format', 'json'])).toBe(EXIT_CODE.SUCCESS);
    expect(read('target.ini')).toBe('[a]\nk = 2\nold = x\nnew = y\n\n[b]\nz = 3\n');
    expect(JSON.parse(logged())).toEqual({
      target: 'target.ini',
      source: 'source.ini',
      written: true,
      sectionsAdded: 1,
      sectionsRemoved: 0,
      propertiesAdded: 1,
      propertiesRemoved: 0,
      propertiesModified: 1,
      totalChanges: 3,
    });
  });

  it('--apply all makes the target match the source', async () => {
    write('target.ini', TARGET);
    write('source.ini', SOURCE);
    await run(['merge', 'target.ini', 'source.ini', '--write', '--apply', 'all']);
    expect(read('target.ini')).toBe('[a]\nk = 2\nnew = y\n\n[b]\nz = 3\n');
  });

  it('prints the merged document without --write', async () => {
    write('target.ini', TARGET);
    write('source.ini', SOURCE);
    await run(['merge', 'target.ini', 'source.ini', '--apply', 'modified-properties']);
    expect(printed()).toBe('[a]\nk = 2\nold = x\n');
    expect(read('target.ini')).toBe(TARGET);
  });

  it('parseApplyList enables only what is listed', () => {
    expect(parseApplyList('added-sections, removed-properties')).toEqual({
      applyAddedSections: true,
      applyRemovedSections: false,
      applyAddedProperties: false,
      applyRemovedProperties: true,
      applyModifiedProperties: false,
    });
    expect(() => parseApplyList('everything')).toThrow(/^Unknown --apply item: everything/);
  });
});

describe('get and set', () => {
  beforeEach(() => {
    write('app.ini', 'top = 1\n[s]\nk = v\n');
  });

  it('get prints a value, including default-section keys', async () => {
    expect(await run(['get', 'app.ini', 's', 'K'])).toBe(EXIT_CODE.SUCCESS);
    expect(await run(['get', 'app.ini', '$DEFAULT', 'top'])).toBe(EXIT_CODE.SUCCESS);
    expect(await run(['get', 'app.ini', '$default', 'top'])).toBe(EXIT_CODE.SUCCESS);
    expect(logged(0)).toBe('v');
    expect(logged(1)).toBe('1');
    expect(logged(2)).toBe('1');
  });

  it('set addresses the default section by its reserved name', async () => {
    await run(['set', 'app.ini', '$default', 'added', '2']);
    expect(read('app.ini')).toBe('top = 1\nadded = 2\n\n[s]\nk = v\n');
  });

  it('get fails with exit 1 on a missing key', async () => {
    const error = await run(['get', 'app.ini', 's', 'nope']).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(CLIError);
    if (error instanceof CLIError) {
      expect(error.exitCode).toBe(EXIT_CODE.POLICY_VIOLATION);
      expect(error.message).toBe('Property "nope" not found in section "s"');
    }
  });

  it('set appends new keys and sections', async () => {
    await run(['set', 'app.ini', 's', 'k2', 'new value']);
    await run(['set', 'app.ini', 'extra', 'flag', 'on', '--quoted']);
    expect(read('app.ini')).toBe('top = 1\n\n[s]\nk = v\nk2 = new value\n\n[extra]\nflag = "on"\n');
  });

  it('set rejects names that would not read back', async () => {
    await expect(run(['set', 'app.ini', 'bad]', 'k', 'v'])).rejects.toThrow('Section name cannot contain brackets');
    expect(read('app.ini')).toBe('top = 1\n[s]\nk = v\n');
  });
});

describe('export', () => {
  beforeEach(() => {
    write('app.ini', 'top = 1\n[s]\nk = v\n');
  });

  it('writes CSV', async () => {
    await run(['export', 'app.ini', '--to', 'csv']);
    expect(printed()).toBe('Section,Key,Value\n,top,1\ns,k,v\n');
  });

  it('writes compact JSON', async () => {
    await run(['export', 'app.ini', '--to', 'json', '--compact']);
    expect(logged()).toBe('{"_default":{"top":"1"},"s":{"k":"v"}}');
  });

  it('requires a known target format', async () => {
    await expect(run(['export', 'app.ini', '--to', 'xml'])).rejects.toThrow('Invalid --to value: xml. Use json or csv.');
  });
});

describe('.inikit.json', () => {
  it('supplies parser options', async () => {
    write('app.ini', '; not a comment here\n[s]\n');
    expect(await run(['check', 'app.ini'])).toBe(EXIT_CODE.SUCCESS);

    write('.inikit.json', JSON.stringify({ parse: { commentPrefixChars: ['#'], defaultCommentPrefixChar: '#' } }));
    expect(await run(['check', 'app.ini'])).toBe(EXIT_CODE.POLICY_VIOLATION);
  });

  it('warns once about lines a collecting parse skipped', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    write('.inikit.json', JSON.stringify({ parse: { collectParsingErrors: true } }));
    write('app.ini', '[S]\nkey = 1\nimportant line without equals\n');

    expect(await run(['fmt', 'app.ini', '--write'])).toBe(EXIT_CODE.SUCCESS);
    expect(warn).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      'Warning: app.ini: 1 malformed line(s) skipped\n  Line 3: Missing equals sign in key-value pair'
    );
    expect(read('app.ini')).toBe('[S]\nkey = 1\n');
  });

  it('check reports collected errors itself instead of warning', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    write('app.ini', '[S]\nbroken\n');
    expect(await run(['check', 'app.ini'])).toBe(EXIT_CODE.POLICY_VIOLATION);
    expect(warn).not.toHaveBeenCalled();
  });

  it('warns and falls back on an unreadable file', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    write('.inikit.json', '{ nope');
    write('app.ini', '[s]\n');
    expect(await run(['check', 'app.ini'])).toBe(EXIT_CODE.SUCCESS);
    expect(warn).toHaveBeenCalledWith('Warning: Failed to parse .inikit.json, using defaults');
  });

  it('warns on fields of the wrong type', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    write('.inikit.json', JSON.stringify({ encoding: 'ebcdic' }));
    write('app.ini', '[s]\n');
    await run(['check', 'app.ini']);
    expect(warn).toHaveBeenCalledWith(expect.stringMatching(/^Warning: Invalid config in \.inikit\.json \(encoding: /));
  });

  it('--config points at another file', async () => {
    write('custom.json', JSON.stringify({ format: { newline: '\r\n' } }));
    write('a.ini', 'k=v\n');
    await run(['fmt', 'a.ini', '--write', '--config', 'custom.json']);
    expect(read('a.ini')).toBe('k = v\r\n');
  });
});
