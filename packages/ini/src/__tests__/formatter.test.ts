import { describe, it, expect } from 'vitest';
import { Comment } from '../comment';
import { Document } from '../document';
import { formatIni } from '../formatter';
import { parseIni } from '../parser';
import { Property } from '../property';
import type { Section } from '../section';

function shapeOf(section: Section) {
  return {
    name: section.name,
    comment: section.comment?.toString() ?? null,
    preComments: section.preComments.toArray().map(c => c.toString()),
    properties: section.toArray().map(p => ({
      name: p.name,
      value: p.value,
      isQuoted: p.isQuoted,
      comment: p.comment?.toString() ?? null,
      preComments: p.preComments.toArray().map(c => c.toString()),
    })),
  };
}

function shape(doc: Document) {
  return {
    defaultSection: shapeOf(doc.defaultSection).properties,
    sections: doc.toArray().map(shapeOf),
  };
}

describe('formatIni', () => {
  it('writes the default section, then headers separated by blank lines', () => {
    const doc = new Document();
    doc.defaultSection.add('global', '1');
    const server = doc.add('Server');
    server.preComments.add(' server settings');
    server.setComment(' main');
    server.add('host', 'localhost');
    const port = new Property('port', '8080');
    port.setComment(' default', '#');
    server.add(port);
    doc.add('Empty');

    expect(formatIni(doc)).toBe(
      [
        'global = 1',
        '',
        '; server settings',
        '[Server] ; main',
        'host = localhost',
        'port = 8080 # default',
        '',
        '[Empty]',
        '',
      ].join('\n')
    );
  });

  it('writes nothing for an empty document', () => {
    expect(formatIni(new Document())).toBe('');
  });

  it('starts with the first header when the default section is empty', () => {
    const doc = new Document();
    doc.add('A').add('k', 'v');
    expect(formatIni(doc)).toBe('[A]\nk = v\n');
  });

  it('uses the requested line terminator', () => {
    const doc = new Document().withDefaultProperty('a', 1).withDefaultProperty('b', 2);
    expect(formatIni(doc, { newline: '\r\n' })).toBe('a = 1\r\nb = 2\r\n');
  });

  it('quotes values that cannot be written bare without touching isQuoted', () => {
    const doc = new Document();
    const section = doc.defaultSection;
    section.add('semi', 'a;b');
    section.add('padded', ' x');
    section.add('lines', 'one\ntwo');
    section.add('path', 'C:\\tmp');
    section.add('plain', 'text');
    section.get('plain')?.withQuoted();

    expect(formatIni(doc).split('\n')).toEqual([
      'semi = "a\\;b"',
      'padded = " x"',
      'lines = "one\\ntwo"',
      'path = "C:\\\\tmp"',
      'plain = "text"',
      '',
    ]);
    expect(section.get('semi')?.isQuoted).toBe(false);
  });

  it('skips empty inline comments', () => {
    const doc = new Document();
    const property = new Property('k', 'v');
    property.comment = new Comment('');
    doc.defaultSection.add(property);
    expect(formatIni(doc)).toBe('k = v\n');
  });

  it('writes comments with an unknown prefix using the document default', () => {
    const doc = new Document({ commentPrefixChars: ['#'] });
    const property = new Property('k', 'v');
    property.comment = new Comment('x', '!');
    doc.defaultSection.add(property);
    expect(formatIni(doc)).toBe('k = v #x\n');
  });
});

describe('round-trip', () => {
  it('reads back a document built through the model API', () => {
    const doc = new Document();
    doc.defaultSection.add(new Property('name', 'demo').withComment(' app name'));
    const db = doc.add('Database');
    db.preComments.add(' connection');
    db.preComments.add(new Comment('', '#'));
    db.setComment(' primary');
    db.add(new Property('host', 'db.local'));
    db.add(new Property('password', 'a;b#c').withQuoted());
    db.add(new Property('motd', 'line1\nline2\ttab "q" \\').withQuoted().withPreComment(' shown at login'));
    db.add(new Property('empty', ''));
    doc.add('Empty');

    const reparsed = parseIni(formatIni(doc)).document;
    expect(shape(reparsed)).toEqual(shape(doc));
  });

  it('parse, format, parse is stable', () => {
    const text = [
      '  key1=value1   ;c1',
      '# top',
      '[ Sec ]   # sc',
      'a="x y"  ',
      'b = plain',
      'c = "tab\\there" # t',
      '',
      ';trailing note',
      '[Other]',
    ].join('\n');

    const first = parseIni(text).document;
    const written = formatIni(first);
    const second = parseIni(written).document;

    expect(shape(second)).toEqual(shape(first));
    expect(formatIni(second)).toBe(written);
    expect(written).toBe(
      [
        'key1 = value1 ;c1',
        '',
        '# top',
        '[Sec] # sc',
        'a = "x y"',
        'b = plain',
        'c = "tab\\there" # t',
        '',
        ';trailing note',
        '[Other]',
        '',
      ].join('\n')
    );
  });
});
