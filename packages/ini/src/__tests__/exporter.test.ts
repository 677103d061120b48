import { describe, it, expect } from 'vitest';
import { DocumentBuilder } from '../builder';
import { Document } from '../document';
import { autoTypedValue, toCsv, toJson } from '../exporter';
import { Property } from '../property';

function sample(): Document {
  return new DocumentBuilder()
    .withDefaultProperty('app', 'demo')
    .withSection('server', s => s.withProperty('port', 8080).withProperty('debug', 'yes'))
    .build();
}

describe('toJson', () => {
  it('nests the default section under _default with two-space indent', () => {
    expect(toJson(sample())).toBe(
      [
        '{',
        '  "_default": {',
        '    "app": "demo"',
        '  },',
        '  "server": {',
        '    "port": "8080",',
        '    "debug": "yes"',
        '  }',
        '}',
      ].join('\n')
    );
  });

  it('flattens and converts types on request', () => {
    const json = toJson(sample(), { indented: false, flattenDefaultSection: true, autoConvertTypes: true });
    expect(json).toBe('{"app":"demo","server":{"port":8080,"debug":true}}');
  });

  it('keeps section order for numeric names', () => {
    const doc = new Document().withSection('b').withSection('10').withSection('2');
    expect(toJson(doc, { indented: false })).toBe('{"b":{},"10":{},"2":{}}');
  });

  it('includes comments when asked', () => {
    const doc = new Document();
    const section = doc.add('s').withComment(' inline').withPreComment(' above');
    section.add(new Property('k', 'v').withComment(' note').withPreComment(' before'));
    section.add('plain', 'x');
    expect(JSON.parse(toJson(doc, { includeComments: true }))).toEqual({
      s: {
        _preComments: [' above'],
        _comment: ' inline',
        k: { value: 'v', preComments: [' before'], comment: ' note' },
        plain: 'x',
      },
    });
  });

  it('autoTypedValue prefers booleans, then integers, then doubles', () => {
    expect(autoTypedValue('1')).toBe(true);
    expect(autoTypedValue('No')).toBe(false);
    expect(autoTypedValue('9007199254740993')).toEqual({ raw: '9007199254740993' });
    expect(autoTypedValue('1.50')).toBe(1.5);
    expect(autoTypedValue('1.2.3')).toBe('1.2.3');
  });
});

describe('toCsv', () => {
  it('writes one row per property with a header', () => {
    expect(toCsv(sample())).toBe('Section,Key,Value\n,app,demo\nserver,port,8080\nserver,debug,yes\n');
  });

  it('quotes fields that need it', () => {
    const doc = new Document();
    doc.add('s').add('k', 'say "hi", twice');
    expect(toCsv(doc, { includeHeader: false })).toBe('s,k,"say ""hi"", twice"\n');
  });

  it('supports custom delimiters, comments and forced quoting', () => {
    const doc = new Document();
    doc.defaultSection.add(new Property('app', 'demo'));
    doc.add('s').add(new Property('k', 'v').withComment('note'));
    expect(toCsv(doc, { delimiter: ';', includeComments: true, alwaysQuote: true })).toBe(
      'Section;Key;Value;Comment\n"";"app";"demo";""\n"s";"k";"v";"note"\n'
    );
  });
});
