import { describe, it, expect } from 'vitest';
import { Document } from '../document';
import { Property } from '../property';
import { Section } from '../section';
import { IniInputValidator, validateDocument } from '../validator';

const validator = new IniInputValidator();

describe('IniInputValidator', () => {
  it('section names', () => {
    expect(validator.validateSectionName('server')).toEqual({ valid: true });
    expect(validator.validateSectionName('')).toEqual({ valid: false, message: 'Section name cannot be empty' });
    expect(validator.validateSectionName('a\nb').message).toBe('Section name cannot contain newline characters');
    expect(validator.validateSectionName('a]b').message).toBe('Section name cannot contain brackets');
    expect(validator.validateSectionName('$default').message).toBe('Section name $DEFAULT is reserved');
  });

  it('keys', () => {
    expect(validator.validateKey('port').valid).toBe(true);
    expect(validator.validateKey('').message).toBe('Key cannot be empty');
    expect(validator.validateKey('a\rb').message).toBe('Key cannot contain newline characters');
    expect(validator.validateKey('a=b').message).toBe('Key cannot contain equals sign');
    expect(validator.validateKey('[a').message).toBe('Key cannot start with a bracket');
  });

  it('values may hold line breaks only when quoted', () => {
    expect(validator.validateValue('one\ntwo', true).valid).toBe(true);
    expect(validator.validateValue('one\ntwo', false).message).toBe('Unquoted value cannot contain newline characters');
    expect(validator.validateValue('', false).valid).toBe(true);
  });

  it('comments', () => {
    expect(validator.validatePreComment('').message).toBe('Pre-comment cannot be empty');
    expect(validator.validatePreComment('a\nb').message).toBe('Pre-comment cannot contain newline characters');
    expect(validator.validatePreCommentAsMultiLine('a\nb').valid).toBe(true);
    expect(validator.validateInlineComment('').message).toBe('Inline comment cannot be empty');
    expect(validator.validateInlineComment('a\nb').message).toBe('Inline comment cannot contain newline characters');
    expect(validator.validateInlineComment('fine').valid).toBe(true);
  });
});

describe('validateDocument', () => {
  it('lists section names and keys that would not read back', () => {
    const doc = new Document();
    doc.defaultSection.add(new Property('#tag', '1'));
    doc.add(new Section('odd[name')).add('ok', '1');
    doc.add('fine').add(';x', '2');

    expect(validateDocument(doc)).toEqual([
      { section: '$DEFAULT', key: '#tag', message: 'Key cannot start with a comment prefix' },
      { section: 'odd[name', message: 'Section name cannot contain brackets' },
      { section: 'fine', key: ';x', message: 'Key cannot start with a comment prefix' },
    ]);
  });

  it('returns nothing for a clean document', () => {
    const doc = new Document().withDefaultProperty('k', 'v').withSection('s');
    expect(validateDocument(doc)).toEqual([]);
  });
});
