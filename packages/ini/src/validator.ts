/**
 * Input validator for user-supplied names, values and comments.
 *
 * Checks text before it reaches the model, and reports elements of an
 * existing document that would not read back the same after a write.
 */

import type { InputValidation } from '@inikit/types';
import { isReservedSectionName } from './document';
import type { Document } from './document';

const NEWLINE_RE = /[\r\n]/;

const valid = (): InputValidation => ({ valid: true });
const invalid = (message: string): InputValidation => ({ valid: false, message });

export class IniInputValidator {
  validateSectionName(value: string): InputValidation {
    if (value === '') return invalid('Section name cannot be empty');
    if (NEWLINE_RE.test(value)) return invalid('Section name cannot contain newline characters');
    if (value.includes('[') || value.includes(']')) return invalid('Section name cannot contain brackets');
    if (isReservedSectionName(value)) return invalid('Section name $DEFAULT is reserved');
    return valid();
  }

  validateKey(value: string): InputValidation {
    if (value === '') return invalid('Key cannot be empty');
    if (NEWLINE_RE.test(value)) return invalid('Key cannot contain newline characters');
    if (value.includes('=')) return invalid('Key cannot contain equals sign');
    if (value.startsWith('[')) return invalid('Key cannot start with a bracket');
    return valid();
  }

  /** Quoted values may hold line breaks; they are escaped on write. */
  validateValue(value: string, isQuoted: boolean): InputValidation {
    if (!isQuoted && NEWLINE_RE.test(value)) {
      return invalid('Unquoted value cannot contain newline characters');
    }
    return valid();
  }

  validatePreComment(value: string): InputValidation {
    if (value === '') return invalid('Pre-comment cannot be empty');
    if (NEWLINE_RE.test(value)) return invalid('Pre-comment cannot contain newline characters');
    return valid();
  }

  /** Multi-line form: one pre-comment per line, so line breaks are allowed. */
  validatePreCommentAsMultiLine(value: string): InputValidation {
    if (value === '') return invalid('Pre-comment cannot be empty');
    return valid();
  }

  validateInlineComment(value: string): InputValidation {
    if (value === '') return invalid('Inline comment cannot be empty');
    if (NEWLINE_RE.test(value)) return invalid('Inline comment cannot contain newline characters');
    return valid();
  }
}

export interface DocumentIssue {
  /** `$DEFAULT` for the default section. */
  section: string;
  key?: string;
  message: string;
}

/**
 * Section names and keys in `doc` that the validator rejects, plus keys
 * starting with one of the document's comment prefixes, which read back
 * as comments.
 */
export function validateDocument(doc: Document, validator = new IniInputValidator()): DocumentIssue[] {
  const issues: DocumentIssue[] = [];

  for (const section of [doc.defaultSection, ...doc]) {
    if (section !== doc.defaultSection) {
      const result = validator.validateSectionName(section.name);
      if (result.message !== undefined) {
        issues.push({ section: section.name, message: result.message });
      }
    }
    for (const property of section) {
      const result = validator.validateKey(property.name);
      if (result.message !== undefined) {
        issues.push({ section: section.name, key: property.name, message: result.message });
      } else if (doc.commentPrefixChars.includes(property.name[0])) {
        issues.push({ section: section.name, key: property.name, message: 'Key cannot start with a comment prefix' });
      }
    }
  }

  return issues;
}
