/**
 * inikit error types.
 *
 * Structured errors for model, parse, conversion and option failures.
 * Every class carries a stable `name` so callers can branch without
 * instanceof across package boundaries.
 */

import type { ParsingErrorRecord } from '@inikit/types';

export class IniError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'IniError';
  }
}

export class InvalidNameError extends IniError {
  public readonly elementName: string;

  constructor(message: string, elementName: string) {
    super(message);
    this.name = 'InvalidNameError';
    this.elementName = elementName;
  }
}

export class CommentFormatError extends IniError {
  constructor(message: string) {
    super(message);
    this.name = 'CommentFormatError';
  }
}

export type ElementType = 'Section' | 'Property';

export class DuplicateNameError extends IniError {
  public readonly elementName: string;
  public readonly elementType: ElementType;

  constructor(elementType: ElementType, elementName: string) {
    super(`${elementType} "${elementName}" already exists`);
    this.name = 'DuplicateNameError';
    this.elementType = elementType;
    this.elementName = elementName;
  }
}

export class NotFoundError extends IniError {
  public readonly elementName: string;
  public readonly elementType: ElementType;
  public readonly sectionName: string | undefined;

  constructor(elementType: ElementType, elementName: string, sectionName?: string) {
    super(
      sectionName !== undefined
        ? `${elementType} "${elementName}" not found in section "${sectionName}"`
        : `${elementType} "${elementName}" not found`
    );
    this.name = 'NotFoundError';
    this.elementType = elementType;
    this.elementName = elementName;
    this.sectionName = sectionName;
  }
}

export class IndexOutOfRangeError extends IniError {
  public readonly index: number;
  public readonly length: number;

  constructor(index: number, length: number) {
    super(`Index ${index} out of range (length ${length})`);
    this.name = 'IndexOutOfRangeError';
    this.index = index;
    this.length = length;
  }
}

export class ValueConversionError extends IniError {
  public readonly value: string;
  public readonly targetKind: string;

  constructor(value: string, targetKind: string, detail?: string) {
    super(detail ? `Cannot convert '${value}' to ${targetKind}: ${detail}` : `Cannot convert '${value}' to ${targetKind}`);
    this.name = 'ValueConversionError';
    this.value = value;
    this.targetKind = targetKind;
  }
}

export class ParsingError extends IniError {
  public readonly lineNumber: number;
  public readonly line: string;
  public readonly errors: ParsingErrorRecord[];

  constructor(errors: ParsingErrorRecord[]) {
    const first = errors[0];
    super(
      first
        ? `Parse error at line ${first.lineNumber}: ${first.reason}`
        : 'Parse error'
    );
    this.name = 'ParsingError';
    this.lineNumber = first ? first.lineNumber : 0;
    this.line = first ? first.line : '';
    this.errors = errors;
  }

  /** Human-readable listing of the first ten errors. */
  describe(): string {
    const lines = [`${this.message}`, `Total errors: ${this.errors.length}`];
    for (const error of this.errors.slice(0, 10)) {
      lines.push(`  Line ${error.lineNumber}: ${error.reason}`);
      lines.push(`    Content: ${error.line}`);
    }
    if (this.errors.length > 10) {
      lines.push(`  ... and ${this.errors.length - 10} more errors`);
    }
    return lines.join('\n');
  }
}

export class DuplicateElementError extends IniError {
  public readonly elementName: string;
  public readonly elementType: ElementType;
  public readonly sectionName: string | undefined;

  constructor(elementType: ElementType, elementName: string, sectionName?: string) {
    super(
      elementType === 'Section'
        ? `Duplicate section name '${elementName}' found`
        : `Duplicate property name '${elementName}' found in section '${sectionName ?? ''}'`
    );
    this.name = 'DuplicateElementError';
    this.elementType = elementType;
    this.elementName = elementName;
    this.sectionName = sectionName;
  }
}

export class OptionsError extends IniError {
  public readonly issues: string[];

  constructor(message: string, issues: string[]) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'OptionsError';
    this.issues = issues;
  }
}
