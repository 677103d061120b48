/**
 * @inikit/types: Shared type definitions for inikit
 *
 * Plain data shapes shared by the model, parser, diff engine and CLI.
 * Entity classes live in @inikit/ini; only their serializable
 * descriptions live here.
 */

// ============================================================================
// Core Enums & Literals
// ============================================================================

export type DuplicateKeyPolicy = 'FirstWin' | 'LastWin' | 'ThrowError';
export type DuplicateSectionPolicy = 'FirstWin' | 'LastWin' | 'Merge' | 'ThrowError';

export type ValueKind = 'string' | 'int' | 'long' | 'float' | 'double' | 'decimal' | 'bool';

export type NewlineStyle = '\n' | '\r\n';

// ============================================================================
// Parsing
// ============================================================================

/** One malformed source line, reported by the parser. */
export interface ParsingErrorRecord {
  /** 1-based physical line number */
  lineNumber: number;
  /** The raw, unmodified line */
  line: string;
  reason: string;
}

export interface IniOptions {
  commentPrefixChars: string[];
  defaultCommentPrefixChar: string;
  duplicateKeyPolicy: DuplicateKeyPolicy;
  duplicateSectionPolicy: DuplicateSectionPolicy;
  collectParsingErrors: boolean;
  /** 0 = unlimited */
  maxSections: number;
  /** 0 = unlimited */
  maxPropertiesPerSection: number;
  /** 0 = unlimited */
  maxValueLength: number;
  /** 0 = unlimited */
  maxLineLength: number;
  /** 0 = unlimited */
  maxParsingErrors: number;
  /** 0 = unlimited */
  maxPendingComments: number;
}

// ============================================================================
// Serialization
// ============================================================================

export interface FormatOptions {
  newline: NewlineStyle;
}

// ============================================================================
// Merge
// ============================================================================

export interface MergeOptions {
  applyAddedSections: boolean;
  applyRemovedSections: boolean;
  applyAddedProperties: boolean;
  applyRemovedProperties: boolean;
  applyModifiedProperties: boolean;
}

export interface MergeCounts {
  sectionsAdded: number;
  sectionsRemoved: number;
  propertiesAdded: number;
  propertiesRemoved: number;
  propertiesModified: number;
}

export interface PropertyChange {
  propertyName: string;
  oldValue: string;
  newValue: string;
}

// ============================================================================
// Validation
// ============================================================================

export interface InputValidation {
  valid: boolean;
  message?: string;
}
