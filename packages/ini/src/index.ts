export { NamedList, foldName } from './named-list';
export type { Named } from './named-list';
export { Comment, CommentCollection, DEFAULT_COMMENT_PREFIX } from './comment';
export { ElementBase, validateElementName } from './element';
export { Property } from './property';
export { Section } from './section';
export { Document, DEFAULT_SECTION_NAME, DEFAULT_COMMENT_PREFIX_CHARS, isReservedSectionName } from './document';
export type { DocumentOptions } from './document';
export {
  convertValue,
  formatScalar,
  encodeArray,
  decodeArray,
  decodeTypedArray,
  DEFAULT_MAX_ARRAY_ELEMENTS,
} from './value-codec';
export type { ValueKindMap, ScalarValue } from './value-codec';
export { escapeQuoted, unescapeChar, needsQuoting } from './escape';
export { parseIni, splitLines, PARSE_ERROR } from './parser';
export type { ParseOptions, ParseResult } from './parser';
export { formatIni, formatValue } from './formatter';
export {
  loadIni,
  loadIniFile,
  loadIniFileAsync,
  loadIniStream,
  saveIniFile,
  saveIniFileAsync,
  saveIniStream,
} from './io';
export type { LoadOptions, SaveOptions } from './io';
export { DocumentBuilder, SectionBuilder } from './builder';
export { compareNames, sortPropertiesByName, sortSectionsByName, sortAllByName } from './sort';
export {
  findSections,
  findSectionsByPattern,
  findProperties,
  findPropertiesByPattern,
  findPropertiesWithValue,
  findPropertiesContaining,
  findPropertiesByName,
  findPropertiesByValue,
  copyWithSections,
  copyWithProperties,
} from './query';
export type { PropertyMatch } from './query';
export { substituteValue, substituteProperty, substituteSection, substituteDocument } from './env';
export type { Environment } from './env';
export { createSnapshot, restoreSnapshot, SnapshotHistory, DEFAULT_MAX_SNAPSHOTS } from './snapshot';
export {
  CommandManager,
  AddSectionCommand,
  RemoveSectionCommand,
  MoveSectionCommand,
  SortSectionsCommand,
  AddPropertyCommand,
  RemovePropertyCommand,
  EditPropertyCommand,
  MovePropertyCommand,
  SortPropertiesCommand,
  DEFAULT_MAX_UNDO_DEPTH,
} from './commands';
export type { Command, PropertyEdit } from './commands';
export { IniInputValidator, validateDocument } from './validator';
export type { DocumentIssue } from './validator';
export { toJson, toCsv, autoTypedValue, DEFAULT_SECTION_JSON_KEY } from './exporter';
export type { JsonExportOptions, CsvExportOptions } from './exporter';
