/**
 * Zod validation schemas for inikit options.
 *
 * Parser, serializer and merge options accept partial input from callers
 * (and from the CLI's JSON config); these schemas fill defaults and
 * reject malformed values before any document is touched.
 */

import { z } from 'zod';
import type { FormatOptions, IniOptions, MergeOptions } from '@inikit/types';
import { OptionsError } from './errors';

// ============================================================================
// Parser Options
// ============================================================================

const limit = z.number().int().min(0).default(0);

/** Field shapes without the cross-field rules; partial config files validate against this. */
export const IniOptionsShape = z.object({
  commentPrefixChars: z.array(z.string().length(1, 'Comment prefix must be a single character'))
    .min(1, 'At least one comment prefix character is required')
    .default([';', '#']),
  /** Defaults to the first of commentPrefixChars. */
  defaultCommentPrefixChar: z.string().length(1).optional(),
  duplicateKeyPolicy: z.enum(['FirstWin', 'LastWin', 'ThrowError']).default('FirstWin'),
  duplicateSectionPolicy: z.enum(['FirstWin', 'LastWin', 'Merge', 'ThrowError']).default('FirstWin'),
  collectParsingErrors: z.boolean().default(false),
  maxSections: limit,
  maxPropertiesPerSection: limit,
  maxValueLength: limit,
  maxLineLength: limit,
  maxParsingErrors: limit,
  maxPendingComments: limit,
});

export const IniOptionsSchema = IniOptionsShape.superRefine((data, ctx) => {
  const prefix = data.defaultCommentPrefixChar;
  if (prefix !== undefined && !data.commentPrefixChars.includes(prefix)) {
    ctx.addIssue({
      code: z.ZodIssueCode.custom,
      path: ['defaultCommentPrefixChar'],
      message: 'defaultCommentPrefixChar must be one of commentPrefixChars',
    });
  }
  for (const c of data.commentPrefixChars) {
    if (c === '[' || c === '=' || c === '"' || c === '\\' || /\s/.test(c)) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['commentPrefixChars'],
        message: `'${c}' cannot be used as a comment prefix`,
      });
    }
  }
}).transform(data => ({
  ...data,
  defaultCommentPrefixChar: data.defaultCommentPrefixChar ?? data.commentPrefixChars[0],
}));

export type IniOptionsInput = z.input<typeof IniOptionsSchema>;

// ============================================================================
// Serializer Options
// ============================================================================

export const FormatOptionsSchema = z.object({
  newline: z.enum(['\n', '\r\n']).default('\n'),
});

export type FormatOptionsInput = z.input<typeof FormatOptionsSchema>;

// ============================================================================
// Merge Options
// ============================================================================

export const MergeOptionsSchema = z.object({
  applyAddedSections: z.boolean().default(true),
  applyRemovedSections: z.boolean().default(false),
  applyAddedProperties: z.boolean().default(true),
  applyRemovedProperties: z.boolean().default(false),
  applyModifiedProperties: z.boolean().default(true),
});

export type MergeOptionsInput = z.input<typeof MergeOptionsSchema>;

// ============================================================================
// Resolution
// ============================================================================

function resolve<S extends z.ZodTypeAny>(schema: S, input: unknown, label: string): z.output<S> {
  const result = schema.safeParse(input ?? {});
  if (!result.success) {
    const issues = result.error.issues.map(issue =>
      issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message
    );
    throw new OptionsError(`Invalid ${label}`, issues);
  }
  return result.data;
}

export function parseIniOptions(input?: IniOptionsInput): IniOptions {
  return resolve(IniOptionsSchema, input, 'parser options');
}

export function parseFormatOptions(input?: FormatOptionsInput): FormatOptions {
  return resolve(FormatOptionsSchema, input, 'format options');
}

export function parseMergeOptions(input?: MergeOptionsInput): MergeOptions {
  return resolve(MergeOptionsSchema, input, 'merge options');
}
