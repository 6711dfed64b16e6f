/**
 * Zod validation schemas for log format configuration
 * Ensures the delimiters stay consistent with each other at load time
 */

import { z } from 'zod';

const HEADER_MARKER_MESSAGE = 'header marker must equal the quote character followed by the field delimiter';

/**
 * Schema for a resolved LogFormat (camelCase, used by parser options)
 */
export const LogFormatSchema = z.object({
  quoteChar: z.string().max(1),
  fieldDelimiter: z.string().min(1),
  headerMarker: z.string().min(1),
  changeSeparator: z.string().min(1),
  blockDelimiter: z.string().min(1),
  lineDelimiter: z.string().min(1),
}).refine(data => data.headerMarker === data.quoteChar + data.fieldDelimiter, {
  message: HEADER_MARKER_MESSAGE,
  path: ['headerMarker'],
}).refine(data => data.blockDelimiter.includes(data.lineDelimiter), {
  message: 'block delimiter must contain the line delimiter',
  path: ['blockDelimiter'],
});

export const AmbiguousBlockPolicySchema = z.enum(['share', 'reject']);

/**
 * Schema for config-defaults/log-format.yaml and user format files
 */
export const LogFormatYamlSchema = z.object({
  quote_char: z.string().max(1),
  field_delimiter: z.string().min(1),
  header_marker: z.string().min(1),
  change_separator: z.string().min(1),
  block_delimiter: z.string().min(1),
  line_delimiter: z.string().min(1),
  ambiguous_blocks: AmbiguousBlockPolicySchema.default('share'),
}).refine(data => data.header_marker === data.quote_char + data.field_delimiter, {
  message: HEADER_MARKER_MESSAGE,
  path: ['header_marker'],
}).refine(data => data.block_delimiter.includes(data.line_delimiter), {
  message: 'block delimiter must contain the line delimiter',
  path: ['block_delimiter'],
});
