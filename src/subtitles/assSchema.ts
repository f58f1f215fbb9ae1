import type { ScriptSection, SubtitleSchema } from './types';

const HEADER_PATTERN = /^\[(.*)\]$/;

/**
 * Classifies a section header line, or returns null for any other line.
 * `[V4+ Styles]`, `[V4 Styles]` and any other `[...Styles]` open a styles section.
 */
export function classifySectionHeader(line: string): ScriptSection | null {
  const match = line.trim().match(HEADER_PATTERN);
  if (!match) return null;

  const name = (match[1] ?? '').trim().toLowerCase();
  if (name.endsWith('styles')) return 'styles';
  if (name === 'events') return 'events';
  return 'other';
}

/**
 * Returns the text after `key:` when the line is that directive (case-insensitive)
 */
export function directiveValue(line: string, key: string): string | null {
  const trimmed = line.trimStart();
  if (trimmed.length <= key.length || trimmed[key.length] !== ':') return null;
  if (trimmed.slice(0, key.length).toLowerCase() !== key.toLowerCase()) return null;
  return trimmed.slice(key.length + 1);
}

/**
 * Splits on commas, leaving everything after the `limit`-th comma as the last field.
 * Event text may itself contain commas.
 */
export function splitFields(value: string, limit?: number): string[] {
  if (limit === undefined) return value.split(',');

  const fields: string[] = [];
  let rest = value;
  while (fields.length < limit) {
    const comma = rest.indexOf(',');
    if (comma < 0) break;
    fields.push(rest.slice(0, comma));
    rest = rest.slice(comma + 1);
  }
  fields.push(rest);
  return fields;
}

function fieldIndex(formatValue: string, fieldName: string): number | null {
  const index = splitFields(formatValue).findIndex((field) => field.trim().toLowerCase() === fieldName);
  return index >= 0 ? index : null;
}

/**
 * Resolves the style-name and event-style field positions from the first
 * `Format:` line of each recognised section. Nothing is rewritten here.
 */
export function parseSubtitleSchema(lines: string[]): SubtitleSchema {
  const schema: SubtitleSchema = { styleNameIndex: null, dialogueStyleIndex: null };
  let section: ScriptSection = 'other';
  let formatSeen = false;

  for (const line of lines) {
    const header = classifySectionHeader(line);
    if (header) {
      section = header;
      formatSeen = false;
      continue;
    }

    if (section === 'other' || formatSeen) continue;

    const format = directiveValue(line, 'format');
    if (format === null) continue;
    formatSeen = true;

    if (section === 'styles' && schema.styleNameIndex === null) {
      schema.styleNameIndex = fieldIndex(format, 'name');
    } else if (section === 'events' && schema.dialogueStyleIndex === null) {
      schema.dialogueStyleIndex = fieldIndex(format, 'style');
    }
  }

  return schema;
}
