import { createHash } from 'crypto';
import fs from 'fs';
import path from 'path';
import { logger, LogSink } from '../utils/logger';
import { classifySectionHeader, directiveValue, parseSubtitleSchema, splitFields } from './assSchema';
import type {
  DisambiguationResult,
  PlayResOverride,
  ScriptSection,
  StyleEntry,
  SubtitleSchema,
  SubtitleScript,
  UnifyResult,
} from './types';

const BOM = '\uFEFF';
const EVENT_KEYS = ['Dialogue', 'Comment'];

/**
 * Per-file style suffix derived from the file's path, not its content
 */
export function styleSuffixFor(filePath: string): string {
  return `u${createHash('md5').update(filePath).digest('hex').slice(0, 8)}`;
}

function tagName(value: string, tag: string): string {
  return `${value.trim()} ${tag}`;
}

/**
 * Pass 1: appends the file's tag to every style it defines and to every
 * event that references one. Returns the rewritten lines and the renamed
 * style definitions. A script whose schema is unresolved comes back untouched.
 */
export function disambiguateStyles(
  lines: string[],
  sourceTag: string,
  schema: SubtitleSchema = parseSubtitleSchema(lines)
): DisambiguationResult {
  const { styleNameIndex, dialogueStyleIndex } = schema;
  if (styleNameIndex === null || dialogueStyleIndex === null) {
    return { lines, styles: [], schema };
  }

  const styles: StyleEntry[] = [];
  const output: string[] = [];
  let section: ScriptSection = 'other';

  for (const line of lines) {
    section = classifySectionHeader(line) ?? section;

    if (section === 'styles') {
      const value = directiveValue(line, 'style');
      const fields = value === null ? [] : splitFields(value.trimStart());
      const name = fields[styleNameIndex];
      if (name !== undefined) {
        fields[styleNameIndex] = tagName(name, sourceTag);
        const definitionLine = `Style: ${fields.join(',')}`;
        styles.push({ name: tagName(name, sourceTag), definitionLine, sourceTag });
        output.push(definitionLine);
        continue;
      }
    }

    if (section === 'events') {
      const rewritten = rewriteEventStyle(line, dialogueStyleIndex, sourceTag);
      if (rewritten !== null) {
        output.push(rewritten);
        continue;
      }
    }

    output.push(line);
  }

  return { lines: output, styles, schema };
}

function rewriteEventStyle(line: string, styleIndex: number, tag: string): string | null {
  for (const key of EVENT_KEYS) {
    const value = directiveValue(line, key);
    if (value === null) continue;

    const fields = splitFields(value.trimStart(), styleIndex + 1);
    const style = fields[styleIndex];
    if (style === undefined) return null;

    fields[styleIndex] = tagName(style, tag);
    return `${key}: ${fields.join(',')}`;
  }
  return null;
}

/**
 * Pass 2: replaces the script's own style definitions with the shared
 * catalog, placed right after the styles section's `Format:` line.
 */
export function mergeStyleCatalog(
  lines: string[],
  styles: StyleEntry[],
  override: PlayResOverride = {},
  schema: SubtitleSchema = parseSubtitleSchema(lines)
): string[] {
  if (schema.styleNameIndex === null || schema.dialogueStyleIndex === null) {
    return lines;
  }

  const output: string[] = [];
  let section: ScriptSection = 'other';
  let inserted = false;

  for (const line of lines) {
    const header = classifySectionHeader(line);
    if (header) {
      section = header;
      output.push(line);
      continue;
    }

    if (section === 'styles') {
      if (directiveValue(line, 'style') !== null) continue;
      if (!inserted && directiveValue(line, 'format') !== null) {
        output.push(line, ...styles.map((style) => style.definitionLine));
        inserted = true;
        continue;
      }
    }

    if (override.playResX !== undefined && directiveValue(line, 'PlayResX') !== null) {
      output.push(`PlayResX: ${override.playResX}`);
      continue;
    }
    if (override.playResY !== undefined && directiveValue(line, 'PlayResY') !== null) {
      output.push(`PlayResY: ${override.playResY}`);
      continue;
    }

    output.push(line);
  }

  return output;
}

export async function readSubtitleScript(filePath: string): Promise<SubtitleScript> {
  const raw = await fs.promises.readFile(filePath, 'utf8');
  const hasBom = raw.startsWith(BOM);
  const text = hasBom ? raw.slice(BOM.length) : raw;

  return {
    path: filePath,
    lines: text.split(/\r?\n/),
    eol: text.includes('\r\n') ? '\r\n' : '\n',
    hasBom,
    originalText: text,
  };
}

/**
 * Writes the lines back with the file's own line endings and BOM.
 * Returns false when nothing changed.
 */
export async function writeSubtitleScript(script: SubtitleScript, lines: string[]): Promise<boolean> {
  const text = lines.join(script.eol);
  if (text === script.originalText) return false;

  await fs.promises.writeFile(script.path, script.hasBom ? BOM + text : text, 'utf8');
  return true;
}

/**
 * Gives every subtitle file the same style catalog. All files are renamed
 * (pass 1) before any of them is merged (pass 2).
 */
export async function unifySubtitleStyles(
  files: string[],
  override: PlayResOverride = {},
  log: LogSink = logger.child('subtitles')
): Promise<UnifyResult> {
  const scripts: SubtitleScript[] = [];
  for (const file of files) {
    scripts.push(await readSubtitleScript(file));
  }

  const passthrough: string[] = [];
  const disambiguated: Array<{ script: SubtitleScript; result: DisambiguationResult }> = [];
  const styles: StyleEntry[] = [];

  for (const script of scripts) {
    const schema = parseSubtitleSchema(script.lines);
    if (schema.styleNameIndex === null || schema.dialogueStyleIndex === null) {
      log.warn(`SubtitleSchemaUnresolved: ${path.basename(script.path)} passes through unchanged`);
      passthrough.push(script.path);
      continue;
    }

    const result = disambiguateStyles(script.lines, styleSuffixFor(script.path), schema);
    log.debug(`${path.basename(script.path)}: ${result.styles.length} style(s)`);
    styles.push(...result.styles);
    disambiguated.push({ script, result });
  }

  const rewritten: string[] = [];
  for (const { script, result } of disambiguated) {
    const merged = mergeStyleCatalog(result.lines, styles, override, result.schema);
    if (await writeSubtitleScript(script, merged)) {
      rewritten.push(script.path);
    }
  }

  log.info(`${styles.length} style(s) shared across ${disambiguated.length} subtitle file(s)`);
  return { styles, rewritten, passthrough };
}
