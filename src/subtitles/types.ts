/**
 * A style definition after it was renamed for its source file
 */
export interface StyleEntry {
  /** Disambiguated style name */
  name: string;
  /** The full rewritten `Style:` line */
  definitionLine: string;
  /** Fingerprint of the owning subtitle file's path */
  sourceTag: string;
}

/**
 * Field positions resolved from a script's `Format:` lines.
 * `null` means the section had no usable format line and the file passes through.
 */
export interface SubtitleSchema {
  styleNameIndex: number | null;
  dialogueStyleIndex: number | null;
}

export type ScriptSection = 'styles' | 'events' | 'other';

/**
 * A subtitle script held as lines, with what is needed to write it back
 */
export interface SubtitleScript {
  path: string;
  lines: string[];
  /** Line terminator found in the file */
  eol: '\n' | '\r\n';
  /** Whether the file started with a UTF-8 byte order mark */
  hasBom: boolean;
  /** Decoded text as read, without the BOM */
  originalText: string;
}

export interface PlayResOverride {
  playResX?: number;
  playResY?: number;
}

export interface DisambiguationResult {
  lines: string[];
  styles: StyleEntry[];
  schema: SubtitleSchema;
}

export interface UnifyResult {
  /** Every style definition collected in pass 1, in file order */
  styles: StyleEntry[];
  /** Files whose content changed and were written back */
  rewritten: string[];
  /** Files left untouched because their schema could not be resolved */
  passthrough: string[];
}
