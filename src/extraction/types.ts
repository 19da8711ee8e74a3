/**
 * Types for the extraction pipeline
 */

/**
 * Declared type of a frontmatter value
 */
export type FrontmatterValueType =
  | 'string'
  | 'number'
  | 'boolean'
  | 'array'
  | 'date'
  | 'object';

/**
 * Frontmatter delimiter style
 */
export type FrontmatterFormat = 'yaml' | 'toml' | 'json';

/**
 * One frontmatter key with its value in canonical text form.
 * Arrays and objects are JSON, dates ISO 8601, booleans `true`/`false`.
 */
export interface FrontmatterEntry {
  key: string;
  value: string;
  type: FrontmatterValueType;
}

export type TagSource = 'frontmatter' | 'content' | 'dialect';

export interface ExtractedTag {
  /** Normalized tag */
  tag: string;
  source: TagSource;
}

export type LinkKind =
  | 'markdown'
  | 'reference'
  | 'autolink'
  | 'wikilink'
  | 'embed'
  | 'shortcode';

export interface ExtractedLink {
  /** Visible text; null for autolinks and shortcodes */
  text: string | null;
  target: string;
  kind: LinkKind;
  isInternal: boolean;
}

export interface Heading {
  level: number;
  text: string;
  /** 1-based line number within the body */
  line: number;
}

/**
 * Names of the built-in dialects
 */
export type DialectName = 'generic' | 'wikilink' | 'static-site' | 'note-app' | (string & {});

/**
 * Per-file problem that does not prevent indexing
 */
export interface ExtractionWarning {
  path: string;
  code: 'MALFORMED_FRONTMATTER' | 'UNSUPPORTED_FRONTMATTER';
  message: string;
}

/**
 * Per-file problem that prevents indexing of that file only
 */
export interface ExtractionFailure {
  path: string;
  code: 'DECODE_FAILED' | 'BINARY_CONTENT' | 'PARSE_FAILED';
  message: string;
}

/**
 * Structured record produced from one file
 */
export interface ExtractedDocument {
  path: string;
  dialect: DialectName;
  title: string;
  frontmatterFormat: FrontmatterFormat | null;
  frontmatter: FrontmatterEntry[];
  tags: ExtractedTag[];
  links: ExtractedLink[];
  headings: Heading[];
  /** Markdown body without the frontmatter block */
  body: string;
  wordCount: number;
  warnings: ExtractionWarning[];
}

export type ExtractionOutcome =
  | { success: true; document: ExtractedDocument }
  | { success: false; failure: ExtractionFailure };
