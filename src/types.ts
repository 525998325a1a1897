export type Severity = 'error' | 'warning' | 'note';

export interface Adjudication {
  accept: boolean;
  fix?: string;
  comment?: string;
}

export interface Issue {
  tool: string;
  type: string;
  file: string;
  line: number;
  col: number;
  severity: Severity;
  message: string;
  code?: string;
  suggestion?: string;
  adjudication?: Adjudication;
  suppressed?: boolean;
  suppression?: { rule: SuppressionRule };
}

export type SuppressionRule = 'ignore-file' | 'ignore-next-line' | 'ignore-block';

/**
 * A document as read from disk. Lines are 1-indexed by position in `lines`
 * (lines[0] is line 1).
 */
export interface Document {
  path: string;
  content: string;
  lines: string[];
  digest: string;
}

/**
 * One LLM review unit: a run of sentences bounded by a character budget.
 */
export interface Segment {
  text: string;
  file: string;
  startLine: number;
}

export interface ReviewSummary {
  errors: number;
  warnings: number;
  notes: number;
}
