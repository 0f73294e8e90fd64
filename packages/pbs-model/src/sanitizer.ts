import { parse as parseTolerant, printParseErrorCode, type ParseError } from 'jsonc-parser';
import { isJsonObject, type JsonObject } from '@hpcpulse/shared';

import { IngestionError } from './errors';

export type LineRepair = {
  /** 1-based line number in the text as it was before this removal. */
  lineNumber: number;
  line: string;
  reason: string;
};

export type ParseSchedulerOutputOptions = {
  /** Label used in errors, e.g. the command that produced the text. */
  source: string;
  /** Upper bound on removed lines. Defaults to the input's line count. */
  maxRepairs?: number;
  onRepair?: (repair: LineRepair) => void;
};

type SyntaxLocation = {
  offset: number;
  reason: string;
};

function tryStrictParse(text: string): { ok: true; value: unknown } | { ok: false } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch {
    return { ok: false };
  }
}

function locateSyntaxError(text: string): SyntaxLocation | null {
  const errors: ParseError[] = [];
  parseTolerant(text, errors, { disallowComments: true, allowTrailingComma: false, allowEmptyContent: false });
  if (errors.length === 0) {
    return null;
  }
  const first = errors.reduce((earliest, candidate) => (candidate.offset < earliest.offset ? candidate : earliest));
  return { offset: first.offset, reason: printParseErrorCode(first.error) };
}

function lineIndexAt(text: string, offset: number): number {
  let index = 0;
  const limit = Math.min(offset, text.length);
  for (let position = 0; position < limit; position += 1) {
    if (text.charCodeAt(position) === 10) {
      index += 1;
    }
  }
  return index;
}

/**
 * Parses `qstat`/`pbsnodes` JSON output. PBS occasionally emits lines that are
 * not valid JSON (unescaped quotes in job variables, stray control characters);
 * each such line is dropped until the remainder parses.
 */
export function parseSchedulerOutput(text: string, options: ParseSchedulerOutputOptions): JsonObject {
  const lines = text.split('\n');
  const maxRepairs = options.maxRepairs ?? lines.length;

  for (let repairs = 0; ; repairs += 1) {
    const candidate = lines.join('\n');
    const attempt = tryStrictParse(candidate);
    if (attempt.ok) {
      if (!isJsonObject(attempt.value)) {
        throw new IngestionError(options.source, 'scheduler output is not a JSON object');
      }
      return attempt.value;
    }

    if (repairs >= maxRepairs || lines.length === 0) {
      throw new IngestionError(
        options.source,
        `unparseable scheduler output after removing ${repairs} line(s)`
      );
    }

    const location = locateSyntaxError(candidate);
    if (!location) {
      throw new IngestionError(options.source, 'unparseable scheduler output: syntax error could not be located');
    }

    const lineIndex = Math.min(lineIndexAt(candidate, location.offset), lines.length - 1);
    const [removed] = lines.splice(lineIndex, 1);
    options.onRepair?.({ lineNumber: lineIndex + 1, line: removed ?? '', reason: location.reason });
  }
}
