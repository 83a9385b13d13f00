import { structuredPatch } from 'diff';
import { stringify } from 'yaml';

export interface ReadableDiffOptions {
  /** Unchanged lines shown around each change. Default is 2. */
  contextLines?: number;
  /** Printed where unchanged lines are elided. Default is '...'. */
  separator?: string;
  /** Prefix every line with its old and new line number. Default is true. */
  numberLines?: boolean;
}

const toText = (value: unknown): string => {
  if (value === undefined) {
    return '';
  }
  return typeof value === 'string' ? value : stringify(value, { sortMapEntries: true });
};

const countLines = (text: string): number => {
  if (text === '') {
    return 0;
  }
  const lines = text.split('\n').length;
  return text.endsWith('\n') ? lines - 1 : lines;
};

/**
 * Line diff of two values rendered as YAML, in unified-diff markers (`+`, `-`, ` `) with
 * elided regions marked by the separator. Equal inputs give an empty string.
 */
export function readableDiff(original: unknown, updated: unknown, options: ReadableDiffOptions = {}): string {
  const { contextLines = 2, separator = '...', numberLines = true } = options;
  const before = toText(original);
  const after = toText(updated);

  const { hunks } = structuredPatch('live', 'desired', before, after, '', '', { context: contextLines });
  if (hunks.length === 0) {
    return '';
  }

  const width = String(
    Math.max(...hunks.map((hunk) => Math.max(hunk.oldStart + hunk.oldLines, hunk.newStart + hunk.newLines))),
  ).length;
  const number = (value: number | undefined): string => (value === undefined ? '' : String(value)).padStart(width);

  const output: string[] = [];
  let lastOld = 0;
  let lastNew = 0;

  for (const hunk of hunks) {
    if (hunk.oldStart > lastOld + 1 || hunk.newStart > lastNew + 1) {
      output.push(separator);
    }
    let oldLine = hunk.oldStart;
    let newLine = hunk.newStart;
    for (const line of hunk.lines) {
      const marker = line.charAt(0);
      if (marker !== '+' && marker !== '-' && marker !== ' ') {
        continue;
      }
      const left = marker === '+' ? undefined : oldLine++;
      const right = marker === '-' ? undefined : newLine++;
      output.push(numberLines ? `${number(left)} ${number(right)} ${line}` : line);
    }
    // An empty side starts at line 0.
    lastOld = Math.max(lastOld, oldLine - 1);
    lastNew = Math.max(lastNew, newLine - 1);
  }

  if (lastOld < countLines(before) || lastNew < countLines(after)) {
    output.push(separator);
  }

  return output.join('\n');
}
