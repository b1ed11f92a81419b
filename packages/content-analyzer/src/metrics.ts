export interface ContentMetrics {
  lineCount: number;
  wordCount: number;
  charCount: number;
}

export const emptyContentMetrics: Readonly<ContentMetrics> = {
  lineCount: 0,
  wordCount: 0,
  charCount: 0,
};

function countWords(line: string): number {
  return line.split(/\s+/).filter((word) => word.length > 0).length;
}

/**
 * Line, word and character counts for a chunk of text. Trailing whitespace is
 * dropped first, so whitespace-only text counts as one empty line.
 * Characters are counted in code points.
 */
export function analyzeContent(text: string): ContentMetrics {
  if (!text) {
    return { ...emptyContentMetrics };
  }

  const lines = text.trimEnd().split('\n');

  return lines.reduce<ContentMetrics>(
    (metrics, line) => ({
      lineCount: metrics.lineCount,
      wordCount: metrics.wordCount + countWords(line),
      charCount: metrics.charCount + Array.from(line).length,
    }),
    { lineCount: lines.length, wordCount: 0, charCount: 0 },
  );
}
