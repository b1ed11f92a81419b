import MarkdownIt from 'markdown-it';
import { NO_TOPIC } from '@doc-analytics/interface';
import { ContentAnalyzerError } from './errors.js';

interface HeadingPosition {
  line: number;
  title: string;
}

const markdown = new MarkdownIt();

function findTopLevelHeadings(content: string): HeadingPosition[] {
  const tokens = markdown.parse(content, {});
  const headings: HeadingPosition[] = [];

  tokens.forEach((token, index) => {
    if (token.type !== 'heading_open' || token.tag !== 'h1' || !token.map) {
      return;
    }
    const inline = tokens[index + 1];
    if (inline?.type === 'inline') {
      headings.push({ line: token.map[0], title: inline.content.trim() });
    }
  });

  return headings;
}

/**
 * Splits a markdown document into topics keyed by their level-1 heading.
 * Each chunk starts at its heading line and runs up to the next level-1
 * heading. Text ahead of the first heading is kept under `(No Topic)` when
 * it is not blank. A repeated heading replaces the earlier chunk but keeps
 * its position.
 */
export function extractTopics(content: string): Map<string, string> {
  if (!content) {
    throw new ContentAnalyzerError('Invalid document content');
  }

  const headings = findTopLevelHeadings(content);
  const topics = new Map<string, string>();

  if (headings.length === 0) {
    if (content.trim()) {
      topics.set(NO_TOPIC, content);
    }
    return topics;
  }

  const lines = content.split('\n');
  const firstLine = headings[0]?.line ?? 0;

  if (firstLine > 0) {
    const preamble = lines.slice(0, firstLine).join('\n');
    if (preamble.trim()) {
      topics.set(NO_TOPIC, preamble);
    }
  }

  headings.forEach((heading, index) => {
    const end = headings[index + 1]?.line ?? lines.length;
    topics.set(heading.title, lines.slice(heading.line, end).join('\n'));
  });

  return topics;
}
