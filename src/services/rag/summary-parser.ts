/**
 * Summary Parser
 * Splits a markdown summary into subtopic sections on second-level headings
 */

export interface SummarySection {
  subtopic: string;
  /** Section text verbatim, heading line included */
  text: string;
  /** Segment ids cited with `[cite: 1, 2]` markers, ascending and unique */
  citedSegmentIds: number[];
}

const SUBTOPIC_HEADING = /^##\s+(.+)$/;
const CODE_FENCE = /^(```|~~~)/;
const CITATION = /\[cite:\s*(\d+(?:\s*,\s*\d+)*)\]/g;

/**
 * Segment ids referenced by `[cite: ...]` markers. Markers stay in the text.
 */
export function extractCitations(text: string): number[] {
  const ids = new Set<number>();
  for (const match of text.matchAll(CITATION)) {
    for (const id of (match[1] ?? '').split(',')) {
      ids.add(parseInt(id.trim(), 10));
    }
  }
  return [...ids].sort((a, b) => a - b);
}

/**
 * Parse `## Title` sections. Text before the first heading, or a summary with
 * no headings at all, becomes a section labelled `defaultLabel`. Headings
 * inside fenced code blocks are ignored. Joining the section texts with '\n'
 * reproduces the input apart from a whitespace-only preamble.
 */
export function parseSummarySections(markdown: string, defaultLabel: string): SummarySection[] {
  const sections: SummarySection[] = [];
  let currentLines: string[] = [];
  let currentSubtopic = defaultLabel;
  let inCodeBlock = false;

  const pushCurrent = () => {
    const text = currentLines.join('\n');
    if (text.trim()) {
      sections.push({ subtopic: currentSubtopic, text, citedSegmentIds: extractCitations(text) });
    }
  };

  for (const line of markdown.split('\n')) {
    if (CODE_FENCE.test(line.trimStart())) {
      inCodeBlock = !inCodeBlock;
    }

    const heading = inCodeBlock ? null : SUBTOPIC_HEADING.exec(line);
    if (heading?.[1] !== undefined) {
      pushCurrent();
      currentLines = [line];
      currentSubtopic = heading[1].trim() || defaultLabel;
    } else {
      currentLines.push(line);
    }
  }

  pushCurrent();
  return sections;
}
