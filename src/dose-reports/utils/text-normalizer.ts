const INLINE_WHITESPACE = /[ \t\f\v\u00a0\u2007\u202f]+/g;

// "Label:" or "Label =" left at the end of a line by a column break
const STRANDED_LABEL = /[A-Za-z)][ ]?[:=]$/;

// A line that opens with its own "Label:" / "Label =" token
const LABEL_OPENING = /^[A-Za-z][A-Za-z0-9'’().\/ -]*?\s*[:=](\s|$)/;

// "3.1 CT Acquisition" or a bare "CT Acquisition" title
const SECTION_HEADING = /^(?:\d+\.\d+\s+)?CT\s+Acquisition$/i;

// "1 Device", "2 Irradiation Event Summary": a number followed by title-case
// words only, so "1 X-Ray sources" is still read as a value
const NUMBERED_HEADING = /^\d+(?:\.\d+)*\s+[A-Z][A-Za-z-]*(?:\s+[A-Z][A-Za-z-]*)*$/;

/**
 * Normalizes text rendered from a dose report so line-oriented patterns can
 * match it:
 * - CRLF / CR become LF
 * - inline whitespace runs collapse to one space, lines are trimmed
 * - blank line runs collapse to one blank line; leading/trailing blanks go
 * - a label stranded at the end of a line is rejoined with the value on the
 *   next line, unless that line starts a label or is a section heading
 *
 * Never throws. normalizeReportText(normalizeReportText(x)) equals
 * normalizeReportText(x).
 */
export function normalizeReportText(raw: string): string {
  const lines = raw
    .replace(/\r\n?/g, '\n')
    .split('\n')
    .map((line) => line.replace(INLINE_WHITESPACE, ' ').trim());

  const joined: string[] = [];
  for (const line of lines) {
    const previous = joined.length > 0 ? joined[joined.length - 1] : null;
    if (
      previous !== null &&
      line !== '' &&
      STRANDED_LABEL.test(previous) &&
      !LABEL_OPENING.test(line) &&
      !SECTION_HEADING.test(line) &&
      !NUMBERED_HEADING.test(line)
    ) {
      joined[joined.length - 1] = `${previous} ${line}`;
      continue;
    }
    joined.push(line);
  }

  const collapsed: string[] = [];
  for (const line of joined) {
    const atParagraphBreak =
      collapsed.length === 0 || collapsed[collapsed.length - 1] === '';
    if (line === '' && atParagraphBreak) {
      continue;
    }
    collapsed.push(line);
  }
  while (collapsed.length > 0 && collapsed[collapsed.length - 1] === '') {
    collapsed.pop();
  }

  return collapsed.join('\n');
}
