/**
 * Placeholder syntax: `@[name]@`
 *
 * The name is one or more characters other than `]`, trimmed of
 * surrounding whitespace. Anything that does not match is plain text.
 */

export const OPEN_DELIMITER = "@[";
export const CLOSE_DELIMITER = "]@";

/**
 * Matches one marker and captures its raw (untrimmed) name.
 * Always use a fresh copy via {@link placeholderPattern}; the `g` flag makes it stateful.
 */
export const PLACEHOLDER_PATTERN = /@\[([^\]]+)\]@/g;

export function placeholderPattern(): RegExp {
  return new RegExp(PLACEHOLDER_PATTERN.source, "g");
}

/**
 * A marker found in template content
 */
export interface ScannedMarker {
  /** Full match including delimiters: @[ name ]@ */
  raw: string;
  /** Trimmed placeholder name */
  name: string;
  /** Start index in content */
  startIndex: number;
  /** End index in content (exclusive) */
  endIndex: number;
}

/**
 * A strict-mode syntax problem
 */
export interface SyntaxIssue {
  offset: number;
  message: string;
}

/**
 * Find every marker in document order
 */
export function scanMarkers(content: string): ScannedMarker[] {
  const markers: ScannedMarker[] = [];
  const regex = placeholderPattern();
  let match: RegExpExecArray | null;

  while ((match = regex.exec(content)) !== null) {
    markers.push({
      raw: match[0],
      name: (match[1] ?? "").trim(),
      startIndex: match.index,
      endIndex: match.index + match[0].length,
    });
  }

  return markers;
}

/**
 * Canonical marker text for a placeholder name
 */
export function markerFor(name: string): string {
  return `${OPEN_DELIMITER}${name}${CLOSE_DELIMITER}`;
}

/**
 * First strict-mode problem in the content, or null if there is none.
 *
 * Two things are problems: an opening delimiter that is not part of any
 * marker, and a marker whose name is blank once trimmed.
 */
export function findSyntaxIssue(content: string): SyntaxIssue | null {
  const markers = scanMarkers(content);

  let blank: SyntaxIssue | null = null;
  const blankMarker = markers.find((marker) => marker.name.length === 0);
  if (blankMarker) {
    blank = { offset: blankMarker.startIndex, message: `Blank placeholder name in '${blankMarker.raw}'` };
  }

  let unclosed: SyntaxIssue | null = null;
  let index = content.indexOf(OPEN_DELIMITER);
  while (index !== -1) {
    const at = index;
    if (!markers.some((m) => at >= m.startIndex && at < m.endIndex)) {
      unclosed = { offset: at, message: `Unclosed '${OPEN_DELIMITER}' (expected '${CLOSE_DELIMITER}')` };
      break;
    }
    index = content.indexOf(OPEN_DELIMITER, index + 1);
  }

  if (blank && unclosed) {
    return unclosed.offset < blank.offset ? unclosed : blank;
  }
  return blank ?? unclosed;
}
