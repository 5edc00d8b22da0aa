/**
 * SOURCE_ID tag codec
 *
 * A mirrored event carries its identity as one line of its notes:
 *
 *   SOURCE_ID: <identity-hex>
 *
 * The line may appear anywhere. Everything else in the notes is left
 * byte-for-byte as it was, including CRLF line endings.
 */

export const TAG_PREFIX = 'SOURCE_ID: ';

const TAG_LINE_REGEX = /^SOURCE_ID: ([0-9a-f]{32,})\s*$/;

interface TagLocation {
  identity: string;
  lineIndex: number;
}

function splitLines(notes: string): string[] {
  return notes.split('\n');
}

function locateTag(lines: string[]): TagLocation | null {
  for (let i = 0; i < lines.length; i++) {
    const match = TAG_LINE_REGEX.exec(lines[i]);
    if (match) {
      return { identity: match[1], lineIndex: i };
    }
  }
  return null;
}

export function formatTagLine(identity: string): string {
  return `${TAG_PREFIX}${identity}`;
}

/**
 * Identity carried by the notes, or null for untracked events
 */
export function readTag(notes: string | undefined | null): string | null {
  if (!notes) {
    return null;
  }
  return locateTag(splitLines(notes))?.identity ?? null;
}

/**
 * Notes with the tag set to `identity`. An existing tag line is replaced in
 * place; otherwise the tag becomes the first line.
 */
export function writeTag(notes: string | undefined | null, identity: string): string {
  const tagLine = formatTagLine(identity);
  if (!notes) {
    return tagLine;
  }

  const lines = splitLines(notes);
  const existing = locateTag(lines);
  if (!existing) {
    return `${tagLine}\n${notes}`;
  }

  const old = lines[existing.lineIndex];
  lines[existing.lineIndex] = old.endsWith('\r') ? `${tagLine}\r` : tagLine;
  return lines.join('\n');
}
