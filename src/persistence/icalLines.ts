/**
 * iCalendar (RFC 5545) content line helpers
 */

export interface ContentLine {
  // upper-cased property name
  name: string;
  // upper-cased parameter names, unquoted values
  params: Record<string, string>;
  value: string;
  // parameter section as written, leading ';' included ('' when none)
  paramText: string;
  // unfolded source text, re-emitted verbatim for preserved data
  raw: string;
  lineNumber: number;
}

const MAX_LINE_OCTETS = 75;

/**
 * Join folded continuation lines. Line numbers refer to the first physical
 * line of each logical line.
 */
export function unfoldLines(text: string): Array<{ text: string; lineNumber: number }> {
  const out: Array<{ text: string; lineNumber: number }> = [];
  const physical = text.split(/\r?\n/);

  physical.forEach((line, index) => {
    const previous = out[out.length - 1];
    if ((line.startsWith(' ') || line.startsWith('\t')) && previous) {
      previous.text += line.slice(1);
      return;
    }
    if (line.length > 0) {
      out.push({ text: line, lineNumber: index + 1 });
    }
  });

  return out;
}

/**
 * Fold a logical line at 75 octets without splitting a UTF-8 sequence
 */
export function foldLine(line: string): string {
  if (Buffer.byteLength(line, 'utf8') <= MAX_LINE_OCTETS) return line;

  const segments: string[] = [];
  let current = '';
  let currentOctets = 0;
  // continuation lines carry a leading space
  let limit = MAX_LINE_OCTETS;

  for (const char of line) {
    const octets = Buffer.byteLength(char, 'utf8');
    if (currentOctets + octets > limit) {
      segments.push(current);
      current = '';
      currentOctets = 0;
      limit = MAX_LINE_OCTETS - 1;
    }
    current += char;
    currentOctets += octets;
  }
  segments.push(current);

  return segments.join('\r\n ');
}

export function escapeText(value: string): string {
  return value
    .replace(/\\/g, '\\\\')
    .replace(/;/g, '\\;')
    .replace(/,/g, '\\,')
    .replace(/\r?\n/g, '\\n');
}

export function unescapeText(value: string): string {
  return value.replace(/\\([\\;,nN])/g, (_match, char: string) =>
    char === 'n' || char === 'N' ? '\n' : char
  );
}

/**
 * Index of the first character outside double quotes matching one of chars
 */
function indexOutsideQuotes(text: string, chars: string, from = 0): number {
  let quoted = false;
  for (let i = from; i < text.length; i++) {
    const char = text[i];
    if (char === '"') quoted = !quoted;
    else if (!quoted && char !== undefined && chars.includes(char)) return i;
  }
  return -1;
}

/**
 * Split NAME;PARAM=VALUE:value. Returns null for malformed lines.
 */
export function parseContentLine(raw: string, lineNumber: number): ContentLine | null {
  const colon = indexOutsideQuotes(raw, ':');
  if (colon <= 0) return null;

  const head = raw.slice(0, colon);
  const value = raw.slice(colon + 1);

  const parts: string[] = [];
  let start = 0;
  for (;;) {
    const semicolon = indexOutsideQuotes(head, ';', start);
    if (semicolon === -1) {
      parts.push(head.slice(start));
      break;
    }
    parts.push(head.slice(start, semicolon));
    start = semicolon + 1;
  }

  const [name = '', ...paramParts] = parts;
  if (!/^[A-Za-z0-9-]+$/.test(name)) return null;

  const params: Record<string, string> = {};
  for (const part of paramParts) {
    const eq = part.indexOf('=');
    if (eq <= 0) return null;
    const key = part.slice(0, eq).toUpperCase();
    const paramValue = part.slice(eq + 1);
    params[key] =
      paramValue.startsWith('"') && paramValue.endsWith('"') && paramValue.length >= 2
        ? paramValue.slice(1, -1)
        : paramValue;
  }

  return {
    name: name.toUpperCase(),
    params,
    value,
    paramText: head.slice(name.length),
    raw,
    lineNumber,
  };
}
