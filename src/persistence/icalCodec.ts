/**
 * Calendar file codec
 *
 * Maps a calendar file (one VCALENDAR per group, one VEVENT per event) to
 * a CalendarDocument and back. Properties the planner does not interpret,
 * VALARM and other sub-components, and foreign top-level components such
 * as VTIMEZONE or VTODO are kept as raw lines and written back unchanged.
 */

import { Temporal } from 'temporal-polyfill';
import {
  CalendarDocument,
  EventBlock,
  PlannerEvent,
  PreservedEventData,
} from '../types';
import { ParseFailedError } from '../core/errors';
import { maxInstant } from '../utils/temporal';
import {
  ContentLine,
  escapeText,
  foldLine,
  parseContentLine,
  unescapeText,
  unfoldLines,
} from './icalLines';

export const PRODID = '-//day-planner//day-planner-core 1.0//EN';

const DATE_RE = /^(\d{4})(\d{2})(\d{2})$/;
const DATE_TIME_RE = /^(\d{4})(\d{2})(\d{2})T(\d{2})(\d{2})(\d{2})(Z?)$/;
const DURATION_RE =
  /^([+-])?P(?:(\d+)W)?(?:(\d+)D)?(?:T(?:(\d+)H)?(?:(\d+)M)?(?:(\d+)S)?)?$/;

// properties rewritten on every save
const CALENDAR_MANAGED = new Set(['VERSION', 'PRODID', 'X-WR-CALNAME']);

export interface ParseOptions {
  path: string;
  // zone for floating and all-day values
  timeZone: string;
  // calendar name when the file carries no X-WR-CALNAME
  fallbackName: string;
  // CREATED fallback for events that carry neither CREATED nor DTSTAMP
  now: Temporal.Instant;
}

// ============================================================================
// Value parsing
// ============================================================================

function num(text: string | undefined): number {
  return text === undefined ? 0 : Number.parseInt(text, 10);
}

function fail(options: ParseOptions, line: ContentLine | null, detail: string, cause?: unknown): never {
  throw new ParseFailedError(options.path, detail, line ? line.lineNumber : null, cause);
}

function zoneFor(line: ContentLine, options: ParseOptions): string {
  const tzid = line.params['TZID'];
  if (tzid === undefined) return options.timeZone;
  try {
    Temporal.Now.zonedDateTimeISO(tzid);
    return tzid;
  } catch (error) {
    return fail(options, line, `unknown TZID "${tzid}"`, error);
  }
}

export function parseDateTime(line: ContentLine, options: ParseOptions): Temporal.Instant {
  const value = line.value.trim();
  const zone = zoneFor(line, options);

  try {
    const date = DATE_RE.exec(value);
    if (date) {
      return Temporal.PlainDate.from(
        { year: num(date[1]), month: num(date[2]), day: num(date[3]) },
        { overflow: 'reject' }
      )
        .toZonedDateTime({ timeZone: zone })
        .toInstant();
    }

    const dateTime = DATE_TIME_RE.exec(value);
    if (dateTime) {
      const fields = {
        year: num(dateTime[1]),
        month: num(dateTime[2]),
        day: num(dateTime[3]),
        hour: num(dateTime[4]),
        minute: num(dateTime[5]),
        second: num(dateTime[6]),
      };
      const wall = Temporal.PlainDateTime.from(fields, { overflow: 'reject' });
      return wall.toZonedDateTime(dateTime[7] === 'Z' ? 'UTC' : zone).toInstant();
    }
  } catch (error) {
    return fail(options, line, `invalid ${line.name} value "${value}"`, error);
  }

  return fail(options, line, `invalid ${line.name} value "${value}"`);
}

export function parseDuration(line: ContentLine, options: ParseOptions): Temporal.Duration {
  const match = DURATION_RE.exec(line.value.trim());
  if (!match || line.value.trim() === 'P' || line.value.trim().endsWith('T')) {
    return fail(options, line, `invalid DURATION "${line.value}"`);
  }
  const sign = match[1] === '-' ? -1 : 1;
  const signed = (text: string | undefined) => sign * num(text) || 0;
  return Temporal.Duration.from({
    weeks: signed(match[2]),
    days: signed(match[3]),
    hours: signed(match[4]),
    minutes: signed(match[5]),
    seconds: signed(match[6]),
  });
}

export function formatUtc(instant: Temporal.Instant): string {
  const utc = instant.toZonedDateTimeISO('UTC');
  const pad = (value: number, width = 2) => value.toString().padStart(width, '0');
  return (
    `${pad(utc.year, 4)}${pad(utc.month)}${pad(utc.day)}` +
    `T${pad(utc.hour)}${pad(utc.minute)}${pad(utc.second)}Z`
  );
}

// ============================================================================
// Reader
// ============================================================================

interface EventDraft {
  props: ContentLine[];
  extraLines: string[];
  begin: ContentLine;
  // every line of the block, BEGIN and END included
  raw: string[];
}

function buildEventBlock(
  draft: EventDraft,
  group: string,
  options: ParseOptions
): EventBlock {
  let id: string | null = null;
  let title = '';
  let notes: string | undefined;
  let begin: Temporal.Instant | null = null;
  let beginZone = options.timeZone;
  let end: Temporal.Instant | null = null;
  let duration: ContentLine | null = null;
  let allDay = false;
  let status: string | null = null;
  let completed = false;
  let stamp: Temporal.Instant | null = null;
  let createdAt: Temporal.Instant | null = null;
  let modifiedAt: Temporal.Instant | null = null;
  const params: PreservedEventData['params'] = {};

  for (const prop of draft.props) {
    if (
      (prop.name === 'SUMMARY' || prop.name === 'DESCRIPTION' || prop.name === 'STATUS') &&
      prop.paramText !== ''
    ) {
      params[prop.name] = prop.paramText;
    }

    switch (prop.name) {
      case 'UID':
        id = prop.value.trim();
        break;
      case 'SUMMARY':
        title = unescapeText(prop.value);
        break;
      case 'DESCRIPTION':
        notes = unescapeText(prop.value);
        break;
      case 'DTSTART':
        begin = parseDateTime(prop, options);
        beginZone = prop.value.trim().endsWith('Z') ? 'UTC' : zoneFor(prop, options);
        allDay = prop.params['VALUE'] === 'DATE' || DATE_RE.test(prop.value.trim());
        break;
      case 'DTEND':
        end = parseDateTime(prop, options);
        break;
      case 'DURATION':
        duration = prop;
        break;
      case 'STATUS': {
        const value = prop.value.trim().toUpperCase();
        completed = value === 'COMPLETED';
        status = completed ? null : prop.value.trim();
        break;
      }
      case 'DTSTAMP':
        stamp = parseDateTime(prop, options);
        break;
      case 'CREATED':
        createdAt = parseDateTime(prop, options);
        break;
      case 'LAST-MODIFIED':
        modifiedAt = parseDateTime(prop, options);
        break;
    }
  }

  if (!id) return fail(options, draft.begin, 'VEVENT without UID');
  if (!begin) return fail(options, draft.begin, `VEVENT ${id} without DTSTART`);

  if (!end && duration) {
    end = begin
      .toZonedDateTimeISO(beginZone)
      .add(parseDuration(duration, options))
      .toInstant();
  }
  if (!end) {
    // RFC 5545: an all-day event without end lasts one day
    end = allDay
      ? begin.toZonedDateTimeISO(beginZone).add({ days: 1 }).toInstant()
      : begin;
  }
  if (Temporal.Instant.compare(end, begin) < 0) {
    return fail(options, draft.begin, `VEVENT ${id} ends before it begins`);
  }

  const created = createdAt ?? stamp ?? options.now;
  const event: PlannerEvent = {
    id,
    title,
    begin,
    end,
    group,
    completed,
    createdAt: created,
    modifiedAt: modifiedAt ?? created,
    ...(notes === undefined ? {} : { notes }),
  };

  const preserved: PreservedEventData = {
    extraLines: draft.extraLines,
    params,
    status,
    stamp,
  };
  return { event, preserved };
}

const KNOWN_EVENT_PROPS = new Set([
  'UID',
  'SUMMARY',
  'DESCRIPTION',
  'DTSTART',
  'DTEND',
  'DURATION',
  'STATUS',
  'DTSTAMP',
  'CREATED',
  'LAST-MODIFIED',
]);

/**
 * Parse a calendar file. Several VCALENDAR objects in one file are merged
 * into one document; only the first VEVENT of each UID becomes an event.
 * Throws ParseFailedError with the offending line.
 */
export function parseCalendar(text: string, options: ParseOptions): CalendarDocument {
  const lines = unfoldLines(text);
  let name: string | null = null;
  const extraLines: string[] = [];
  const drafts: EventDraft[] = [];
  let calendars = 0;

  let index = 0;
  const next = (): ContentLine | null => {
    const entry = lines[index++];
    if (!entry) return null;
    const line = parseContentLine(entry.text, entry.lineNumber);
    if (!line) {
      return fail(options, null, `malformed content line ${entry.lineNumber}: "${entry.text}"`);
    }
    return line;
  };

  // raw lines of a component up to and including its END
  const captureComponent = (begin: ContentLine): string[] => {
    const captured = [begin.raw];
    const open = [begin.value.trim().toUpperCase()];
    while (open.length > 0) {
      const line = next();
      if (!line) return fail(options, begin, `unterminated ${begin.value} component`);
      captured.push(line.raw);
      if (line.name === 'BEGIN') open.push(line.value.trim().toUpperCase());
      if (line.name === 'END') {
        const expected = open.pop();
        if (line.value.trim().toUpperCase() !== expected) {
          return fail(options, line, `END:${line.value} does not close ${expected ?? ''}`);
        }
      }
    }
    return captured;
  };

  const readEvent = (begin: ContentLine): EventDraft => {
    const draft: EventDraft = { props: [], extraLines: [], begin, raw: [begin.raw] };
    for (;;) {
      const line = next();
      if (!line) return fail(options, begin, 'unterminated VEVENT');
      if (line.name === 'END') {
        if (line.value.trim().toUpperCase() !== 'VEVENT') {
          return fail(options, line, `END:${line.value} inside VEVENT`);
        }
        draft.raw.push(line.raw);
        return draft;
      }
      if (line.name === 'BEGIN') {
        const component = captureComponent(line);
        draft.extraLines.push(...component);
        draft.raw.push(...component);
        continue;
      }
      if (KNOWN_EVENT_PROPS.has(line.name)) {
        draft.props.push(line);
      } else {
        draft.extraLines.push(line.raw);
      }
      draft.raw.push(line.raw);
    }
  };

  for (;;) {
    const line = next();
    if (!line) break;

    if (line.name !== 'BEGIN' || line.value.trim().toUpperCase() !== 'VCALENDAR') {
      return fail(options, line, `expected BEGIN:VCALENDAR, found ${line.raw}`);
    }
    calendars++;

    for (;;) {
      const inner = next();
      if (!inner) return fail(options, line, 'unterminated VCALENDAR');
      if (inner.name === 'END') {
        if (inner.value.trim().toUpperCase() !== 'VCALENDAR') {
          return fail(options, inner, `END:${inner.value} inside VCALENDAR`);
        }
        break;
      }
      if (inner.name === 'BEGIN') {
        if (inner.value.trim().toUpperCase() === 'VEVENT') {
          drafts.push(readEvent(inner));
        } else {
          extraLines.push(...captureComponent(inner));
        }
        continue;
      }
      if (inner.name === 'X-WR-CALNAME') {
        name ??= unescapeText(inner.value);
        continue;
      }
      if (!CALENDAR_MANAGED.has(inner.name)) {
        extraLines.push(inner.raw);
      }
    }
  }

  if (calendars === 0) {
    return fail(options, null, 'no VCALENDAR found');
  }

  const group = name ?? options.fallbackName;
  const events: EventBlock[] = [];
  const seen = new Set<string>();
  for (const draft of drafts) {
    const block = buildEventBlock(draft, group, options);
    if (seen.has(block.event.id)) {
      // later blocks sharing a UID (recurrence overrides, copies) are kept as written
      extraLines.push(...draft.raw);
      continue;
    }
    seen.add(block.event.id);
    events.push(block);
  }
  return { name: group, extraLines, events };
}

// ============================================================================
// Writer
// ============================================================================

function eventLines({ event, preserved }: EventBlock): string[] {
  const { params } = preserved;
  const stamp = preserved.stamp
    ? maxInstant(preserved.stamp, event.modifiedAt)
    : event.modifiedAt;

  const lines = [
    'BEGIN:VEVENT',
    `UID:${event.id}`,
    `DTSTAMP:${formatUtc(stamp)}`,
    `DTSTART:${formatUtc(event.begin)}`,
    `DTEND:${formatUtc(event.end)}`,
    `SUMMARY${params.SUMMARY ?? ''}:${escapeText(event.title)}`,
  ];
  if (event.notes !== undefined) {
    lines.push(`DESCRIPTION${params.DESCRIPTION ?? ''}:${escapeText(event.notes)}`);
  }
  lines.push(
    `STATUS${params.STATUS ?? ''}:${event.completed ? 'COMPLETED' : preserved.status ?? 'CONFIRMED'}`,
    `CREATED:${formatUtc(event.createdAt)}`,
    `LAST-MODIFIED:${formatUtc(event.modifiedAt)}`,
    ...preserved.extraLines,
    'END:VEVENT'
  );
  return lines;
}

// kept VEVENT blocks go after the events so the first block of a UID stays first
function splitKeptEvents(extraLines: string[]): { leading: string[]; trailing: string[] } {
  const leading: string[] = [];
  const trailing: string[] = [];
  let depth = 0;
  let inEvent = false;
  for (const line of extraLines) {
    const upper = line.toUpperCase();
    if (upper.startsWith('BEGIN:')) {
      if (depth === 0) inEvent = upper.trim() === 'BEGIN:VEVENT';
      depth++;
    }
    (inEvent ? trailing : leading).push(line);
    if (upper.startsWith('END:') && depth > 0) {
      depth--;
      if (depth === 0) inEvent = false;
    }
  }
  return { leading, trailing };
}

/**
 * Serialize a document with CRLF line endings and folded lines
 */
export function serializeCalendar(document: CalendarDocument): string {
  const { leading, trailing } = splitKeptEvents(document.extraLines);
  const lines = [
    'BEGIN:VCALENDAR',
    'VERSION:2.0',
    `PRODID:${PRODID}`,
    `X-WR-CALNAME:${escapeText(document.name)}`,
    ...leading,
    ...document.events.flatMap(eventLines),
    ...trailing,
    'END:VCALENDAR',
  ];
  return lines.map(foldLine).join('\r\n') + '\r\n';
}

export function emptyPreserved(): PreservedEventData {
  return { extraLines: [], params: {}, status: null, stamp: null };
}
