import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import ical from 'node-ical';
import rrule from 'rrule';
import type { CalendarEvent } from './types.js';
import { FetchError, ParseError, describeError } from './errors.js';
import { isTransientError, withRetry } from './retry.js';
import baseLogger, { type Logger } from './logger.js';
import {
  DAY_MS,
  formatDate,
  formatTime,
  fromWallClock,
  isValidTimeZone,
  startOfDayIn,
  toWallClock,
  zoneAbbreviation,
} from './timezone.js';

export interface ParseOptions {
  now: Date;
  /** How far ahead recurring events are expanded */
  expansionDays: number;
  /** Events that ended longer ago than this are dropped */
  lookbackDays?: number;
}

export interface ParsedCalendar {
  events: CalendarEvent[];
  skipped: ParseError[];
  timeZone: string;
}

type RawComponent = Record<string, unknown>;

interface Recurrence {
  between(after: Date, before: Date, inclusive?: boolean): Date[];
}

function isRecurrence(value: unknown): value is Recurrence {
  return typeof value === 'object' && value !== null && 'between' in value && typeof value.between === 'function';
}

/**
 * node-ical hands RRULEs to rrule with the zone attached, which makes the occurrences
 * depend on the process time zone. Rebuild the rule without a zone, starting at the
 * series' wall-clock DTSTART, so it yields wall-clock times that fromWallClock turns
 * into instants. UNTIL is a UTC instant for timed series and is moved onto the same clock.
 */
function wallClockRule(source: Recurrence, wallClockStart: Date, zone: string, allDay: boolean): Recurrence {
  const options = rrule.RRule.parseString(String(source));
  const until = options.until && !allDay ? toWallClock(options.until, zone) : options.until;
  return new rrule.RRule({ ...options, dtstart: wallClockStart, until, tzid: null });
}

/** The zone a timed series repeats in: its DTSTART TZID when known, UTC otherwise. */
function seriesZone(start: unknown): string {
  const tz = typeof start === 'object' && start !== null && 'tz' in start && typeof start.tz === 'string' ? start.tz : '';
  return tz && isValidTimeZone(tz) ? tz : 'UTC';
}

function asRecord(value: unknown): RawComponent | null {
  if (typeof value !== 'object' || value === null || value instanceof Date) {
    return null;
  }
  return Object.fromEntries(Object.entries(value));
}

function isValidDate(value: unknown): value is Date {
  return value instanceof Date && !Number.isNaN(value.getTime());
}

/** node-ical flags VALUE=DATE values on the Date object itself. */
function isDateOnly(value: unknown): boolean {
  return value instanceof Date && 'dateOnly' in value && value.dateOnly === true;
}

/** Property values come back either bare or as `{ params, val }` when they carry parameters. */
function textOf(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  const record = asRecord(value);
  if (record && typeof record.val === 'string') {
    return record.val;
  }
  return '';
}

function datesOf(value: unknown): Date[] {
  const record = asRecord(value);
  if (!record) {
    return [];
  }
  return Object.values(record).filter(isValidDate);
}

/**
 * Calendar web UIs store descriptions as HTML; reduce them to plain text.
 */
export function stripHtml(text: string): string {
  return text
    .replace(/<br\s*\/?>/gi, '\n')
    .replace(/<\/(p|div|li)>/gi, '\n')
    .replace(/<[^>]*>/g, '')
    .replace(/&nbsp;/g, ' ')
    .replace(/&lt;/g, '<')
    .replace(/&gt;/g, '>')
    .replace(/&quot;/g, '"')
    .replace(/&#39;/g, "'")
    .replace(/&amp;/g, '&')
    .trim();
}

/**
 * The zone all-day events are anchored in: the feed's only VTIMEZONE, or UTC.
 */
export function calendarTimeZone(tzids: Iterable<string>): string {
  const unique = [...new Set(tzids)];
  if (unique.length === 1 && isValidTimeZone(unique[0])) {
    return unique[0];
  }
  return 'UTC';
}

/**
 * node-ical builds date-only values at local midnight; re-anchor them to the calendar zone.
 */
function anchorDay(date: Date, timeZone: string): Date {
  return startOfDayIn(date.getFullYear(), date.getMonth(), date.getDate(), timeZone);
}

function parseComponents(text: string): unknown[] {
  return Object.values(ical.sync.parseICS(text));
}

/**
 * Parse the feed in one pass; when that fails, parse each VEVENT on its own so a
 * single broken entry only costs that entry.
 */
function parseLeniently(text: string, skipped: ParseError[]): unknown[] {
  try {
    return parseComponents(text);
  } catch (error) {
    const timezones = text.match(/BEGIN:VTIMEZONE[\s\S]*?END:VTIMEZONE/g) ?? [];
    const blocks = text.match(/BEGIN:VEVENT[\s\S]*?END:VEVENT/g) ?? [];
    if (blocks.length === 0) {
      throw new FetchError('malformed calendar feed', {}, error);
    }

    const components: unknown[] = [];
    blocks.forEach((block, index) => {
      const wrapped = ['BEGIN:VCALENDAR', 'VERSION:2.0', ...timezones, block, 'END:VCALENDAR'].join('\r\n');
      try {
        components.push(...parseComponents(wrapped));
      } catch (blockError) {
        const uid = /^UID:(.*)$/m.exec(block)?.[1]?.trim() || `#${index + 1}`;
        skipped.push(new ParseError(uid, describeError(blockError)));
      }
    });
    return components;
  }
}

interface Occurrence {
  start: Date;
  end: Date;
}

function occurrenceOf(raw: RawComponent, uid: string, allDay: boolean, timeZone: string): Occurrence {
  if (!isValidDate(raw.start)) {
    throw new ParseError(uid, 'missing or invalid DTSTART');
  }

  const start = allDay ? anchorDay(raw.start, timeZone) : raw.start;
  let end: Date;
  if (isValidDate(raw.end)) {
    end = allDay ? anchorDay(raw.end, timeZone) : raw.end;
  } else {
    end = allDay ? new Date(start.getTime() + DAY_MS) : start;
  }

  if (end.getTime() < start.getTime()) {
    throw new ParseError(uid, 'DTEND is before DTSTART');
  }
  return { start, end };
}

function toEvents(raw: RawComponent, timeZone: string, windowStart: Date, windowEnd: Date): CalendarEvent[] {
  const uid = textOf(raw.uid) || '(no uid)';
  const allDay = raw.datetype === 'date' || isDateOnly(raw.start);
  const base = occurrenceOf(raw, uid, allDay, timeZone);
  const event = (occurrence: Occurrence, source: RawComponent): CalendarEvent => ({
    uid,
    summary: textOf(source.summary).trim(),
    description: stripHtml(textOf(source.description)),
    start: occurrence.start,
    end: occurrence.end,
    allDay,
  });

  const rule = raw.rrule;
  if (!isRecurrence(rule)) {
    return [event(base, raw)];
  }

  // All-day series repeat on calendar days of the feed zone; timed ones on the DTSTART zone.
  const zone = allDay ? timeZone : seriesZone(raw.start);
  // EXDATE and RECURRENCE-ID values are normalised like the occurrences they name.
  const instantOf = (date: Date): number => (allDay ? anchorDay(date, timeZone) : date).getTime();

  const duration = base.end.getTime() - base.start.getTime();
  const excluded = new Set(datesOf(raw.exdate).map(instantOf));
  const overrides: CalendarEvent[] = [];
  for (const value of Object.values(asRecord(raw.recurrences) ?? {})) {
    const override = asRecord(value);
    if (!override) {
      continue;
    }
    if (isValidDate(override.recurrenceid)) {
      excluded.add(instantOf(override.recurrenceid));
    }
    overrides.push(event(occurrenceOf(override, uid, allDay, timeZone), override));
  }

  // wall clock and UTC differ by less than a day, so a day of slack on each side covers the window
  const from = windowStart.getTime() - duration;
  const generated = wallClockRule(rule, toWallClock(base.start, zone), zone, allDay)
    .between(new Date(from - DAY_MS), new Date(windowEnd.getTime() + DAY_MS), true)
    .filter(isValidDate)
    .map((wallClock) => fromWallClock(wallClock, zone))
    .filter((start) => start.getTime() >= from && start.getTime() <= windowEnd.getTime())
    .filter((start) => !excluded.has(start.getTime()))
    .map((start) => event({ start, end: new Date(start.getTime() + duration) }, raw));

  return [...generated, ...overrides];
}

/**
 * Turn an iCalendar document into concrete, UTC-normalised event occurrences.
 * Unusable VEVENTs are reported in `skipped`; a document that is not a calendar
 * at all raises FetchError.
 */
export function parseCalendar(text: string, options: ParseOptions): ParsedCalendar {
  if (!/BEGIN:VCALENDAR/i.test(text)) {
    throw new FetchError('response is not an iCalendar document');
  }

  const skipped: ParseError[] = [];
  const components = parseLeniently(text, skipped)
    .map(asRecord)
    .filter((component): component is RawComponent => component !== null);

  const timeZone = calendarTimeZone(
    components
      .filter((component) => component.type === 'VTIMEZONE')
      .map((component) => textOf(component.tzid))
      .filter((tzid) => tzid.length > 0)
  );

  const lookbackMs = (options.lookbackDays ?? 1) * DAY_MS;
  const windowStart = new Date(options.now.getTime() - lookbackMs);
  const windowEnd = new Date(options.now.getTime() + options.expansionDays * DAY_MS);

  const events: CalendarEvent[] = [];
  for (const component of components) {
    if (component.type !== 'VEVENT') {
      continue;
    }
    try {
      events.push(...toEvents(component, timeZone, windowStart, windowEnd));
    } catch (error) {
      if (error instanceof ParseError) {
        skipped.push(error);
      } else {
        skipped.push(new ParseError(textOf(component.uid) || '(no uid)', describeError(error)));
      }
    }
  }

  const relevant = events
    .filter((event) => event.end.getTime() > windowStart.getTime())
    .sort((a, b) => a.start.getTime() - b.start.getTime() || a.summary.localeCompare(b.summary));

  return { events: relevant, skipped, timeZone };
}

/**
 * Human-readable one-liner for logs.
 */
export function describeEvent(event: CalendarEvent, timeZone = 'UTC'): string {
  const duration = event.end.getTime() - event.start.getTime();
  if (event.allDay || duration >= DAY_MS) {
    return `${event.summary} (${formatDate(event.start, timeZone)})`;
  }

  const stamp = (date: Date): string => `${formatTime(date, timeZone)} ${zoneAbbreviation(date, timeZone)}`;
  const startDate = formatDate(event.start, timeZone);
  const endDate = formatDate(event.end, timeZone);
  const end = startDate === endDate ? stamp(event.end) : `${endDate} ${stamp(event.end)}`;
  return `${event.summary} (${startDate} ${stamp(event.start)} - ${end})`;
}

export function isActive(event: CalendarEvent, now: Date): boolean {
  const at = now.getTime();
  return event.start.getTime() <= at && at < event.end.getTime();
}

async function readCalendarSource(url: string, timeoutMs: number): Promise<string> {
  if (url.startsWith('file://')) {
    return readFile(fileURLToPath(url), 'utf8');
  }
  if (!/^https?:\/\//i.test(url)) {
    return readFile(url, 'utf8');
  }

  const response = await fetch(url, {
    headers: { accept: 'text/calendar' },
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new FetchError(`HTTP ${response.status}`, { url, statusCode: response.status });
  }
  return response.text();
}

export interface CalendarFetcherOptions {
  url: string;
  timeoutMs: number;
  expansionDays: number;
  now?: () => Date;
  maxRetries?: number;
  logger?: Logger;
}

/**
 * Retrieves the feed and holds on to the last set of events that parsed.
 */
export class CalendarFetcher {
  private events: readonly CalendarEvent[] = Object.freeze([]);
  private lastSuccess: Date | null = null;
  private zone = 'UTC';
  private readonly now: () => Date;
  private readonly logger: Logger;

  constructor(private readonly options: CalendarFetcherOptions) {
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger ?? baseLogger.child({ component: 'calendar' });
  }

  /**
   * Fetch and parse the feed without touching the cached event set.
   */
  async fetch(url: string = this.options.url): Promise<readonly CalendarEvent[]> {
    const parsed = await this.load(url);
    return parsed.events;
  }

  /**
   * Fetch, and on success replace the cached event set. On failure the cache is
   * left as it was and the FetchError propagates.
   */
  async refresh(): Promise<readonly CalendarEvent[]> {
    const parsed = await this.load(this.options.url);
    const events = Object.freeze(parsed.events);
    this.events = events;
    this.zone = parsed.timeZone;
    this.lastSuccess = this.now();
    return events;
  }

  current(): readonly CalendarEvent[] {
    return this.events;
  }

  lastSuccessAt(): Date | null {
    return this.lastSuccess;
  }

  timeZone(): string {
    return this.zone;
  }

  private async load(url: string): Promise<ParsedCalendar> {
    let text: string;
    try {
      text = await withRetry(() => readCalendarSource(url, this.options.timeoutMs), {
        operationName: 'calendar fetch',
        maxRetries: this.options.maxRetries ?? 2,
        isRetryable: isTransientError,
      });
    } catch (error) {
      if (error instanceof FetchError) {
        throw error;
      }
      throw new FetchError(describeError(error), { url }, error);
    }

    const parsed = parseCalendar(text, { now: this.now(), expansionDays: this.options.expansionDays });
    for (const problem of parsed.skipped) {
      this.logger.warn({ uid: problem.uid, reason: problem.meta.reason }, problem.message);
    }
    this.logger.debug(
      { events: parsed.events.map((event) => describeEvent(event, parsed.timeZone)) },
      `Parsed ${parsed.events.length} calendar events`
    );
    return parsed;
  }
}
