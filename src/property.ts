/**
 * iCalendar property classes — RFC 5545 §3.7–3.8
 *
 * Each class renders its value as the text after the colon of a content
 * line. Parameters are kept in insertion order and emitted by the generator.
 */

import type {
  ParameterMap,
  EventStatus,
  TodoStatus,
  JournalStatus,
  StatusValue,
  ClassValue,
  TranspValue,
  AlarmAction,
} from './types.js';
import { escapeText } from './escape.js';

// ── ICalendar Error ───────────────────────────────────────────────────────

/** Thrown when a value cannot be represented in iCalendar text */
export class ICalendarError extends Error {
  constructor(
    message: string,
    public readonly property?: string,
  ) {
    super(message);
    this.name = 'ICalendarError';
  }
}

/** Values accepted by date-time properties: a Date or preformatted text */
export type DateTimeInput = Date | string;

// ── Base Property ──────────────────────────────────────────────────────────

/** Base class for all iCalendar properties */
export abstract class Property {
  /** Property name (always uppercase) */
  readonly name: string;
  /** Parameters, emitted in insertion order */
  params: ParameterMap;

  constructor(name: string, params?: ParameterMap) {
    if (!/^[A-Za-z0-9-]+$/.test(name)) {
      throw new ICalendarError(`Invalid property name: ${name}`, name);
    }
    this.name = name.toUpperCase();
    this.params = params ?? new Map();
  }

  /** Set a parameter, returning `this` for chaining */
  add(name: string, value: string | string[]): this {
    this.params.set(name.toUpperCase(), value);
    return this;
  }

  protected param(name: string): string | undefined {
    const v = this.params.get(name);
    return Array.isArray(v) ? v[0] : v;
  }

  protected setParam(name: string, value: string | undefined): void {
    if (value === undefined) {
      this.params.delete(name);
    } else {
      this.params.set(name, value);
    }
  }

  /** TZID parameter */
  get tzid(): string | undefined {
    return this.param('TZID');
  }

  set tzid(value: string | undefined) {
    this.setParam('TZID', value);
  }

  /** VALUE parameter */
  get valueType(): string | undefined {
    return this.param('VALUE');
  }

  set valueType(value: string | undefined) {
    this.setParam('VALUE', value);
  }

  /** LANGUAGE parameter */
  get language(): string | undefined {
    return this.param('LANGUAGE');
  }

  set language(value: string | undefined) {
    this.setParam('LANGUAGE', value);
  }

  /** ALTREP parameter */
  get altrep(): string | undefined {
    return this.param('ALTREP');
  }

  set altrep(value: string | undefined) {
    this.setParam('ALTREP', value);
  }

  /** Value text after the colon, already escaped */
  abstract toContentValue(): string;
}

// ── Value shapes ──────────────────────────────────────────────────────────

/** Property with a single TEXT value, escaped on output */
export class TextProperty extends Property {
  value: string;

  constructor(name: string, value: string, params?: ParameterMap) {
    super(name, params);
    this.value = value;
  }

  toContentValue(): string {
    return escapeText(this.value);
  }
}

/** Property with a list of TEXT values (comma-separated) */
export class TextListProperty extends Property {
  values: string[];

  constructor(name: string, values: string[], params?: ParameterMap) {
    super(name, params);
    this.values = values;
  }

  toContentValue(): string {
    return this.values.map(v => escapeText(v)).join(',');
  }
}

/**
 * Property whose value is emitted verbatim: URIs, cal-addresses,
 * recurrence rules, durations, UTC offsets and enumerated tokens.
 */
export class ValueProperty extends Property {
  value: string;

  constructor(name: string, value: string, params?: ParameterMap) {
    super(name, params);
    this.value = value;
  }

  toContentValue(): string {
    return this.value;
  }
}

/** Property holding a DATE-TIME; `Date` values are written in UTC */
export class DateTimeProperty extends Property {
  value: DateTimeInput;

  constructor(name: string, value: DateTimeInput, params?: ParameterMap) {
    super(name, params);
    this.value = value;
  }

  toContentValue(): string {
    if (typeof this.value === 'string') return this.value;
    return this.valueType === 'DATE' ? formatDate(this.value) : formatDateTime(this.value);
  }
}

/** Property holding a non-negative INTEGER within a range */
export class IntegerProperty extends Property {
  value: number;

  constructor(name: string, value: number, min: number, max: number, params?: ParameterMap) {
    super(name, params);
    if (!Number.isInteger(value) || value < min || value > max) {
      throw new ICalendarError(
        `${name.toUpperCase()} must be an integer between ${min} and ${max}, got: ${value}`,
        name.toUpperCase(),
      );
    }
    this.value = value;
  }

  toContentValue(): string {
    return String(this.value);
  }
}

// ── Calendar properties (RFC 5545 §3.7) ───────────────────────────────────

/** VERSION — iCalendar version (RFC 5545 §3.7.4) */
export class Version extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('VERSION', value, params);
  }
}

/** PRODID — Product Identifier (RFC 5545 §3.7.3) */
export class ProdID extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('PRODID', value, params);
  }
}

/** CALSCALE — Calendar Scale (RFC 5545 §3.7.1) */
export class CalScale extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('CALSCALE', value, params);
  }

  static gregorian(): CalScale {
    return new CalScale('GREGORIAN');
  }
}

/** METHOD — iTIP method (RFC 5545 §3.7.2) */
export class Method extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('METHOD', value, params);
  }
}

// ── Descriptive properties (RFC 5545 §3.8.1) ──────────────────────────────

/** ATTACH — Attachment URI (RFC 5545 §3.8.1.1) */
export class Attach extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('ATTACH', value, params);
  }
}

/** CATEGORIES — Categories (RFC 5545 §3.8.1.2) */
export class Categories extends TextListProperty {
  constructor(values: string[], params?: ParameterMap) {
    super('CATEGORIES', values, params);
  }
}

/** CLASS — Classification (RFC 5545 §3.8.1.3) */
export class Class extends ValueProperty {
  constructor(value: ClassValue, params?: ParameterMap) {
    super('CLASS', value, params);
  }

  static public(): Class {
    return new Class('PUBLIC');
  }

  static private(): Class {
    return new Class('PRIVATE');
  }

  static confidential(): Class {
    return new Class('CONFIDENTIAL');
  }
}

/** COMMENT — Comment (RFC 5545 §3.8.1.4) */
export class Comment extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('COMMENT', value, params);
  }
}

/** DESCRIPTION — Description (RFC 5545 §3.8.1.5) */
export class Description extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('DESCRIPTION', value, params);
  }
}

/**
 * GEO — Geographic Position (RFC 5545 §3.8.1.6)
 * Value: latitude ; longitude
 */
export class Geo extends Property {
  latitude: number;
  longitude: number;

  constructor(latitude: number, longitude: number, params?: ParameterMap) {
    super('GEO', params);
    if (!Number.isFinite(latitude) || !Number.isFinite(longitude)) {
      throw new ICalendarError('GEO coordinates must be finite numbers', 'GEO');
    }
    this.latitude = latitude;
    this.longitude = longitude;
  }

  toContentValue(): string {
    return `${this.latitude};${this.longitude}`;
  }
}

/** LOCATION — Location (RFC 5545 §3.8.1.7) */
export class Location extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('LOCATION', value, params);
  }
}

/** PERCENT-COMPLETE — Percent Complete (RFC 5545 §3.8.1.8), VTODO only */
export class PercentComplete extends IntegerProperty {
  constructor(value: number, params?: ParameterMap) {
    super('PERCENT-COMPLETE', value, 0, 100, params);
  }
}

/** PRIORITY — Priority (RFC 5545 §3.8.1.9); 0 is undefined, 1 highest */
export class Priority extends IntegerProperty {
  constructor(value: number, params?: ParameterMap) {
    super('PRIORITY', value, 0, 9, params);
  }
}

/** RESOURCES — Resources (RFC 5545 §3.8.1.10) */
export class Resources extends TextListProperty {
  constructor(values: string[], params?: ParameterMap) {
    super('RESOURCES', values, params);
  }
}

/**
 * STATUS — Status (RFC 5545 §3.8.1.11)
 *
 * The allowed values depend on the component; use the factory for the
 * component at hand.
 */
export class Status extends ValueProperty {
  constructor(value: StatusValue, params?: ParameterMap) {
    super('STATUS', value, params);
  }

  // VEVENT
  static tentative(): Status {
    return new Status('TENTATIVE' satisfies EventStatus);
  }

  static confirmed(): Status {
    return new Status('CONFIRMED' satisfies EventStatus);
  }

  /** Valid on every component that takes STATUS */
  static cancelled(): Status {
    return new Status('CANCELLED');
  }

  // VTODO
  static needsAction(): Status {
    return new Status('NEEDS-ACTION' satisfies TodoStatus);
  }

  static completed(): Status {
    return new Status('COMPLETED' satisfies TodoStatus);
  }

  static inProcess(): Status {
    return new Status('IN-PROCESS' satisfies TodoStatus);
  }

  // VJOURNAL
  static draft(): Status {
    return new Status('DRAFT' satisfies JournalStatus);
  }

  static final(): Status {
    return new Status('FINAL' satisfies JournalStatus);
  }
}

/** SUMMARY — Summary (RFC 5545 §3.8.1.12) */
export class Summary extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('SUMMARY', value, params);
  }
}

// ── Date and time properties (RFC 5545 §3.8.2) ────────────────────────────

/** COMPLETED — Date-Time Completed (RFC 5545 §3.8.2.1), always UTC */
export class Completed extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('COMPLETED', value, params);
  }
}

/** DTEND — Date-Time End (RFC 5545 §3.8.2.2) */
export class DtEnd extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('DTEND', value, params);
  }

  /** All-day end, written as `VALUE=DATE` */
  static date(value: DateTimeInput): DtEnd {
    return new DtEnd(value, new Map([['VALUE', 'DATE']]));
  }
}

/** DUE — Date-Time Due (RFC 5545 §3.8.2.3) */
export class Due extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('DUE', value, params);
  }
}

/** DTSTART — Date-Time Start (RFC 5545 §3.8.2.4) */
export class DtStart extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('DTSTART', value, params);
  }

  /** All-day start, written as `VALUE=DATE` */
  static date(value: DateTimeInput): DtStart {
    return new DtStart(value, new Map([['VALUE', 'DATE']]));
  }
}

/** DURATION — Duration (RFC 5545 §3.8.2.5), e.g. `PT1H30M` */
export class Duration extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('DURATION', value, params);
  }
}

/** TRANSP — Time Transparency (RFC 5545 §3.8.2.7) */
export class Transp extends ValueProperty {
  constructor(value: TranspValue, params?: ParameterMap) {
    super('TRANSP', value, params);
  }

  static opaque(): Transp {
    return new Transp('OPAQUE');
  }

  static transparent(): Transp {
    return new Transp('TRANSPARENT');
  }
}

// ── Time zone properties (RFC 5545 §3.8.3) ────────────────────────────────

/** TZID — Time Zone Identifier (RFC 5545 §3.8.3.1) */
export class TzId extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TZID', value, params);
  }
}

/** TZNAME — Time Zone Name (RFC 5545 §3.8.3.2) */
export class TzName extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TZNAME', value, params);
  }
}

/** TZOFFSETFROM — Time Zone Offset From (RFC 5545 §3.8.3.3), e.g. `-0500` */
export class TzOffsetFrom extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TZOFFSETFROM', value, params);
  }
}

/** TZOFFSETTO — Time Zone Offset To (RFC 5545 §3.8.3.4) */
export class TzOffsetTo extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TZOFFSETTO', value, params);
  }
}

/** TZURL — Time Zone URL (RFC 5545 §3.8.3.5) */
export class TzUrl extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TZURL', value, params);
  }
}

// ── Relationship properties (RFC 5545 §3.8.4) ─────────────────────────────

/** Cal-address property with the common CN parameter */
export class CalAddressProperty extends ValueProperty {
  /** CN (common name) parameter */
  get cn(): string | undefined {
    return this.param('CN');
  }

  set cn(value: string | undefined) {
    this.setParam('CN', value);
  }
}

/** ATTENDEE — Attendee (RFC 5545 §3.8.4.1), e.g. `mailto:a@example.com` */
export class Attendee extends CalAddressProperty {
  constructor(value: string, params?: ParameterMap) {
    super('ATTENDEE', value, params);
  }
}

/** CONTACT — Contact (RFC 5545 §3.8.4.2) */
export class Contact extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('CONTACT', value, params);
  }
}

/** ORGANIZER — Organizer (RFC 5545 §3.8.4.3) */
export class Organizer extends CalAddressProperty {
  constructor(value: string, params?: ParameterMap) {
    super('ORGANIZER', value, params);
  }
}

/** RECURRENCE-ID — Recurrence ID (RFC 5545 §3.8.4.4) */
export class RecurrenceId extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('RECURRENCE-ID', value, params);
  }
}

/** RELATED-TO — Related To (RFC 5545 §3.8.4.5) */
export class RelatedTo extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('RELATED-TO', value, params);
  }
}

/** URL — Uniform Resource Locator (RFC 5545 §3.8.4.6) */
export class Url extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('URL', value, params);
  }
}

/** UID — Unique Identifier (RFC 5545 §3.8.4.7) */
export class Uid extends TextProperty {
  constructor(value: string, params?: ParameterMap) {
    super('UID', value, params);
  }
}

// ── Recurrence properties (RFC 5545 §3.8.5) ───────────────────────────────

/** Comma-separated list of DATE or DATE-TIME values */
export class DateListProperty extends Property {
  values: DateTimeInput[];

  constructor(name: string, values: DateTimeInput[], params?: ParameterMap) {
    super(name, params);
    this.values = values;
  }

  toContentValue(): string {
    const asDate = this.valueType === 'DATE';
    return this.values
      .map(v => (typeof v === 'string' ? v : asDate ? formatDate(v) : formatDateTime(v)))
      .join(',');
  }
}

/** EXDATE — Exception Date-Times (RFC 5545 §3.8.5.1) */
export class ExDate extends DateListProperty {
  constructor(values: DateTimeInput[], params?: ParameterMap) {
    super('EXDATE', values, params);
  }
}

/** RDATE — Recurrence Date-Times (RFC 5545 §3.8.5.2) */
export class RDate extends DateListProperty {
  constructor(values: DateTimeInput[], params?: ParameterMap) {
    super('RDATE', values, params);
  }
}

/** RRULE — Recurrence Rule (RFC 5545 §3.8.5.3), e.g. `FREQ=WEEKLY;COUNT=4` */
export class RRule extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('RRULE', value, params);
  }
}

// ── Alarm properties (RFC 5545 §3.8.6) ────────────────────────────────────

/** ACTION — Action (RFC 5545 §3.8.6.1) */
export class Action extends ValueProperty {
  constructor(value: AlarmAction, params?: ParameterMap) {
    super('ACTION', value, params);
  }

  static audio(): Action {
    return new Action('AUDIO');
  }

  static display(): Action {
    return new Action('DISPLAY');
  }

  static email(): Action {
    return new Action('EMAIL');
  }
}

/** REPEAT — Repeat Count (RFC 5545 §3.8.6.2) */
export class Repeat extends IntegerProperty {
  constructor(value: number, params?: ParameterMap) {
    super('REPEAT', value, 0, Number.MAX_SAFE_INTEGER, params);
  }
}

/**
 * TRIGGER — Trigger (RFC 5545 §3.8.6.3)
 * A DURATION such as `-PT15M`, or a UTC DATE-TIME with `VALUE=DATE-TIME`.
 */
export class Trigger extends ValueProperty {
  constructor(value: string, params?: ParameterMap) {
    super('TRIGGER', value, params);
  }
}

// ── Change management properties (RFC 5545 §3.8.7) ────────────────────────

/** CREATED — Date-Time Created (RFC 5545 §3.8.7.1) */
export class Created extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('CREATED', value, params);
  }
}

/** DTSTAMP — Date-Time Stamp (RFC 5545 §3.8.7.2) */
export class DtStamp extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('DTSTAMP', value, params);
  }
}

/** LAST-MODIFIED — Last Modified (RFC 5545 §3.8.7.3) */
export class LastModified extends DateTimeProperty {
  constructor(value: DateTimeInput, params?: ParameterMap) {
    super('LAST-MODIFIED', value, params);
  }
}

/** SEQUENCE — Sequence Number (RFC 5545 §3.8.7.4) */
export class Sequence extends IntegerProperty {
  constructor(value: number, params?: ParameterMap) {
    super('SEQUENCE', value, 0, Number.MAX_SAFE_INTEGER, params);
  }
}

// ── Non-standard properties (RFC 5545 §3.8.8) ─────────────────────────────

/**
 * Any IANA or X- property not modelled above. The value is emitted as
 * given; escape TEXT values with `escapeText` first.
 */
export class CustomProperty extends ValueProperty {}

// ── Date helpers ──────────────────────────────────────────────────────────

const pad = (n: number, w = 2) => String(n).padStart(w, '0');

function assertValidDate(date: Date): void {
  if (isNaN(date.getTime())) {
    throw new ICalendarError('Invalid date');
  }
}

/** Format as a DATE value: `YYYYMMDD` (UTC calendar day) */
export function formatDate(date: Date): string {
  assertValidDate(date);
  return pad(date.getUTCFullYear(), 4) + pad(date.getUTCMonth() + 1) + pad(date.getUTCDate());
}

/**
 * Format as a DATE-TIME value.
 * UTC form `YYYYMMDDTHHMMSSZ` by default; with `utc = false` the local
 * ("floating") time without the `Z` suffix.
 */
export function formatDateTime(date: Date, utc = true): string {
  assertValidDate(date);
  if (!utc) {
    return (
      pad(date.getFullYear(), 4) +
      pad(date.getMonth() + 1) +
      pad(date.getDate()) +
      'T' +
      pad(date.getHours()) +
      pad(date.getMinutes()) +
      pad(date.getSeconds())
    );
  }
  return (
    formatDate(date) +
    'T' +
    pad(date.getUTCHours()) +
    pad(date.getUTCMinutes()) +
    pad(date.getUTCSeconds()) +
    'Z'
  );
}
