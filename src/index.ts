/**
 * iCalendar (RFC 5545) writer
 *
 * Builds calendar component trees and serializes them with CRLF line
 * endings and 75-octet content-line folding.
 *
 * @example
 * ```ts
 * import { ICalendar, Event, Summary, DtStart, saveFile } from 'icalendar-writer';
 *
 * const calendar = new ICalendar('2.0', '-//Example Corp//Planner 1.0//EN');
 * const event = new Event('b68378cf-872d-44f1-9703-5e3725c56e71', '19960704T120000Z');
 * event.push(new DtStart('19960918T143000Z'));
 * event.push(new Summary('Networld+Interop Conference'));
 * calendar.addEvent(event);
 *
 * await saveFile(calendar, 'event.ics');
 * ```
 */

// ── Content lines ──────────────────────────────────────────────────────────
export { LIMIT, LINE_BREAK, findBoundary, fold, foldLine, estimatedSize } from './contentline.js';
export type { Boundary, FoldOptions } from './contentline.js';

// ── Sinks ──────────────────────────────────────────────────────────────────
export { StringSink, ByteCountingSink } from './sink.js';
export type { Sink } from './sink.js';

// ── Components ─────────────────────────────────────────────────────────────
export {
  Component,
  ICalendar,
  Event,
  Todo,
  Journal,
  Alarm,
  TimeZone,
  Standard,
  Daylight,
} from './component.js';

// ── Properties ─────────────────────────────────────────────────────────────
export {
  ICalendarError,

  // Base and value shapes
  Property,
  TextProperty,
  TextListProperty,
  ValueProperty,
  DateTimeProperty,
  IntegerProperty,
  CustomProperty,

  // Calendar (RFC 5545 §3.7)
  Version,
  ProdID,
  CalScale,
  Method,

  // Descriptive (RFC 5545 §3.8.1)
  Attach,
  Categories,
  Class,
  Comment,
  Description,
  Geo,
  Location,
  PercentComplete,
  Priority,
  Resources,
  Status,
  Summary,

  // Date and time (RFC 5545 §3.8.2)
  Completed,
  DtEnd,
  Due,
  DtStart,
  Duration,
  Transp,

  // Time zone (RFC 5545 §3.8.3)
  TzId,
  TzName,
  TzOffsetFrom,
  TzOffsetTo,
  TzUrl,

  // Relationship (RFC 5545 §3.8.4)
  Attendee,
  Contact,
  Organizer,
  RecurrenceId,
  RelatedTo,
  Url,
  Uid,

  // Recurrence (RFC 5545 §3.8.5)
  ExDate,
  RDate,
  RRule,

  // Alarm (RFC 5545 §3.8.6)
  Action,
  Repeat,
  Trigger,

  // Change management (RFC 5545 §3.8.7)
  Created,
  DtStamp,
  LastModified,
  Sequence,

  // Date helpers
  formatDate,
  formatDateTime,
} from './property.js';
export type { DateTimeInput } from './property.js';

// ── Types ──────────────────────────────────────────────────────────────────
export type {
  ValueType,
  EventStatus,
  TodoStatus,
  JournalStatus,
  StatusValue,
  ClassValue,
  TranspValue,
  AlarmAction,
  ParameterMap,
} from './types.js';

// ── Escape utilities ───────────────────────────────────────────────────────
export { escapeText, needsParamQuoting, quoteParamValue } from './escape.js';

// ── Generator ──────────────────────────────────────────────────────────────
export {
  serializeParameters,
  renderContentLine,
  writeProperty,
  writeComponent,
  serializeComponent,
} from './generator.js';

// ── File and stream output ─────────────────────────────────────────────────
export { writeToStream, saveFile } from './writer.js';
