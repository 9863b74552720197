/**
 * iCalendar components — RFC 5545 §3.6
 *
 * A component is a named, ordered list of properties plus nested
 * sub-components. Concrete classes only decide which properties come first
 * and which children they accept.
 */

import {
  Property,
  ICalendarError,
  Version,
  ProdID,
  Uid,
  DtStamp,
  DtStart,
  Action,
  Trigger,
  Description,
  Summary,
  Attendee,
  Attach,
  TzId,
  TzOffsetFrom,
  TzOffsetTo,
  type DateTimeInput,
} from './property.js';
import { writeComponent, serializeComponent } from './generator.js';
import type { Sink } from './sink.js';
import type { FoldOptions } from './contentline.js';

// ── Base Component ────────────────────────────────────────────────────────

export class Component {
  readonly name: string;
  readonly properties: Property[] = [];
  readonly components: Component[] = [];

  constructor(name: string) {
    this.name = name.toUpperCase();
  }

  /** Append a property; output keeps insertion order */
  push(property: Property): this {
    this.properties.push(property);
    return this;
  }

  /** Append a nested component */
  add(component: Component): this {
    this.components.push(component);
    return this;
  }

  /** Write `BEGIN:`…`END:` with every line CRLF-terminated and folded */
  write(sink: Sink, options?: FoldOptions): void {
    writeComponent(sink, this, options);
  }

  toString(options?: FoldOptions): string {
    return serializeComponent(this, options);
  }
}

// ── Alarms ────────────────────────────────────────────────────────────────

/**
 * VALARM (RFC 5545 §3.6.6). ACTION and TRIGGER are always first.
 *
 * Usage:
 * ```ts
 * event.addAlarm(Alarm.display('-PT15M', 'Stand-up in 15 minutes'));
 * ```
 */
export class Alarm extends Component {
  constructor(action: Action, trigger: Trigger) {
    super('VALARM');
    this.push(action).push(trigger);
  }

  static audio(trigger: string): Alarm {
    return new Alarm(Action.audio(), new Trigger(trigger));
  }

  static display(trigger: string, description: string): Alarm {
    return new Alarm(Action.display(), new Trigger(trigger)).push(new Description(description));
  }

  /** EMAIL alarms need a summary, a body and at least one recipient */
  static email(trigger: string, summary: string, description: string, attendees: string[]): Alarm {
    if (attendees.length === 0) {
      throw new ICalendarError('EMAIL alarm needs at least one ATTENDEE', 'ATTENDEE');
    }
    const alarm = new Alarm(Action.email(), new Trigger(trigger))
      .push(new Description(description))
      .push(new Summary(summary));
    for (const attendee of attendees) alarm.push(new Attendee(attendee));
    return alarm;
  }

  /** Sound file to play for an AUDIO alarm */
  withAttachment(uri: string): this {
    return this.push(new Attach(uri));
  }
}

// ── Calendar components ───────────────────────────────────────────────────

/** Shared shape of VEVENT, VTODO and VJOURNAL: UID and DTSTAMP first */
export abstract class ScheduledComponent extends Component {
  constructor(name: string, uid: string, dtstamp: DateTimeInput) {
    super(name);
    this.push(new Uid(uid)).push(new DtStamp(dtstamp));
  }
}

/** VEVENT (RFC 5545 §3.6.1) */
export class Event extends ScheduledComponent {
  constructor(uid: string, dtstamp: DateTimeInput) {
    super('VEVENT', uid, dtstamp);
  }

  addAlarm(alarm: Alarm): this {
    return this.add(alarm);
  }
}

/** VTODO (RFC 5545 §3.6.2) */
export class Todo extends ScheduledComponent {
  constructor(uid: string, dtstamp: DateTimeInput) {
    super('VTODO', uid, dtstamp);
  }

  addAlarm(alarm: Alarm): this {
    return this.add(alarm);
  }
}

/** VJOURNAL (RFC 5545 §3.6.3) */
export class Journal extends ScheduledComponent {
  constructor(uid: string, dtstamp: DateTimeInput) {
    super('VJOURNAL', uid, dtstamp);
  }
}

// ── Time zones ────────────────────────────────────────────────────────────

/** Observance shared by STANDARD and DAYLIGHT */
export abstract class ZoneTime extends Component {
  constructor(name: string, dtstart: DateTimeInput, offsetFrom: string, offsetTo: string) {
    super(name);
    this.push(new DtStart(dtstart))
      .push(new TzOffsetFrom(offsetFrom))
      .push(new TzOffsetTo(offsetTo));
  }
}

/** STANDARD observance, e.g. `new Standard('19671029T020000', '-0400', '-0500')` */
export class Standard extends ZoneTime {
  constructor(dtstart: DateTimeInput, offsetFrom: string, offsetTo: string) {
    super('STANDARD', dtstart, offsetFrom, offsetTo);
  }
}

/** DAYLIGHT observance */
export class Daylight extends ZoneTime {
  constructor(dtstart: DateTimeInput, offsetFrom: string, offsetTo: string) {
    super('DAYLIGHT', dtstart, offsetFrom, offsetTo);
  }
}

/** VTIMEZONE (RFC 5545 §3.6.5); needs at least one observance */
export class TimeZone extends Component {
  constructor(tzid: string, observance: Standard | Daylight) {
    super('VTIMEZONE');
    this.push(new TzId(tzid));
    this.add(observance);
  }

  addObservance(observance: Standard | Daylight): this {
    return this.add(observance);
  }
}

// ── Calendar ──────────────────────────────────────────────────────────────

/**
 * VCALENDAR (RFC 5545 §3.4). VERSION and PRODID are required and written
 * first.
 *
 * Usage:
 * ```ts
 * const calendar = new ICalendar('2.0', '-//Example Corp//Planner 1.0//EN');
 * const event = new Event('b68378cf-872d-44f1-9703-5e3725c56e71', '19960704T120000Z');
 * event.push(new Summary('Quarterly review'));
 * calendar.addEvent(event);
 * const text = calendar.toString();
 * ```
 */
export class ICalendar extends Component {
  constructor(version: string, prodid: string) {
    super('VCALENDAR');
    this.push(new Version(version)).push(new ProdID(prodid));
  }

  addEvent(event: Event): this {
    return this.add(event);
  }

  addTodo(todo: Todo): this {
    return this.add(todo);
  }

  addJournal(journal: Journal): this {
    return this.add(journal);
  }

  addTimeZone(timeZone: TimeZone): this {
    return this.add(timeZone);
  }
}
