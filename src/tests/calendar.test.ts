/**
 * Tests for calendar generation.
 * Uses Node.js built-in test runner.
 */

import { test, describe } from 'node:test';
import assert from 'node:assert/strict';

import {
  ICalendar,
  ICalendarError,
  Event,
  Todo,
  Journal,
  Alarm,
  TimeZone,
  Standard,
  Daylight,
  Component,
  StringSink,
  Organizer,
  Attendee,
  DtStart,
  DtEnd,
  DtStamp,
  Due,
  Status,
  Categories,
  Summary,
  Description,
  Location,
  Class,
  Transp,
  Priority,
  PercentComplete,
  Sequence,
  Geo,
  RRule,
  ExDate,
  CalScale,
  Method,
  CustomProperty,
  TextProperty,
  escapeText,
  serializeParameters,
  renderContentLine,
  formatDate,
  formatDateTime,
} from '../index.js';

// ── Helper ─────────────────────────────────────────────────────────────────

const PRODID = '-//xyz Corp//NONSGML PDA Calendar Version 1.0//EN';

function lines(...l: string[]): string {
  return l.map(s => s + '\r\n').join('');
}

// ── Generation ─────────────────────────────────────────────────────────────

describe('Generation', () => {
  test('writes a conference event', () => {
    const event = new Event('b68378cf-872d-44f1-9703-5e3725c56e71', '19960704T120000Z');
    event.push(new Organizer('mailto:jsmith@example.com'));
    event.push(new DtStart('19960918T143000Z'));
    event.push(new DtEnd('19960920T220000Z'));
    event.push(Status.confirmed());
    event.push(new Categories(['CONFERENCE']));
    event.push(new Summary('Networld+Interop Conference'));
    event.push(
      new Description(
        'Networld+Interop Conference and Exhibit\nAtlanta World Congress Center\nAtlanta, Georgia',
      ),
    );

    const calendar = new ICalendar('2.0', PRODID);
    calendar.addEvent(event);

    assert.equal(
      calendar.toString(),
      lines(
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        'PRODID:-//xyz Corp//NONSGML PDA Calendar Version 1.0//EN',
        'BEGIN:VEVENT',
        'UID:b68378cf-872d-44f1-9703-5e3725c56e71',
        'DTSTAMP:19960704T120000Z',
        'ORGANIZER:mailto:jsmith@example.com',
        'DTSTART:19960918T143000Z',
        'DTEND:19960920T220000Z',
        'STATUS:CONFIRMED',
        'CATEGORIES:CONFERENCE',
        'SUMMARY:Networld+Interop Conference',
        'DESCRIPTION:Networld+Interop Conference and Exhibit\\nAtlanta World Congress\r\n' +
          '  Center\\nAtlanta\\, Georgia',
        'END:VEVENT',
        'END:VCALENDAR',
      ),
    );
  });

  test('an empty calendar has only VERSION and PRODID', () => {
    assert.equal(
      new ICalendar('2.0', PRODID).toString(),
      lines('BEGIN:VCALENDAR', 'VERSION:2.0', `PRODID:${PRODID}`, 'END:VCALENDAR'),
    );
  });

  test('properties keep insertion order', () => {
    const event = new Event('uid-1', '20240101T000000Z')
      .push(new Summary('B'))
      .push(new Location('A'))
      .push(new Summary('C'));
    const names = event.properties.map(p => p.name);
    assert.deepEqual(names, ['UID', 'DTSTAMP', 'SUMMARY', 'LOCATION', 'SUMMARY']);
  });

  test('folds multi-byte summaries on character boundaries', () => {
    const event = new Event('uid-2', '20240101T000000Z').push(
      new Summary('Überprüfung der Projektplanung für das nächste Quartal – Ärger vermeiden'),
    );
    const text = event.toString();
    assert.ok(
      text.includes(
        'SUMMARY:Überprüfung der Projektplanung für das nächste Quartal – Ärg\r\n er vermeiden\r\n',
      ),
    );
  });

  test('fold options reach every line', () => {
    const event = new Event('abcdefgh', '20240101T000000Z');
    assert.equal(
      event.toString({ limit: 10 }),
      lines(
        'BEGIN:VEVE\r\n NT',
        'UID:abcdef\r\n gh',
        'DTSTAMP:20\r\n 240101T00\r\n 0000Z',
        'END:VEVENT',
      ),
    );
  });

  test('write() appends to a sink', () => {
    const sink = new StringSink();
    new Component('X-THING').push(new Summary('hi')).write(sink);
    assert.equal(sink.toString(), lines('BEGIN:X-THING', 'SUMMARY:hi', 'END:X-THING'));
  });

  test('nested components are written after the parent properties', () => {
    const calendar = new ICalendar('2.0', PRODID)
      .push(CalScale.gregorian())
      .push(new Method('PUBLISH'));
    calendar.addTodo(new Todo('t1', '20240101T000000Z').push(new Due('20240110T170000Z')));
    calendar.addJournal(new Journal('j1', '20240101T000000Z').push(Status.draft()));

    assert.equal(
      calendar.toString(),
      lines(
        'BEGIN:VCALENDAR',
        'VERSION:2.0',
        `PRODID:${PRODID}`,
        'CALSCALE:GREGORIAN',
        'METHOD:PUBLISH',
        'BEGIN:VTODO',
        'UID:t1',
        'DTSTAMP:20240101T000000Z',
        'DUE:20240110T170000Z',
        'END:VTODO',
        'BEGIN:VJOURNAL',
        'UID:j1',
        'DTSTAMP:20240101T000000Z',
        'STATUS:DRAFT',
        'END:VJOURNAL',
        'END:VCALENDAR',
      ),
    );
  });
});

// ── Parameters ─────────────────────────────────────────────────────────────

describe('Parameters', () => {
  test('values with separators are quoted', () => {
    const organizer = new Organizer('mailto:jdoe@example.com');
    organizer.cn = 'Doe, John';
    assert.equal(renderContentLine(organizer), 'ORGANIZER;CN="Doe, John":mailto:jdoe@example.com');
  });

  test('multiple parameters are joined with semicolons', () => {
    const attendee = new Attendee('mailto:a@example.com')
      .add('role', 'REQ-PARTICIPANT')
      .add('PARTSTAT', 'ACCEPTED')
      .add('RSVP', 'TRUE');
    assert.equal(
      renderContentLine(attendee),
      'ATTENDEE;ROLE=REQ-PARTICIPANT;PARTSTAT=ACCEPTED;RSVP=TRUE:mailto:a@example.com',
    );
  });

  test('multi-valued parameters are comma-joined', () => {
    const params = new Map<string, string | string[]>([
      ['MEMBER', ['mailto:a@example.com', 'mailto:b@example.com']],
      ['CUTYPE', 'GROUP'],
    ]);
    assert.equal(
      serializeParameters(params),
      'MEMBER="mailto:a@example.com","mailto:b@example.com";CUTYPE=GROUP',
    );
  });

  test('empty value lists are skipped', () => {
    assert.equal(serializeParameters(new Map([['DELEGATED-TO', []]])), '');
  });

  test('double quotes in parameter values are rejected', () => {
    const location = new Location('Room 1').add('ALTREP', 'say "hi"');
    assert.throws(() => renderContentLine(location), ICalendarError);
  });

  test('tzid accessor', () => {
    const start = new DtStart('20240315T090000');
    start.tzid = 'Europe/Berlin';
    assert.equal(renderContentLine(start), 'DTSTART;TZID=Europe/Berlin:20240315T090000');
    start.tzid = undefined;
    assert.equal(renderContentLine(start), 'DTSTART:20240315T090000');
  });
});

// ── Escaping ───────────────────────────────────────────────────────────────

describe('Escaping', () => {
  test('escapeText escapes backslash, semicolon, comma and newlines', () => {
    assert.equal(escapeText('a\\b;c,d\ne'), 'a\\\\b\\;c\\,d\\ne');
    assert.equal(escapeText('one\r\ntwo\rthree'), 'one\\ntwo\\nthree');
  });

  test('colons are left alone', () => {
    assert.equal(escapeText('Time: 10:00'), 'Time: 10:00');
  });

  test('text lists escape each item', () => {
    assert.equal(
      renderContentLine(new Categories(['Work, urgent', 'Home'])),
      'CATEGORIES:Work\\, urgent,Home',
    );
  });

  test('custom properties are written verbatim', () => {
    assert.equal(
      renderContentLine(new CustomProperty('X-WR-CALNAME', 'Team; Ops')),
      'X-WR-CALNAME:Team; Ops',
    );
    assert.equal(
      renderContentLine(new TextProperty('X-NOTE', 'Team; Ops')),
      'X-NOTE:Team\\; Ops',
    );
  });
});

// ── Programmatic construction ──────────────────────────────────────────────

describe('Programmatic construction', () => {
  test('Date values become UTC date-times', () => {
    const stamp = new DtStamp(new Date(Date.UTC(2024, 2, 15, 9, 5, 7)));
    assert.equal(renderContentLine(stamp), 'DTSTAMP:20240315T090507Z');
  });

  test('all-day dates', () => {
    const start = DtStart.date(new Date(Date.UTC(2024, 11, 24)));
    const end = DtEnd.date('20241226');
    assert.equal(renderContentLine(start), 'DTSTART;VALUE=DATE:20241224');
    assert.equal(renderContentLine(end), 'DTEND;VALUE=DATE:20241226');
  });

  test('formatDate and formatDateTime', () => {
    const d = new Date(Date.UTC(1996, 6, 4, 12, 0, 0));
    assert.equal(formatDate(d), '19960704');
    assert.equal(formatDateTime(d), '19960704T120000Z');
    assert.equal(formatDateTime(new Date(2024, 0, 2, 3, 4, 5), false), '20240102T030405');
  });

  test('invalid dates are rejected', () => {
    assert.throws(() => formatDateTime(new Date('not a date')), ICalendarError);
    const stamp = new DtStamp(new Date(Number.NaN));
    assert.throws(() => renderContentLine(stamp), ICalendarError);
  });

  test('enumerated factories', () => {
    assert.equal(renderContentLine(Status.tentative()), 'STATUS:TENTATIVE');
    assert.equal(renderContentLine(Status.needsAction()), 'STATUS:NEEDS-ACTION');
    assert.equal(renderContentLine(Status.inProcess()), 'STATUS:IN-PROCESS');
    assert.equal(renderContentLine(Status.final()), 'STATUS:FINAL');
    assert.equal(renderContentLine(Class.confidential()), 'CLASS:CONFIDENTIAL');
    assert.equal(renderContentLine(Transp.transparent()), 'TRANSP:TRANSPARENT');
  });

  test('integer properties are range checked', () => {
    assert.equal(renderContentLine(new Priority(1)), 'PRIORITY:1');
    assert.equal(renderContentLine(new PercentComplete(40)), 'PERCENT-COMPLETE:40');
    assert.equal(renderContentLine(new Sequence(0)), 'SEQUENCE:0');
    assert.throws(() => new Priority(10), ICalendarError);
    assert.throws(() => new PercentComplete(101), ICalendarError);
    assert.throws(() => new Sequence(-1), ICalendarError);
    assert.throws(() => new Priority(1.5), ICalendarError);
  });

  test('GEO and recurrence values', () => {
    assert.equal(renderContentLine(new Geo(37.386013, -122.082932)), 'GEO:37.386013;-122.082932');
    assert.throws(() => new Geo(Number.NaN, 0), ICalendarError);
    assert.equal(
      renderContentLine(new RRule('FREQ=WEEKLY;BYDAY=MO,WE;COUNT=6')),
      'RRULE:FREQ=WEEKLY;BYDAY=MO,WE;COUNT=6',
    );
    const exdate = new ExDate([
      new Date(Date.UTC(2024, 0, 8, 9, 0, 0)),
      '20240110T090000Z',
    ]);
    assert.equal(renderContentLine(exdate), 'EXDATE:20240108T090000Z,20240110T090000Z');
  });

  test('property names are validated', () => {
    assert.throws(() => new CustomProperty('X BAD', 'v'), ICalendarError);
    assert.throws(() => new CustomProperty('X:BAD', 'v'), ICalendarError);
    assert.equal(new CustomProperty('x-lower', 'v').name, 'X-LOWER');
  });
});

// ── Alarms and time zones ──────────────────────────────────────────────────

describe('Alarms', () => {
  test('display alarm inside an event', () => {
    const event = new Event('uid-3', '20240101T000000Z').addAlarm(
      Alarm.display('-PT15M', 'Stand-up in 15 minutes'),
    );
    assert.equal(
      event.toString(),
      lines(
        'BEGIN:VEVENT',
        'UID:uid-3',
        'DTSTAMP:20240101T000000Z',
        'BEGIN:VALARM',
        'ACTION:DISPLAY',
        'TRIGGER:-PT15M',
        'DESCRIPTION:Stand-up in 15 minutes',
        'END:VALARM',
        'END:VEVENT',
      ),
    );
  });

  test('audio alarm with attachment', () => {
    const alarm = Alarm.audio('-PT5M').withAttachment('ftp://example.com/pub/sounds/bell-01.aud');
    assert.deepEqual(
      alarm.properties.map(renderContentLine),
      ['ACTION:AUDIO', 'TRIGGER:-PT5M', 'ATTACH:ftp://example.com/pub/sounds/bell-01.aud'],
    );
  });

  test('email alarm lists its recipients', () => {
    const alarm = Alarm.email('-P2D', 'Reminder', 'Report due', ['mailto:a@example.com']);
    assert.deepEqual(
      alarm.properties.map(renderContentLine),
      [
        'ACTION:EMAIL',
        'TRIGGER:-P2D',
        'DESCRIPTION:Report due',
        'SUMMARY:Reminder',
        'ATTENDEE:mailto:a@example.com',
      ],
    );
  });

  test('email alarm without recipients is rejected', () => {
    assert.throws(() => Alarm.email('-P2D', 'Reminder', 'Report due', []), ICalendarError);
  });
});

describe('Time zones', () => {
  test('VTIMEZONE with standard and daylight observances', () => {
    const zone = new TimeZone(
      'America/New_York',
      new Standard('19671029T020000', '-0400', '-0500').push(
        new RRule('FREQ=YEARLY;BYMONTH=10;BYDAY=-1SU'),
      ),
    ).addObservance(new Daylight('19870405T020000', '-0500', '-0400'));

    assert.equal(
      zone.toString(),
      lines(
        'BEGIN:VTIMEZONE',
        'TZID:America/New_York',
        'BEGIN:STANDARD',
        'DTSTART:19671029T020000',
        'TZOFFSETFROM:-0400',
        'TZOFFSETTO:-0500',
        'RRULE:FREQ=YEARLY;BYMONTH=10;BYDAY=-1SU',
        'END:STANDARD',
        'BEGIN:DAYLIGHT',
        'DTSTART:19870405T020000',
        'TZOFFSETFROM:-0500',
        'TZOFFSETTO:-0400',
        'END:DAYLIGHT',
        'END:VTIMEZONE',
      ),
    );
  });
});
