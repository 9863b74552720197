/**
 * Core type definitions for iCalendar (RFC 5545)
 */

// ── Value Types ────────────────────────────────────────────────────────────

/** Value types defined in RFC 5545 section 3.3 */
export type ValueType =
  | 'BINARY'
  | 'BOOLEAN'
  | 'CAL-ADDRESS'
  | 'DATE'
  | 'DATE-TIME'
  | 'DURATION'
  | 'FLOAT'
  | 'INTEGER'
  | 'PERIOD'
  | 'RECUR'
  | 'TEXT'
  | 'TIME'
  | 'URI'
  | 'UTC-OFFSET'
  | string;

// ── Enumerated property values ────────────────────────────────────────────

/** STATUS values allowed on VEVENT (RFC 5545 §3.8.1.11) */
export type EventStatus = 'TENTATIVE' | 'CONFIRMED' | 'CANCELLED';

/** STATUS values allowed on VTODO */
export type TodoStatus = 'NEEDS-ACTION' | 'COMPLETED' | 'IN-PROCESS' | 'CANCELLED';

/** STATUS values allowed on VJOURNAL */
export type JournalStatus = 'DRAFT' | 'FINAL' | 'CANCELLED';

export type StatusValue = EventStatus | TodoStatus | JournalStatus;

/** CLASS values (RFC 5545 §3.8.1.3) */
export type ClassValue = 'PUBLIC' | 'PRIVATE' | 'CONFIDENTIAL' | string;

/** TRANSP values (RFC 5545 §3.8.2.7) */
export type TranspValue = 'OPAQUE' | 'TRANSPARENT';

/** ACTION values (RFC 5545 §3.8.6.1) */
export type AlarmAction = 'AUDIO' | 'DISPLAY' | 'EMAIL' | string;

// ── Parameter Map ──────────────────────────────────────────────────────────

/** Raw parameter storage: parameter name → value or list of values */
export type ParameterMap = Map<string, string | string[]>;
