/**
 * iCalendar generator — RFC 5545
 *
 * Strict output:
 *   - CRLF line endings (§3.1)
 *   - Line folding at 75 octets (§3.1)
 *   - Parameter values quoted when necessary (§3.2)
 */

import type { ParameterMap } from './types.js';
import type { Component } from './component.js';
import { quoteParamValue } from './escape.js';
import { fold, type FoldOptions } from './contentline.js';
import { ICalendarError, type Property } from './property.js';
import { StringSink, type Sink } from './sink.js';

const CRLF = '\r\n';

// ── Parameter serialization ───────────────────────────────────────────────

/**
 * Serialize a ParameterMap to string (without leading semicolon).
 * Multiple values for the same parameter are joined with commas.
 *
 * @throws ICalendarError if a value contains a double quote
 */
export function serializeParameters(params: ParameterMap): string {
  const parts: string[] = [];

  for (const [name, value] of params) {
    const values = Array.isArray(value) ? value : [value];
    if (values.length === 0) continue;
    for (const v of values) {
      if (v.includes('"')) {
        throw new ICalendarError(`Parameter ${name} must not contain a double quote`, name);
      }
    }
    parts.push(`${name}=${values.map(quoteParamValue).join(',')}`);
  }

  return parts.join(';');
}

// ── Content line serialization ────────────────────────────────────────────

/** The unfolded `NAME;PARAMS:VALUE` line for a property */
export function renderContentLine(prop: Property): string {
  const paramStr = serializeParameters(prop.params);
  const separator = paramStr ? `;${paramStr}` : '';
  return `${prop.name}${separator}:${prop.toContentValue()}`;
}

/** Write one property as a folded, CRLF-terminated line */
export function writeProperty(sink: Sink, prop: Property, options?: FoldOptions): void {
  fold(sink, renderContentLine(prop), options);
  sink.write(CRLF);
}

// ── Component serialization ───────────────────────────────────────────────

export function writeComponent(sink: Sink, component: Component, options?: FoldOptions): void {
  fold(sink, `BEGIN:${component.name}`, options);
  sink.write(CRLF);

  for (const prop of component.properties) {
    writeProperty(sink, prop, options);
  }
  for (const child of component.components) {
    writeComponent(sink, child, options);
  }

  fold(sink, `END:${component.name}`, options);
  sink.write(CRLF);
}

/** Serialize a component tree to text */
export function serializeComponent(component: Component, options?: FoldOptions): string {
  const sink = new StringSink();
  writeComponent(sink, component, options);
  return sink.toString();
}
