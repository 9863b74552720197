/**
 * File and stream output for calendars.
 */

import { writeFile } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import type { Component } from './component.js';
import { serializeComponent } from './generator.js';

/**
 * Hand the serialized calendar to a writable stream.
 * Resolves once the stream accepted the chunk; rejects with its error.
 * The stream is left open.
 */
export function writeToStream(calendar: Component, stream: Writable): Promise<void> {
  const text = serializeComponent(calendar);
  return new Promise((resolve, reject) => {
    stream.write(text, 'utf8', err => {
      if (err) reject(err);
      else resolve();
    });
  });
}

/** Write the calendar to `path` as UTF-8, replacing any existing file */
export async function saveFile(calendar: Component, path: string): Promise<void> {
  await writeFile(path, serializeComponent(calendar), 'utf8');
}
