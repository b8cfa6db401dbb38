import type { ControlField, ControlStanza } from '../types';
import { ParseError } from '../errors';

/**
 * Debian control stanza parser and renderer.
 *
 * Format: "Field: value" lines; lines starting with a space or tab continue
 * the previous field; lines starting with "#" are comments.
 *
 *   Package: hello
 *   Version: 1.0.0
 *   Description: A greeting program
 *    This is a continuation line.
 *    .
 *    Another paragraph.
 *
 * Values keep continuation lines verbatim (including their leading
 * whitespace) so that rendering a parsed stanza reproduces the original
 * field text.
 */

// Printable US-ASCII except ":", not starting with "#" or "-"
const FIELD_NAME = /^[!"$-,.-9;-~][!-9;-~]*$/;

export function parseControl(content: string): ControlStanza {
  const lines = content.replace(/\r\n?/g, '\n').replace(/^\uFEFF/, '').split('\n');
  const stanza: ControlStanza = [];
  const seen = new Set<string>();

  let current: { name: string; lines: string[] } | undefined;
  let ended = false;

  const flush = (): void => {
    if (current) {
      stanza.push({ name: current.name, value: current.lines.join('\n') });
      current = undefined;
    }
  };

  lines.forEach((line, index) => {
    const lineNumber = index + 1;

    if (line.trim() === '' && !(current && /^[ \t]/.test(line))) {
      flush();
      ended = stanza.length > 0;
      return;
    }

    if (line.startsWith('#')) {
      return;
    }

    if (ended) {
      throw new ParseError(`control file has more than one stanza (line ${lineNumber})`);
    }

    if (line.startsWith(' ') || line.startsWith('\t')) {
      if (!current) {
        throw new ParseError(`continuation line without a field (line ${lineNumber})`);
      }
      current.lines.push(line[0] + line.slice(1).trimEnd());
      return;
    }

    const colon = line.indexOf(':');
    if (colon === -1) {
      throw new ParseError(`expected "Field: value" (line ${lineNumber})`);
    }

    const name = line.slice(0, colon);
    if (!FIELD_NAME.test(name)) {
      throw new ParseError(`invalid field name "${name}" (line ${lineNumber})`);
    }

    const key = name.toLowerCase();
    if (seen.has(key)) {
      throw new ParseError(`duplicate field "${name}" (line ${lineNumber})`);
    }
    seen.add(key);

    flush();
    current = { name, lines: [line.slice(colon + 1).trim()] };
  });

  flush();

  if (stanza.length === 0) {
    throw new ParseError('control file has no fields');
  }

  return stanza;
}

/**
 * Render one field. Empty first lines ("Field:" followed by continuations)
 * are written without a trailing space.
 */
export function renderField(field: ControlField): string {
  const [first, ...rest] = field.value.split('\n');
  const head = first ? `${field.name}: ${first}` : `${field.name}:`;
  return [head, ...rest].join('\n');
}

/**
 * Render a stanza without a trailing newline
 */
export function renderStanza(stanza: ControlStanza): string {
  return stanza.map(renderField).join('\n');
}

/**
 * Case-insensitive field lookup
 */
export function getField(stanza: ControlStanza, name: string): string | undefined {
  const key = name.toLowerCase();
  return stanza.find(f => f.name.toLowerCase() === key)?.value;
}

/**
 * Copy of the stanza with the named fields (case-insensitive) removed
 */
export function omitFields(stanza: ControlStanza, names: readonly string[]): ControlStanza {
  const keys = new Set(names.map(n => n.toLowerCase()));
  return stanza.filter(f => !keys.has(f.name.toLowerCase()));
}
