/**
 * @fileoverview Inline response tags
 *
 * Internal code builds `ResponseSegment` arrays; marker text only exists at
 * the boundary, when a tool result is handed to the model or the
 * presentation layer parses it back.
 *
 *   [SPEAK]text for speech synthesis[/SPEAK]
 *   [IMAGE]https://...[/IMAGE]
 *   [MAP]generated_maps/surface_lynel.png[/MAP]
 *
 * Unmarked text is display-only. Markers never nest.
 */

import { ValidationError } from '../utils/errors.js';

export type ResponseSegment =
  | { kind: 'speak'; text: string }
  | { kind: 'silent'; text: string }
  | { kind: 'image'; url: string }
  | { kind: 'map'; path: string };

export type MarkerKind = 'speak' | 'image' | 'map';

export const speak = (text: string): ResponseSegment => ({ kind: 'speak', text });
export const silent = (text: string): ResponseSegment => ({ kind: 'silent', text });
export const image = (url: string): ResponseSegment => ({ kind: 'image', url });
export const map = (path: string): ResponseSegment => ({ kind: 'map', path });

const TAG_NAMES: Record<MarkerKind, string> = {
  speak: 'SPEAK',
  image: 'IMAGE',
  map: 'MAP',
};

const MARKER_PATTERN = /\[(\/?)(SPEAK|IMAGE|MAP)\]/g;

function open(kind: MarkerKind): string {
  return `[${TAG_NAMES[kind]}]`;
}

function close(kind: MarkerKind): string {
  return `[/${TAG_NAMES[kind]}]`;
}

function kindOf(tagName: string): MarkerKind {
  switch (tagName) {
    case 'SPEAK':
      return 'speak';
    case 'IMAGE':
      return 'image';
    default:
      return 'map';
  }
}

/**
 * Remove marker tokens from free text so content can never forge a marker
 */
export function sanitize(text: string): string {
  return text.replace(MARKER_PATTERN, '');
}

export function isProse(
  segment: ResponseSegment
): segment is Extract<ResponseSegment, { kind: 'speak' | 'silent' }> {
  return segment.kind === 'speak' || segment.kind === 'silent';
}

/**
 * Prose first, visual markers after it, each group in its original order
 */
export function compose(segments: ResponseSegment[]): ResponseSegment[] {
  return [...segments.filter(isProse), ...segments.filter(s => !isProse(s))];
}

/**
 * Render segments to marker text. Throws when no prose would remain after
 * stripping markers.
 */
export function serialize(segments: ResponseSegment[]): string {
  const parts: string[] = [];

  for (const segment of compose(segments)) {
    switch (segment.kind) {
      case 'speak': {
        const text = sanitize(segment.text).trim();
        if (text) parts.push(`${open('speak')}${text}${close('speak')}`);
        break;
      }
      case 'silent': {
        const text = sanitize(segment.text).trim();
        if (text) parts.push(text);
        break;
      }
      case 'image': {
        const url = sanitize(segment.url).trim();
        if (url) parts.push(`${open('image')}${url}${close('image')}`);
        break;
      }
      case 'map': {
        const path = sanitize(segment.path).trim();
        if (path) parts.push(`${open('map')}${path}${close('map')}`);
        break;
      }
    }
  }

  const hasProse = segments.some(s => isProse(s) && sanitize(s.text).trim() !== '');
  if (!hasProse) {
    throw new ValidationError('segments', 'a tagged response needs at least one prose segment');
  }

  return parts.join('\n');
}

interface Piece {
  segment: ResponseSegment;
  /** Untrimmed text as it appeared, for prose pieces */
  raw: string;
}

interface ScanResult {
  pieces: Piece[];
  issues: string[];
}

/**
 * Single pass over the marker tokens. Lenient: an unclosed speak span runs
 * to the end, an unclosed image or map marker is dropped, stray closers are
 * ignored.
 */
function scan(text: string): ScanResult {
  const pieces: Piece[] = [];
  const issues: string[] = [];
  let current: { kind: MarkerKind; start: number; at: number } | null = null;
  let cursor = 0;

  const emitOutside = (raw: string) => {
    if (raw) pieces.push({ segment: silent(raw.trim()), raw });
  };

  const emitMarked = (kind: MarkerKind, body: string) => {
    // Mismatched closers skipped above may still sit inside the body
    const raw = body.replace(MARKER_PATTERN, '');
    const value = raw.trim();
    if (kind === 'speak') {
      pieces.push({ segment: speak(value), raw });
    } else if (value) {
      pieces.push({ segment: kind === 'image' ? image(value) : map(value), raw: '' });
    }
  };

  for (const match of text.matchAll(MARKER_PATTERN)) {
    const index = match.index ?? 0;
    const isClosing = match[1] === '/';
    const kind = kindOf(match[2] ?? '');

    if (!current) {
      if (isClosing) {
        issues.push(`stray ${close(kind)} at ${index}`);
        emitOutside(text.slice(cursor, index));
      } else {
        emitOutside(text.slice(cursor, index));
        current = { kind, start: index + match[0].length, at: index };
      }
      cursor = index + match[0].length;
      continue;
    }

    if (isClosing && kind === current.kind) {
      emitMarked(kind, text.slice(current.start, index));
      current = null;
      cursor = index + match[0].length;
      continue;
    }

    if (isClosing) {
      issues.push(`mismatched ${close(kind)} inside ${open(current.kind)} at ${index}`);
      continue;
    }

    // An opener inside an open marker: close the current one implicitly
    issues.push(`${open(kind)} nested inside ${open(current.kind)} at ${index}`);
    if (current.kind === 'speak') {
      emitMarked('speak', text.slice(current.start, index));
    }
    current = { kind, start: index + match[0].length, at: index };
    cursor = index + match[0].length;
  }

  if (current) {
    issues.push(`unclosed ${open(current.kind)} at ${current.at}`);
    if (current.kind === 'speak') {
      emitMarked('speak', text.slice(current.start));
    }
  } else {
    emitOutside(text.slice(cursor));
  }

  return { pieces, issues };
}

/**
 * Marker text back to segments. Whitespace-only prose is dropped.
 */
export function parse(text: string): ResponseSegment[] {
  return scan(text)
    .pieces.map(p => p.segment)
    .filter(s => !isProse(s) || s.text !== '');
}

/**
 * Prose with every marker removed; image and map references disappear
 */
export function strip(text: string): string {
  return scan(text)
    .pieces.filter(p => isProse(p.segment))
    .map(p => p.raw)
    .join('')
    .replace(/[ \t]+\n/g, '\n')
    .replace(/\n{3,}/g, '\n\n')
    .trim();
}

/**
 * Text to hand to speech synthesis
 */
export function speakable(text: string): string {
  return parse(text)
    .filter((s): s is Extract<ResponseSegment, { kind: 'speak' }> => s.kind === 'speak')
    .map(s => s.text)
    .join(' ');
}

export function imageRefs(text: string): string[] {
  return parse(text).flatMap(s => (s.kind === 'image' ? [s.url] : []));
}

export function mapRefs(text: string): string[] {
  return parse(text).flatMap(s => (s.kind === 'map' ? [s.path] : []));
}

/**
 * Well-formedness problems; empty when the text is a valid tagged response
 */
export function validate(text: string): string[] {
  const { issues } = scan(text);
  if (strip(text) === '') {
    issues.push('no prose remains after stripping markers');
  }
  return issues;
}
