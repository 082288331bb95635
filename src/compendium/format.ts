import type { EntityRecord } from './catalog.js';
import { image, silent, speak, type ResponseSegment } from '../protocol/tags.js';

export const ENTRY_NOT_FOUND = 'I could not find any information on that subject in the compendium.';

export interface FormattedEntry {
  description: string;
  imageRef: string | undefined;
}

/**
 * Capitalise each word, lowercase the rest ("silver_bokoblin" -> "Silver Bokoblin")
 */
export function titleCase(text: string): string {
  return text
    .replace(/_/g, ' ')
    .toLowerCase()
    .replace(/(^|[\s\-(])([a-z])/g, (_, lead: string, letter: string) => lead + letter.toUpperCase());
}

function detailLines(record: EntityRecord): string[] {
  const lines: string[] = [];
  if (record.locations && record.locations.length > 0) {
    lines.push(`Common Locations: ${record.locations.join(', ')}`);
  }
  if (record.drops && record.drops.length > 0) {
    lines.push(`Drops: ${record.drops.join(', ')}`);
  }
  if (record.properties && Object.keys(record.properties).length > 0) {
    const props = Object.entries(record.properties)
      .map(([key, value]) => `${titleCase(key)}: ${value}`)
      .join(', ');
    lines.push(`Properties: ${props}`);
  }
  return lines;
}

function headerLines(record: EntityRecord): string[] {
  const description = record.description.trim() || 'No description available.';
  return [
    `Compendium Entry: ${titleCase(record.name)} (Category: ${titleCase(record.category)})`,
    `Description: ${description}`,
  ];
}

export function formatEntry(record: EntityRecord | null): FormattedEntry {
  if (!record) {
    return { description: ENTRY_NOT_FOUND, imageRef: undefined };
  }
  return {
    description: [...headerLines(record), ...detailLines(record)].join('\n'),
    imageRef: record.image,
  };
}

/**
 * Tagged form: the header and description are spoken, the detail lists are
 * display-only, the picture follows the prose
 */
export function entrySegments(record: EntityRecord | null): ResponseSegment[] {
  if (!record) return [speak(ENTRY_NOT_FOUND)];

  const segments: ResponseSegment[] = [speak(headerLines(record).join('\n'))];
  const details = detailLines(record);
  if (details.length > 0) segments.push(silent(details.join('\n')));
  if (record.image) segments.push(image(record.image));
  return segments;
}
