import { describe, it, expect } from 'vitest';
import { ENTRY_NOT_FOUND, entrySegments, formatEntry, titleCase } from '../format.js';
import { EntityCatalog, parseCatalog, type EntityRecord } from '../catalog.js';
import { image, silent, speak } from '../../protocol/tags.js';

const BOKOBLIN: EntityRecord = {
  name: 'Bokoblin',
  category: 'monster',
  description: 'A common enemy.',
  image: 'http://x/bok.png',
};

describe('titleCase', () => {
  it.each([
    ['silver_bokoblin', 'Silver Bokoblin'],
    ['HYLIAN SHROOM', 'Hylian Shroom'],
    ['gleeok (flame)', 'Gleeok (Flame)'],
    ['like-like', 'Like-Like'],
  ])('%s -> %s', (input, expected) => {
    expect(titleCase(input)).toBe(expected);
  });
});

describe('formatEntry', () => {
  it('resolves and formats a catalog entry end to end', () => {
    const catalog = new EntityCatalog(parseCatalog([BOKOBLIN]));

    const formatted = formatEntry(catalog.resolve('bokoblin'));

    expect(formatted.description).toContain('Bokoblin');
    expect(formatted.description).toContain('A common enemy.');
    expect(formatted.imageRef).toBe('http://x/bok.png');
  });

  it('lists locations, drops and properties', () => {
    const formatted = formatEntry({
      name: 'hylian_shroom',
      category: 'materials',
      description: '',
      locations: ['Hyrule Field', 'Lanayru Wetlands'],
      drops: ['none'],
      properties: { hearts_recovered: 0.5, cooking_effect: 'none' },
    });

    expect(formatted.description).toBe(
      [
        'Compendium Entry: Hylian Shroom (Category: Materials)',
        'Description: No description available.',
        'Common Locations: Hyrule Field, Lanayru Wetlands',
        'Drops: none',
        'Properties: Hearts Recovered: 0.5, Cooking Effect: none',
      ].join('\n')
    );
    expect(formatted.imageRef).toBeUndefined();
  });

  it('says so when nothing was found', () => {
    expect(formatEntry(null)).toEqual({ description: ENTRY_NOT_FOUND, imageRef: undefined });
  });
});

describe('entrySegments', () => {
  it('speaks the header and shows the picture after it', () => {
    expect(entrySegments(BOKOBLIN)).toEqual([
      speak('Compendium Entry: Bokoblin (Category: Monster)\nDescription: A common enemy.'),
      image('http://x/bok.png'),
    ]);
  });

  it('keeps detail lists display-only', () => {
    const segments = entrySegments({ ...BOKOBLIN, drops: ['Bokoblin Horn'], image: undefined });
    expect(segments).toEqual([
      speak('Compendium Entry: Bokoblin (Category: Monster)\nDescription: A common enemy.'),
      silent('Drops: Bokoblin Horn'),
    ]);
  });

  it('answers the not-found sentence', () => {
    expect(entrySegments(null)).toEqual([speak(ENTRY_NOT_FOUND)]);
  });
});
