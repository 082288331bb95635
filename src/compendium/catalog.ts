/**
 * @fileoverview In-memory compendium of creatures, materials and equipment
 *
 * The compendium JSON has changed shape between data revisions: a flat list
 * of entries, a dictionary keyed by entry id, or groups nested inside
 * groups. All of them parse into one recursive `CatalogShape` and a single
 * depth-first search resolves names over it.
 *
 * Name resolution picks the first match in traversal order. When several
 * entries share a substring ("chuchu" matches every variant) this is not
 * necessarily the best one; no ranking is applied.
 *
 * Traversal order is insertion order, except that a dictionary keyed by
 * integer-like ids ("12", "3") is walked in ascending numeric key order
 * before its other keys, as `Object.entries` lists them.
 */

import { readFile } from 'fs/promises';
import { MalformedDataError, describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('compendium');

export type PropertyValue = string | number | boolean;

export interface EntityRecord {
  name: string;
  category: string;
  description: string;
  locations?: string[];
  drops?: string[];
  properties?: Record<string, PropertyValue>;
  image?: string;
  thumbnail?: string;
  /** Dictionary key the entry was stored under, when keyed */
  idName?: string;
  id?: number | string;
}

export type CatalogShape =
  | { kind: 'flat'; entries: EntityRecord[] }
  | { kind: 'grouped'; groups: Array<[string, CatalogShape]> };

export interface CatalogOptions {
  /** Rebase image and thumbnail URLs onto this base, keeping the filename */
  imageBaseUrl?: string | undefined;
}

type JsonObject = Record<string, unknown>;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringList(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) return undefined;
  const items = value.filter((v): v is string => typeof v === 'string' && v.trim() !== '');
  return items.length > 0 ? items : undefined;
}

function propertyMap(value: unknown): Record<string, PropertyValue> | undefined {
  if (!isObject(value)) return undefined;
  const entries = Object.entries(value).filter(
    (entry): entry is [string, PropertyValue] =>
      typeof entry[1] === 'string' || typeof entry[1] === 'number' || typeof entry[1] === 'boolean'
  );
  return entries.length > 0 ? Object.fromEntries(entries) : undefined;
}

export function rebaseUrl(url: string, baseUrl: string): string {
  const filename = url.split(/[\\/]/).pop() ?? url;
  return `${baseUrl.replace(/\/+$/, '')}/${filename}`;
}

/**
 * Build a record from a JSON object, or null when it has no usable name
 */
export function toEntityRecord(
  value: unknown,
  options: CatalogOptions = {},
  idName?: string
): EntityRecord | null {
  if (!isObject(value)) return null;
  if (typeof value.name !== 'string' || value.name.trim() === '') return null;

  const record: EntityRecord = {
    name: value.name.trim(),
    category: typeof value.category === 'string' ? value.category : 'unknown',
    description: typeof value.description === 'string' ? value.description : '',
  };

  const locations = stringList(value.locations);
  if (locations) record.locations = locations;
  const drops = stringList(value.drops);
  if (drops) record.drops = drops;
  const properties = propertyMap(value.properties);
  if (properties) record.properties = properties;

  for (const field of ['image', 'thumbnail'] as const) {
    const url = value[field];
    if (typeof url === 'string' && url.trim() !== '') {
      record[field] = options.imageBaseUrl ? rebaseUrl(url.trim(), options.imageBaseUrl) : url.trim();
    }
  }

  if (idName !== undefined) record.idName = idName;
  if (typeof value.id === 'number' || typeof value.id === 'string') record.id = value.id;

  return record;
}

/**
 * Parse any supported compendium layout. Values that are neither entries
 * nor containers are ignored.
 */
export function parseCatalog(data: unknown, options: CatalogOptions = {}): CatalogShape {
  return parseNode(data, options, true);
}

function parseNode(data: unknown, options: CatalogOptions, topLevel: boolean): CatalogShape {
  if (Array.isArray(data)) {
    const records = data.map(item => toEntityRecord(item, options));
    if (records.every((r): r is EntityRecord => r !== null)) {
      return { kind: 'flat', entries: records };
    }
    // Mixed list: keep positions as group keys so traversal order is stable
    const groups: Array<[string, CatalogShape]> = [];
    data.forEach((item, index) => {
      const record = records[index];
      if (record) {
        groups.push([String(index), { kind: 'flat', entries: [record] }]);
      } else if (Array.isArray(item) || isObject(item)) {
        groups.push([String(index), parseNode(item, options, false)]);
      }
    });
    return { kind: 'grouped', groups };
  }

  if (isObject(data)) {
    const groups: Array<[string, CatalogShape]> = [];
    for (const [key, value] of Object.entries(data)) {
      // Top-level "info" is dataset metadata
      if (topLevel && key === 'info') continue;

      const record = toEntityRecord(value, options, key);
      if (record) {
        groups.push([key, { kind: 'flat', entries: [record] }]);
      } else if (Array.isArray(value) || isObject(value)) {
        groups.push([key, parseNode(value, options, false)]);
      }
    }
    return { kind: 'grouped', groups };
  }

  return { kind: 'flat', entries: [] };
}

function normalize(name: string): string {
  return name.trim().toLowerCase();
}

/**
 * Depth-first search, first hit wins
 */
function findFirst(shape: CatalogShape, predicate: (record: EntityRecord) => boolean): EntityRecord | null {
  if (shape.kind === 'flat') {
    return shape.entries.find(predicate) ?? null;
  }
  for (const [, child] of shape.groups) {
    const hit = findFirst(child, predicate);
    if (hit) return hit;
  }
  return null;
}

function* walk(shape: CatalogShape): Generator<EntityRecord> {
  if (shape.kind === 'flat') {
    yield* shape.entries;
    return;
  }
  for (const [, child] of shape.groups) {
    yield* walk(child);
  }
}

export class EntityCatalog {
  /** Every record in traversal order */
  private readonly records: EntityRecord[];

  constructor(private readonly shape: CatalogShape = { kind: 'flat', entries: [] }) {
    this.records = [...walk(shape)];
  }

  /**
   * Load a compendium file. A missing or malformed file yields an empty
   * catalog and is logged, it does not stop startup.
   */
  static async load(path: string, options: CatalogOptions = {}): Promise<EntityCatalog> {
    try {
      const raw = await readFile(path, 'utf-8');
      let data: unknown;
      try {
        data = JSON.parse(raw);
      } catch (error) {
        throw new MalformedDataError(path, describeError(error));
      }
      const catalog = new EntityCatalog(parseCatalog(data, options));
      logger.info(`Loaded ${catalog.count()} compendium entries`, { path });
      return catalog;
    } catch (error) {
      logger.error('Could not load compendium, continuing with an empty catalog', {
        path,
        error: describeError(error),
      });
      return new EntityCatalog();
    }
  }

  count(): number {
    return this.entries().length;
  }

  /**
   * Case-insensitive exact name match, then first substring match
   */
  resolve(query: string): EntityRecord | null {
    const q = normalize(query);
    if (!q) return null;

    return (
      findFirst(this.shape, record => normalize(record.name) === q) ??
      findFirst(this.shape, record => normalize(record.name).includes(q))
    );
  }

  /**
   * Every entry whose name appears as a whole phrase inside free text,
   * longest name first. Used to spot a named subject in a question.
   */
  mentionedIn(text: string): EntityRecord[] {
    const haystack = ` ${normalize(text).replace(/[^a-z0-9' ]+/g, ' ')} `;
    const hits: EntityRecord[] = [];
    for (const record of this.entries()) {
      const name = normalize(record.name);
      if (name.length < 3) continue;
      if (haystack.includes(` ${name} `) || haystack.includes(` ${name}s `)) {
        hits.push(record);
      }
    }
    return hits.sort((a, b) => b.name.length - a.name.length);
  }

  entries(): readonly EntityRecord[] {
    return this.records;
  }
}
