/**
 * @fileoverview Spatial index of map markers across the three world layers
 *
 * Marker files (`<category>.json`, anywhere below the data directory) are
 * read once at startup; the layer is taken from the path. The index is
 * read-only afterwards, so concurrent requests share it freely.
 */

import { readFile, readdir } from 'fs/promises';
import * as path from 'path';
import { z } from 'zod';
import { MalformedDataError, describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('maps');

export const LAYERS = ['surface', 'sky', 'depths'] as const;
export type Layer = (typeof LAYERS)[number];

export function isLayer(value: string): value is Layer {
  return (LAYERS as readonly string[]).includes(value);
}

export interface Location {
  name: string;
  category: string;
  layer: Layer;
  /** Game coordinates; z is the map's vertical axis */
  coords: { x: number; z: number };
  /** Icon key, the category name */
  icon: string;
}

/**
 * Rectangle in game coordinates. The y bounds apply to the game z axis.
 */
export interface Region {
  name: string;
  layer: Layer;
  xMin: number;
  xMax: number;
  yMin: number;
  yMax: number;
}

const regionSchema = z
  .object({
    name: z.string().min(1),
    layer: z.enum(LAYERS).default('surface'),
    xMin: z.number(),
    xMax: z.number(),
    yMin: z.number(),
    yMax: z.number(),
  })
  .refine(r => r.xMin <= r.xMax && r.yMin <= r.yMax, { message: 'min bound exceeds max bound' });

const regionFileSchema = z.array(regionSchema);

/**
 * Lowercase, no separators, no trailing "s": "Treasure Chests" -> "treasurechest"
 */
export function looseCategory(category: string): string {
  return category.toLowerCase().replace(/[\s_-]+/g, '').replace(/s$/, '');
}

export function layerFromPath(filePath: string): Layer {
  const lower = filePath.toLowerCase();
  if (lower.includes('sky')) return 'sky';
  if (lower.includes('depths')) return 'depths';
  return 'surface';
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toCoordinate(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) return value;
  if (typeof value === 'string' && value.trim() !== '') {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

/**
 * Markers from one file's JSON: a list, or an object whose first value is
 * the list. Entries without a name or coordinates are skipped.
 */
export function parseMarkerFile(data: unknown, category: string, layer: Layer): Location[] {
  let list: unknown = data;
  if (isRecord(data)) {
    list = Object.values(data)[0];
  }
  if (!Array.isArray(list)) {
    throw new Error('expected a list of markers');
  }

  const locations: Location[] = [];
  for (const marker of list) {
    if (!isRecord(marker)) continue;
    const x = toCoordinate(marker.x);
    const zCoord = toCoordinate(marker.z);
    if (typeof marker.name !== 'string' || x === null || zCoord === null) continue;

    locations.push({ name: marker.name, category, layer, coords: { x, z: zCoord }, icon: category });
  }
  return locations;
}

export function inRegion(location: Location, region: Region): boolean {
  const { x, z } = location.coords;
  return (
    location.layer === region.layer &&
    region.xMin <= x &&
    x <= region.xMax &&
    region.yMin <= z &&
    z <= region.yMax
  );
}

export class SpatialIndex {
  private readonly byLayer = new Map<Layer, Map<string, Location[]>>();
  private readonly regionList: Region[];

  constructor(locations: Location[] = [], regions: Region[] = []) {
    for (const layer of LAYERS) this.byLayer.set(layer, new Map());
    for (const location of locations) {
      const categories = this.byLayer.get(location.layer);
      if (!categories) continue;
      const bucket = categories.get(location.category) ?? [];
      bucket.push(location);
      categories.set(location.category, bucket);
    }
    this.regionList = [...regions];
  }

  /**
   * Read every marker file below `dataDir` and the optional regions file.
   * Unreadable or malformed files are logged and skipped.
   */
  static async load(dataDir: string, regionsPath?: string): Promise<SpatialIndex> {
    const locations: Location[] = [];

    let files: string[] = [];
    try {
      const entries = await readdir(dataDir, { recursive: true });
      files = entries.filter(entry => entry.toLowerCase().endsWith('.json')).sort();
    } catch (error) {
      logger.error('Map data directory not readable', { dataDir, error: describeError(error) });
    }
    if (files.length === 0) {
      logger.warn('No map marker files found', { dataDir });
    }

    for (const relative of files) {
      const filePath = path.join(dataDir, relative);
      const layer = layerFromPath(relative);
      const category = path.basename(relative, path.extname(relative));
      try {
        const data: unknown = JSON.parse(await readFile(filePath, 'utf-8'));
        locations.push(...parseMarkerFile(data, category, layer));
      } catch (error) {
        const malformed = new MalformedDataError(filePath, describeError(error));
        logger.error('Skipping map data file', { error: malformed.message });
      }
    }

    const regions = regionsPath ? await loadRegions(regionsPath) : [];
    const index = new SpatialIndex(locations, regions);
    logger.info(`Loaded ${index.count()} map locations`, {
      files: files.length,
      regions: regions.length,
    });
    return index;
  }

  count(): number {
    let total = 0;
    for (const categories of this.byLayer.values()) {
      for (const bucket of categories.values()) total += bucket.length;
    }
    return total;
  }

  categories(layer?: Layer): string[] {
    const layers = layer ? [layer] : LAYERS;
    const names = new Set<string>();
    for (const l of layers) {
      for (const category of this.byLayer.get(l)?.keys() ?? []) names.add(category);
    }
    return [...names].sort();
  }

  regions(): Region[] {
    return [...this.regionList];
  }

  region(name: string): Region | null {
    const wanted = name.trim().toLowerCase();
    return this.regionList.find(r => r.name.toLowerCase() === wanted) ?? null;
  }

  byCategory(category: string, layer: Layer = 'surface'): Location[] {
    logger.debug('Searching by category', { category, layer });
    return [...(this.byLayer.get(layer)?.get(category) ?? [])];
  }

  byCategoryAndName(category: string, name: string, layer: Layer = 'surface'): Location[] {
    const wanted = name.toLowerCase();
    return this.byCategory(category, layer).filter(loc => loc.name.toLowerCase().includes(wanted));
  }

  /**
   * Category matched loosely (case, spaces, plural) inside a region's box
   * on the region's layer
   */
  byRegion(category: string, region: Region | string): Location[] {
    const box = typeof region === 'string' ? this.region(region) : region;
    if (!box) return [];

    const wanted = looseCategory(category);
    const results: Location[] = [];
    for (const [name, bucket] of this.byLayer.get(box.layer) ?? []) {
      if (looseCategory(name) !== wanted) continue;
      results.push(...bucket.filter(loc => inRegion(loc, box)));
    }
    return results;
  }

  /**
   * Exact case-insensitive name first, else the first substring match
   */
  byName(name: string): Location | null {
    const wanted = name.trim().toLowerCase();
    if (!wanted) return null;

    const all = this.all();
    return (
      all.find(loc => loc.name.toLowerCase() === wanted) ??
      all.find(loc => loc.name.toLowerCase().includes(wanted)) ??
      null
    );
  }

  private all(): Location[] {
    const all: Location[] = [];
    for (const layer of LAYERS) {
      for (const bucket of this.byLayer.get(layer)?.values() ?? []) all.push(...bucket);
    }
    return all;
  }
}

export async function loadRegions(regionsPath: string): Promise<Region[]> {
  try {
    const data: unknown = JSON.parse(await readFile(regionsPath, 'utf-8'));
    const parsed = regionFileSchema.safeParse(data);
    if (!parsed.success) {
      throw new MalformedDataError(regionsPath, parsed.error.issues.map(i => i.message).join('; '));
    }
    return parsed.data;
  } catch (error) {
    logger.error('Could not load regions, region filtering disabled', {
      regionsPath,
      error: describeError(error),
    });
    return [];
  }
}
