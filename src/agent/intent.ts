/**
 * @fileoverview Query intent classification
 *
 * Keyword rules decide walkthrough and location questions. A catalog name
 * hit or a visual keyword (looks, pictures, drops) marks an entity question;
 * everything else is lore.
 * When several rules match, walkthrough wins over location, location over
 * entity.
 */

import type { EntityCatalog, EntityRecord } from '../compendium/index.js';
import { looseCategory, type Layer, type Location, type Region, type SpatialIndex } from '../maps/index.js';

export type QueryIntent = 'walkthrough' | 'location' | 'entity' | 'lore';

export interface ClassifierSources {
  catalog?: EntityCatalog;
  spatial?: SpatialIndex;
}

export interface Classification {
  intent: QueryIntent;
  /** Catalog entries named in the query, longest first */
  entities: EntityRecord[];
}

const WALKTHROUGH_PATTERN =
  /\b(walkthrough|walk-through|solution|solve|stuck|how (do|can|should) i (beat|complete|finish|get (past|through|into)|clear|defeat)|help me (with|beat|solve|get)|guide me)\b/;

const LOCATION_PATTERN = /\b(where|map|maps|locations?|located|show me|mark(ed)?|near(by)?)\b/;

// "what is" and "tell me about" alone are lore questions unless the catalog names the subject
const VISUAL_PATTERN = /\b(describe|look like|looks like|pictures?|images?|drops?)\b/;

const FILLER_WORDS = new Set([
  'a',
  'all',
  'an',
  'are',
  'can',
  'could',
  'depths',
  'do',
  'find',
  'for',
  'i',
  'in',
  'is',
  'located',
  'location',
  'locations',
  'map',
  'maps',
  'me',
  'near',
  'of',
  'on',
  'please',
  'show',
  'sky',
  'surface',
  'the',
  'where',
  'which',
]);

function normalize(query: string): string {
  return query.toLowerCase().replace(/[^a-z0-9'\- ]+/g, ' ').replace(/\s+/g, ' ').trim();
}

export function classifyQuery(query: string, sources: ClassifierSources = {}): Classification {
  const text = normalize(query);
  const entities = sources.catalog?.mentionedIn(text) ?? [];

  if (WALKTHROUGH_PATTERN.test(text)) return { intent: 'walkthrough', entities };
  if (LOCATION_PATTERN.test(text)) return { intent: 'location', entities };
  if (entities.length > 0 || VISUAL_PATTERN.test(text)) return { intent: 'entity', entities };
  if (sources.spatial?.byName(text)) return { intent: 'location', entities };
  return { intent: 'lore', entities };
}

const SUBJECT_FILLER =
  /\b(what (is|are|does)|tell me about|describe|looks? like|pictures? of|images? of|show me|drops?|a|an|the)\b/g;

/**
 * The thing an entity question asks about: "What does a Lynel look like?" -> "lynel"
 */
export function entitySubject(query: string): string {
  return normalize(query).replace(SUBJECT_FILLER, ' ').replace(/\s+/g, ' ').trim() || normalize(query);
}

export interface LocationRequest {
  layer: Layer;
  region: Region | null;
  category: string | null;
  /** Remaining words, read as a place name or a name filter within the category */
  name: string;
}

export function layerOf(query: string): Layer {
  const text = normalize(query);
  if (/\bsky\b/.test(text)) return 'sky';
  if (/\bdepths\b/.test(text)) return 'depths';
  return 'surface';
}

/**
 * Pull the layer, region and marker category (or a place name) out of a
 * location question
 */
export function parseLocationRequest(query: string, spatial: SpatialIndex): LocationRequest {
  const text = normalize(query);
  const words = text.split(' ').filter(Boolean);

  let region: Region | null = null;
  for (const candidate of spatial.regions()) {
    if (` ${text} `.includes(` ${candidate.name.toLowerCase()} `)) {
      region = candidate;
      break;
    }
  }
  const layer = region?.layer ?? layerOf(text);

  // Single words and adjacent pairs, compared in loose form
  const phrases = new Set<string>();
  words.forEach((word, i) => {
    phrases.add(looseCategory(word));
    const next = words[i + 1];
    if (next) phrases.add(looseCategory(`${word}${next}`));
  });
  const category = spatial.categories(layer).find(c => phrases.has(looseCategory(c))) ?? null;

  const regionWords = new Set(region ? region.name.toLowerCase().split(' ') : []);
  const name = words.filter(w => !FILLER_WORDS.has(w) && !regionWords.has(w)).join(' ');

  return { layer, region, category, name };
}

export interface LocationMatch {
  /** The request as answered; narrowed to the place's own layer when a place was named */
  request: LocationRequest;
  locations: Location[];
}

function nameFilter(request: LocationRequest): string {
  if (!request.category) return request.name;
  const category = looseCategory(request.category);
  return request.name
    .split(' ')
    .filter(word => word && !category.includes(looseCategory(word)))
    .join(' ');
}

/**
 * Locations answering a parsed request; empty when nothing matches.
 *
 * A place named exactly wins over its category, on whichever layer it lies.
 * Otherwise a category is narrowed by the leftover name words, falling back
 * to the whole category when that narrows to nothing.
 */
export function findLocations(request: LocationRequest, spatial: SpatialIndex): LocationMatch {
  const none: LocationMatch = { request, locations: [] };
  const name = request.name.trim().toLowerCase();
  const place = name ? spatial.byName(name) : null;

  if (place && (place.name.toLowerCase() === name || !request.category)) {
    return {
      request: { ...request, layer: place.layer, region: null, category: null },
      locations: [place],
    };
  }
  if (!request.category) return none;

  if (request.region) {
    return { request, locations: spatial.byRegion(request.category, request.region) };
  }
  const filter = nameFilter(request);
  const named = filter ? spatial.byCategoryAndName(request.category, filter, request.layer) : [];
  return {
    request,
    locations: named.length > 0 ? named : spatial.byCategory(request.category, request.layer),
  };
}
