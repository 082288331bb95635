/**
 * @fileoverview Picks the knowledge source for a user query
 *
 * Decision order, first success wins, "not found" falls through:
 *   entity      wiki page, then compendium entry
 *   location    map render from the spatial index, then wiki page
 *   walkthrough encouragement on the first ask, video search when repeated
 *   otherwise   lore retrieval
 * Entity and location questions end in lore retrieval when every earlier
 * source comes back empty.
 */

import { entrySegments, titleCase, type EntityCatalog } from '../compendium/index.js';
import { wikiSegments, type VideoSearchClient, type WikiClient } from '../external/index.js';
import { mapSegments, type MapRenderer, type Location, type SpatialIndex } from '../maps/index.js';
import { serialize, silent, speak, type ResponseSegment } from '../protocol/tags.js';
import type { RAGService, RetrievalResult } from '../rag/index.js';
import { describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';
import {
  classifyQuery,
  entitySubject,
  findLocations,
  parseLocationRequest,
  type LocationRequest,
  type QueryIntent,
} from './intent.js';

const logger = rootLogger.child('routing');

export const WALKTHROUGH_ENCOURAGEMENT =
  'Every trial in Hyrule can be overcome with patience. Look closely at what surrounds you and ' +
  'think about the abilities you carry; I believe you will find the way. If you remain stuck, ' +
  'ask me again and I will seek guidance for you.';

export const LORE_NOT_FOUND = 'I searched my memories, but I recall nothing of that.';

export type AnswerSource = 'wiki' | 'compendium' | 'map' | 'encouragement' | 'video' | 'lore';

export interface ConversationTurn {
  role: 'user' | 'assistant';
  content: string;
}

export interface AnswerOptions {
  history?: ConversationTurn[];
}

export interface RoutedAnswer {
  route: QueryIntent;
  source: AnswerSource;
  segments: ResponseSegment[];
  /** Serialized tagged response */
  text: string;
}

export interface RoutingSources {
  lore: Pick<RAGService, 'retrieveDetailed'>;
  catalog: EntityCatalog;
  spatial: SpatialIndex;
  renderer: Pick<MapRenderer, 'render'>;
  wiki: Pick<WikiClient, 'lookup'>;
  video: Pick<VideoSearchClient, 'search'>;
}

const WALKTHROUGH_FILLER = new Set([
  'a',
  'again',
  'at',
  'beat',
  'can',
  'clear',
  'complete',
  'defeat',
  'do',
  'finish',
  'for',
  'get',
  'guide',
  'help',
  'how',
  'i',
  "i'm",
  'im',
  'in',
  'insist',
  'into',
  'just',
  'me',
  'need',
  'on',
  'past',
  'please',
  'really',
  'should',
  'solution',
  'solve',
  'still',
  'stuck',
  'the',
  'this',
  'through',
  'to',
  'walk-through',
  'walkthrough',
  'with',
]);

/**
 * What a walkthrough question is about: "How do I solve the Jochi-ihiga
 * shrine?" -> "jochi-ihiga shrine"
 */
export function walkthroughTopic(query: string): string {
  return query
    .toLowerCase()
    .replace(/[^a-z0-9'\- ]+/g, ' ')
    .split(/\s+/)
    .filter(word => word && !WALKTHROUGH_FILLER.has(word))
    .join(' ');
}

function topicWords(query: string): Set<string> {
  return new Set(
    walkthroughTopic(query)
      .split(' ')
      .filter(word => word.length >= 4)
  );
}

/**
 * A walkthrough ask counts as repeated when an earlier user turn asked for
 * help on an overlapping topic, or when the previous user turn was a
 * walkthrough ask and this one names no topic of its own ("I'm still stuck").
 */
export function isRepeatedWalkthrough(query: string, history: ConversationTurn[]): boolean {
  const prior = history.filter(turn => turn.role === 'user').map(turn => turn.content);
  const asks = prior.filter(content => classifyQuery(content).intent === 'walkthrough');
  if (asks.length === 0) return false;

  const current = topicWords(query);
  if (current.size === 0) {
    const last = prior[prior.length - 1];
    return last !== undefined && asks.includes(last);
  }
  return asks.some(ask => [...topicWords(ask)].some(word => current.has(word)));
}

export function describeLocations(locations: Location[], request: LocationRequest): string {
  const first = locations[0];
  if (!request.category && first && locations.length === 1) {
    const { x, z } = first.coords;
    return `${first.name} lies on the ${first.layer} at (${x}, ${z}). I have marked it on the map.`;
  }
  const what = titleCase(request.category ?? request.name);
  const where = request.region ? ` within ${request.region.name}` : '';
  const noun = locations.length === 1 ? 'location' : 'locations';
  return `I have marked ${locations.length} ${what} ${noun} on the ${request.layer} map${where}.`;
}

/**
 * Render the locations and describe them. A render failure still yields
 * the description, without a map marker.
 */
export async function locationSegments(
  renderer: Pick<MapRenderer, 'render'>,
  locations: Location[],
  request: LocationRequest
): Promise<ResponseSegment[]> {
  const key = [request.category ?? request.name, request.region?.name].filter(Boolean).join('_');
  let imagePath: string | null = null;
  try {
    imagePath = await renderer.render(locations, request.layer, key);
  } catch (error) {
    logger.error('Map render failed, answering without an image', { error: describeError(error) });
  }
  return mapSegments(describeLocations(locations, request), imagePath);
}

/**
 * Retrieved context is display-only material for the model; sentinels are spoken
 */
export function loreSegments(retrieval: RetrievalResult): ResponseSegment[] {
  switch (retrieval.status) {
    case 'ok':
      return [silent(retrieval.context)];
    case 'empty':
      return [speak(LORE_NOT_FOUND)];
    case 'unavailable':
    case 'failed':
      return [speak(retrieval.context)];
  }
}

export class RoutingPolicy {
  constructor(private readonly sources: RoutingSources) {}

  async answer(query: string, options: AnswerOptions = {}): Promise<RoutedAnswer> {
    const history = options.history ?? [];
    const { intent, entities } = classifyQuery(query, {
      catalog: this.sources.catalog,
      spatial: this.sources.spatial,
    });
    logger.info('Routing query', { intent, entities: entities.map(e => e.name) });

    switch (intent) {
      case 'entity': {
        const subject = entities[0]?.name ?? entitySubject(query);
        return (await this.fromEntity(subject)) ?? this.fromLore(query, 'entity');
      }
      case 'location':
        return (await this.fromMap(query)) ?? this.fromLore(query, 'location');
      case 'walkthrough':
        return this.fromWalkthrough(query, history);
      case 'lore':
        return this.fromLore(query, 'lore');
    }
  }

  private async fromEntity(subject: string): Promise<RoutedAnswer | null> {
    const page = await this.lookupWiki(subject);
    if (page) return result('entity', 'wiki', page);

    const record = this.sources.catalog.resolve(subject);
    if (record) return result('entity', 'compendium', entrySegments(record));
    return null;
  }

  private async fromMap(query: string): Promise<RoutedAnswer | null> {
    const parsed = parseLocationRequest(query, this.sources.spatial);
    const { request, locations } = findLocations(parsed, this.sources.spatial);

    if (locations.length > 0) {
      return result('location', 'map', await locationSegments(this.sources.renderer, locations, request));
    }

    const page = await this.lookupWiki(request.name || query);
    return page ? result('location', 'wiki', page) : null;
  }

  private async fromWalkthrough(query: string, history: ConversationTurn[]): Promise<RoutedAnswer> {
    if (!isRepeatedWalkthrough(query, history)) {
      return result('walkthrough', 'encouragement', [speak(WALKTHROUGH_ENCOURAGEMENT)]);
    }

    let topic = walkthroughTopic(query);
    if (!topic) {
      const previous = history.filter(turn => turn.role === 'user').pop();
      topic = previous ? walkthroughTopic(previous.content) : '';
    }
    return result('walkthrough', 'video', await this.sources.video.search(topic || query));
  }

  private async fromLore(query: string, route: QueryIntent): Promise<RoutedAnswer> {
    const retrieval = await this.sources.lore.retrieveDetailed(query);
    return result(route, 'lore', loreSegments(retrieval));
  }

  // A wiki failure is treated as "not found" so the next source is tried
  private async lookupWiki(subject: string): Promise<ResponseSegment[] | null> {
    try {
      const page = await this.sources.wiki.lookup(subject);
      return page ? wikiSegments(page) : null;
    } catch (error) {
      logger.warn('Wiki lookup failed, falling through', { subject, error: describeError(error) });
      return null;
    }
  }
}

function result(route: QueryIntent, source: AnswerSource, segments: ResponseSegment[]): RoutedAnswer {
  return { route, source, segments, text: serialize(segments) };
}
