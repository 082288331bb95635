/**
 * @fileoverview Tool handlers
 *
 * Arguments are validated with zod before anything runs. Failures inside a
 * handler become an in-character sentence; the conversation never sees a
 * stack trace.
 */

import { McpError, ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import {
  loreSegments,
  findLocations,
  locationSegments,
  type LocationRequest,
  type RoutingPolicy,
} from '../agent/index.js';
import { entrySegments, type EntityCatalog } from '../compendium/index.js';
import { wikiSegments, type VideoSearchClient, type WikiClient } from '../external/index.js';
import { LAYERS, looseCategory, type MapRenderer, type SpatialIndex } from '../maps/index.js';
import { serialize, silent, speak, type ResponseSegment } from '../protocol/tags.js';
import { LORE_UNAVAILABLE, type RAGService } from '../rag/index.js';
import { describeError, toUserMessage } from '../utils/errors.js';
import { logger } from '../utils/logger.js';
import type { SlateToolName } from './definitions.js';

export interface ToolContext {
  rag: RAGService;
  catalog: EntityCatalog;
  spatial: SpatialIndex;
  renderer: Pick<MapRenderer, 'render'>;
  wiki: Pick<WikiClient, 'lookup'>;
  video: Pick<VideoSearchClient, 'search' | 'isAvailable'>;
  policy: RoutingPolicy;
}

export type ToolResponse = {
  content: Array<{ type: 'text'; text: string }>;
};

const queryText = z.string().trim().min(1, 'must not be empty');

const schemas = {
  guide_query: z.object({
    query: queryText,
    history: z
      .array(z.object({ role: z.enum(['user', 'assistant']), content: z.string() }))
      .default([]),
  }),
  lore_search: z.object({
    query: queryText,
    resultsPerQuery: z.number().int().min(1).max(20).optional(),
    wordBudget: z.number().int().min(1).optional(),
  }),
  lore_passages: z.object({
    query: queryText,
    limit: z.number().int().min(1).max(10).default(5),
    minRelevance: z.number().min(0).max(1).default(0),
  }),
  compendium_lookup: z.object({ name: queryText }),
  map_locations: z
    .object({
      category: z.string().trim().min(1).optional(),
      name: z.string().trim().min(1).optional(),
      region: z.string().trim().min(1).optional(),
      layer: z.enum(LAYERS).default('surface'),
    })
    .refine(args => args.category !== undefined || args.name !== undefined, {
      message: 'either category or name is required',
    }),
  wiki_lookup: z.object({ query: queryText }),
  walkthrough_search: z.object({
    query: queryText,
    maxResults: z.number().int().min(1).max(10).optional(),
  }),
  knowledge_status: z.object({}),
} satisfies Record<SlateToolName, z.ZodTypeAny>;

function parseArgs<S extends z.ZodTypeAny>(
  name: SlateToolName,
  schema: S,
  args: Record<string, unknown>
): z.infer<S> {
  const parsed = schema.safeParse(args);
  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => {
      const field = issue.path.join('.');
      return field ? `${field}: ${issue.message}` : issue.message;
    });
    throw new McpError(ErrorCode.InvalidParams, `Invalid arguments for ${name}: ${problems.join('; ')}`);
  }
  return parsed.data;
}

function formatResponse(segments: ResponseSegment[]): ToolResponse {
  return { content: [{ type: 'text', text: serialize(segments) }] };
}

/**
 * Run one tool. Throws McpError(InvalidParams) for bad arguments; every
 * other failure is answered in character.
 */
export async function handleSlateTool(
  context: ToolContext,
  toolName: SlateToolName,
  args: Record<string, unknown>
): Promise<ToolResponse> {
  logger.debug('Handling tool', { toolName, args });

  try {
    switch (toolName) {
      case 'guide_query': {
        const { query, history } = parseArgs(toolName, schemas.guide_query, args);
        const answer = await context.policy.answer(query, { history });
        logger.info('Guide query answered', { route: answer.route, source: answer.source });
        return { content: [{ type: 'text', text: answer.text }] };
      }

      case 'lore_search': {
        const { query, resultsPerQuery, wordBudget } = parseArgs(toolName, schemas.lore_search, args);
        const retrieval = await context.rag.retrieveDetailed(query, { resultsPerQuery, wordBudget });
        return formatResponse(loreSegments(retrieval));
      }

      case 'lore_passages': {
        const { query, limit, minRelevance } = parseArgs(toolName, schemas.lore_passages, args);
        if (!context.rag.isReady()) return formatResponse([speak(LORE_UNAVAILABLE)]);

        const results = await context.rag.search(query, { limit, minRelevance });
        if (results.length === 0) {
          return formatResponse([speak(`I found no recorded passages about "${query}".`)]);
        }
        const formatted = results
          .map(
            (r, i) =>
              `### ${i + 1}. ${r.sourceId}\n` +
              `**Relevance:** ${Math.round(r.score * 100)}%\n\n` +
              `${r.text.slice(0, 500)}${r.text.length > 500 ? '...' : ''}`
          )
          .join('\n\n---\n\n');
        const noun = results.length === 1 ? 'passage' : 'passages';
        return formatResponse([speak(`I found ${results.length} recorded ${noun} about that.`), silent(formatted)]);
      }

      case 'compendium_lookup': {
        const { name } = parseArgs(toolName, schemas.compendium_lookup, args);
        return formatResponse(entrySegments(context.catalog.resolve(name)));
      }

      case 'map_locations': {
        const { category, name, region, layer } = parseArgs(toolName, schemas.map_locations, args);
        return formatResponse(await mapLocations(context, { category, name, region, layer }));
      }

      case 'wiki_lookup': {
        const { query } = parseArgs(toolName, schemas.wiki_lookup, args);
        return formatResponse(wikiSegments(await context.wiki.lookup(query)));
      }

      case 'walkthrough_search': {
        const { query, maxResults } = parseArgs(toolName, schemas.walkthrough_search, args);
        return formatResponse(await context.video.search(query, maxResults));
      }

      case 'knowledge_status': {
        parseArgs(toolName, schemas.knowledge_status, args);
        return formatResponse(await knowledgeStatus(context));
      }

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${String(toolName)}`);
    }
  } catch (error) {
    if (error instanceof McpError) throw error;
    logger.error(`Tool ${toolName} failed`, { error: describeError(error) });
    return formatResponse([speak(toUserMessage(error))]);
  }
}

async function mapLocations(
  context: ToolContext,
  args: { category?: string; name?: string; region?: string; layer: LocationRequest['layer'] }
): Promise<ResponseSegment[]> {
  const region = args.region ? context.spatial.region(args.region) : null;
  if (args.region && !region) {
    return [speak(`I do not know of a region called ${args.region}.`)];
  }

  const layer = region?.layer ?? args.layer;
  const wanted = args.category ? looseCategory(args.category) : null;
  const category = wanted
    ? (context.spatial.categories(layer).find(c => looseCategory(c) === wanted) ?? args.category ?? null)
    : null;
  const { request, locations } = findLocations(
    { layer, region, category, name: args.name ?? '' },
    context.spatial
  );
  if (locations.length === 0) {
    const what = args.category ?? args.name ?? 'that';
    const where = region ? ` within ${region.name}` : '';
    return [speak(`I could not find ${what} on the ${layer} map${where}.`)];
  }
  return locationSegments(context.renderer, locations, request);
}

async function knowledgeStatus(context: ToolContext): Promise<ResponseSegment[]> {
  let documents = 'unknown';
  try {
    documents = String(await context.rag.getDocumentCount());
  } catch (error) {
    logger.warn('Could not count lore documents', { error: describeError(error) });
  }

  const lines = [
    '## Knowledge Sources',
    `- Lore transcripts: ${context.rag.isReady() ? 'ready' : 'unavailable'} (${documents} passages)`,
    `- Compendium: ${context.catalog.count()} entries`,
    `- Map markers: ${context.spatial.count()} locations, ${context.spatial.regions().length} regions`,
    `- Walkthrough videos: ${context.video.isAvailable() ? 'ready' : 'unavailable'}`,
  ];
  const ready = context.rag.isReady() ? 'My archives are open.' : 'My archive of recorded memories is sealed.';
  return [speak(ready), silent(lines.join('\n'))];
}
