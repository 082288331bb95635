/**
 * @fileoverview MCP tool definitions
 *
 * Every tool answers with tagged text: [SPEAK]…[/SPEAK] spans go to speech
 * synthesis, [IMAGE]url[/IMAGE] and [MAP]path[/MAP] carry visuals, unmarked
 * text is display-only.
 */

const LAYER_ENUM = ['surface', 'sky', 'depths'];

export const slateTools = [
  {
    name: 'guide_query',
    description: `Answer a player's question from the best knowledge source.
Routing, first success wins:
- A named creature, item or material: wiki page, then the compendium
- "Where is / show me on the map": rendered map of matching markers, then the wiki
- Walkthrough or puzzle help: encouragement first; a repeated ask in the
  history returns walkthrough videos
- Anything else: recorded lore transcripts

Pass earlier turns in \`history\` so repeated walkthrough asks are recognised.`,
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'The player question, e.g. "Where are the Lynels in Hebra?"',
        },
        history: {
          type: 'array',
          description: 'Earlier conversation turns, oldest first',
          items: {
            type: 'object',
            properties: {
              role: { type: 'string', enum: ['user', 'assistant'] },
              content: { type: 'string' },
            },
            required: ['role', 'content'],
          },
          default: [],
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'lore_search',
    description: `Retrieve lore context from the recorded transcripts.
The question is widened into several related sub-queries; unique passages
are joined in retrieval order and cut to the configured word budget.
Use for history, characters and story events.`,
    inputSchema: {
      type: 'object',
      properties: {
        query: {
          type: 'string',
          description: 'Lore question, e.g. "the Imprisoning War" or "Rauru and Sonia"',
        },
        resultsPerQuery: {
          type: 'integer',
          description: 'Passages taken per sub-query (1-20)',
          minimum: 1,
          maximum: 20,
        },
        wordBudget: {
          type: 'integer',
          description: 'Maximum words of returned context',
          minimum: 1,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'lore_passages',
    description: 'Single semantic search over the transcripts, returning scored passages with their source.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Search text' },
        limit: {
          type: 'integer',
          description: 'Maximum number of passages (1-10)',
          default: 5,
          minimum: 1,
          maximum: 10,
        },
        minRelevance: {
          type: 'number',
          description: 'Drop passages scoring below this (0-1)',
          default: 0,
          minimum: 0,
          maximum: 1,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'compendium_lookup',
    description: `Look up a creature, item or material in the compendium by name.
Exact names win over partial matches; returns description, locations,
drops and a picture when available.`,
    inputSchema: {
      type: 'object',
      properties: {
        name: { type: 'string', description: 'Entry name, e.g. "Bokoblin"' },
      },
      required: ['name'],
    },
  },
  {
    name: 'map_locations',
    description: `Mark locations on a world map and return the rendered image.
Give a marker category (optionally inside a named region) or a place name.`,
    inputSchema: {
      type: 'object',
      properties: {
        category: { type: 'string', description: 'Marker category, e.g. "shrines" or "Lynel"' },
        name: { type: 'string', description: 'Place name, used when no category is given' },
        region: { type: 'string', description: 'Region name, e.g. "Eldin"' },
        layer: {
          type: 'string',
          enum: LAYER_ENUM,
          description: 'World layer (ignored when a region is given)',
          default: 'surface',
        },
      },
    },
  },
  {
    name: 'wiki_lookup',
    description: 'Summary paragraph and main picture of the best matching game wiki page.',
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Page subject, e.g. "Gleeok"' },
      },
      required: ['query'],
    },
  },
  {
    name: 'walkthrough_search',
    description: `Find walkthrough videos for a shrine, quest or boss.
Only for players who insist on direct help; guide_query applies that rule itself.`,
    inputSchema: {
      type: 'object',
      properties: {
        query: { type: 'string', description: 'Shrine, quest or boss name' },
        maxResults: {
          type: 'integer',
          description: 'Number of videos (1-10)',
          minimum: 1,
          maximum: 10,
        },
      },
      required: ['query'],
    },
  },
  {
    name: 'knowledge_status',
    description: 'Availability and size of every knowledge source.',
    inputSchema: {
      type: 'object',
      properties: {},
    },
  },
];

export type SlateToolName =
  | 'guide_query'
  | 'lore_search'
  | 'lore_passages'
  | 'compendium_lookup'
  | 'map_locations'
  | 'wiki_lookup'
  | 'walkthrough_search'
  | 'knowledge_status';

const toolNames = new Set<string>(slateTools.map(tool => tool.name));

export function isSlateTool(name: string): name is SlateToolName {
  return toolNames.has(name);
}

export function getTools() {
  return slateTools;
}
