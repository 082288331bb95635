/**
 * @fileoverview MCP server wiring
 *
 * Every component is built once at startup and handed to the tool handlers
 * and the routing policy; nothing is held in module-level state.
 */

import * as path from 'path';
import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { CallToolRequestSchema, ListToolsRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import { RoutingPolicy } from './agent/index.js';
import { EntityCatalog } from './compendium/index.js';
import type { AppConfig } from './config/index.js';
import { VideoSearchClient, WikiClient } from './external/index.js';
import { IconLibrary, MapRenderer, SpatialIndex, baseMapBackdrop } from './maps/index.js';
import { LoreDatabase, OpenAIEmbeddingProvider, RAGService } from './rag/index.js';
import { getTools, routeToolRequest, type ToolContext } from './tools/index.js';
import { describeError } from './utils/errors.js';
import { logger } from './utils/logger.js';

export const SERVER_NAME = 'sheikah-slate-mcp';
export const SERVER_VERSION = '0.3.0';

/**
 * Load the read-only indices and construct every client
 */
export async function createToolContext(config: AppConfig): Promise<ToolContext> {
  const embedder = new OpenAIEmbeddingProvider({
    apiKey: config.embedding.apiKey,
    model: config.embedding.model,
    timeoutMs: config.timeoutMs,
  });
  const store = new LoreDatabase(
    { url: config.chroma.url, collection: config.chroma.collection, timeoutMs: config.timeoutMs },
    embedder
  );
  const rag = new RAGService(store, embedder, config.retrieval);
  await rag.initialize();

  const [catalog, spatial, icons] = await Promise.all([
    EntityCatalog.load(config.compendium.path, { imageBaseUrl: config.compendium.imageBaseUrl }),
    SpatialIndex.load(config.maps.dataDir, config.maps.regionsPath),
    IconLibrary.load(config.maps.iconDir),
  ]);

  const renderer = new MapRenderer({
    outputDir: path.resolve(config.maps.outputDir),
    icons,
    ...(config.maps.baseImageDir ? { backdrop: baseMapBackdrop(config.maps.baseImageDir) } : {}),
  });
  const wiki = new WikiClient({
    apiUrl: config.wiki.apiUrl,
    contentSelector: config.wiki.contentSelector,
    timeoutMs: config.timeoutMs,
  });
  const video = new VideoSearchClient({
    apiKey: config.video.apiKey,
    maxResults: config.video.maxResults,
    timeoutMs: config.timeoutMs,
  });

  const policy = new RoutingPolicy({ lore: rag, catalog, spatial, renderer, wiki, video });
  return { rag, catalog, spatial, renderer, wiki, video, policy };
}

export class SlateServer {
  private readonly server: Server;

  constructor(private readonly context: ToolContext) {
    this.server = new Server(
      { name: SERVER_NAME, version: SERVER_VERSION },
      {
        capabilities: { tools: {} },
        instructions: 'Game knowledge tools answering with speech, image and map markers',
      }
    );
    this.setupToolHandlers();
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => {
      logger.debug('Listing available tools');
      return { tools: getTools() };
    });

    this.server.setRequestHandler(CallToolRequestSchema, async request => {
      const { name, arguments: args } = request.params;
      const startTime = Date.now();
      logger.info(`Executing tool: ${name}`);

      try {
        const result = await routeToolRequest(name, args ?? {}, this.context);
        logger.info(`Tool ${name} completed in ${Date.now() - startTime}ms`);
        return result;
      } catch (error) {
        logger.error(`Tool ${name} failed`, { error: describeError(error) });
        throw error;
      }
    });
  }

  async start(): Promise<void> {
    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.info('MCP server ready for requests', { tools: getTools().length });
  }

  async close(): Promise<void> {
    await this.server.close();
  }
}
