#!/usr/bin/env node

/**
 * Ingestion script for recorded lore transcripts
 *
 * Chunks every *.txt file in the transcript directory (file stem = source
 * id), embeds the chunks and stores the new ones in ChromaDB. Chunks that
 * are already stored are skipped, so the script can be re-run safely.
 *
 * Run with: npx tsx scripts/ingest-transcripts.ts [transcriptDir]
 */

import 'dotenv/config';
import * as fs from 'fs';
import * as path from 'path';
import { loadConfig } from '../src/config/index.js';
import { LoreDatabase, OpenAIEmbeddingProvider, TranscriptIngestor } from '../src/rag/index.js';

const DEFAULT_TRANSCRIPT_DIR = './data/transcripts';

function readTranscripts(dir: string): Array<{ sourceId: string; text: string }> {
  if (!fs.existsSync(dir)) {
    console.log(`⚠️  Transcript directory not found: ${dir}`);
    console.log('   Put one plain-text transcript per video in it, e.g. data/transcripts/<video-id>.txt');
    return [];
  }

  return fs
    .readdirSync(dir)
    .filter(file => file.toLowerCase().endsWith('.txt'))
    .sort()
    .map(file => ({
      sourceId: path.basename(file, path.extname(file)),
      text: fs.readFileSync(path.join(dir, file), 'utf-8'),
    }));
}

async function main(): Promise<void> {
  console.log('📜 Lore transcript ingestion\n');

  const config = loadConfig(process.env);
  const transcriptDir = process.argv[2] ?? DEFAULT_TRANSCRIPT_DIR;

  const embedder = new OpenAIEmbeddingProvider({
    apiKey: config.embedding.apiKey,
    model: config.embedding.model,
    timeoutMs: config.timeoutMs,
  });
  if (!embedder.isAvailable()) {
    console.error('❌ OPENAI_API_KEY is not set; cannot embed transcripts.');
    process.exit(1);
  }

  console.log(`🔌 Connecting to ChromaDB at ${config.chroma.url}...`);
  const db = new LoreDatabase(
    { url: config.chroma.url, collection: config.chroma.collection, timeoutMs: config.timeoutMs },
    embedder
  );
  await db.initialize();
  console.log(`   Collection "${config.chroma.collection}" has ${await db.count()} chunks.\n`);

  const sources = readTranscripts(transcriptDir);
  console.log(`📖 Found ${sources.length} transcripts in ${transcriptDir}`);
  if (sources.length === 0) return;

  const ingestor = new TranscriptIngestor(db, embedder, {
    lockPath: `${config.chroma.collection}.ingest.lock`,
  });
  const summaries = await ingestor.ingestAll(sources);

  let added = 0;
  let skipped = 0;
  let failed = 0;
  for (const summary of summaries) {
    added += summary.added;
    skipped += summary.skipped;
    failed += summary.failed;
    console.log(
      `   ${summary.sourceId}: ${summary.chunks} chunks, ${summary.added} added, ` +
        `${summary.skipped} already stored, ${summary.failed} failed`
    );
  }

  console.log('\n✅ Ingestion complete!');
  console.log(`   Added: ${added}`);
  console.log(`   Skipped: ${skipped}`);
  console.log(`   Errors: ${failed}`);
  console.log(`\n📊 Database now has ${await db.count()} chunks.`);
}

main().catch(error => {
  console.error('❌ Fatal error:', error);
  process.exit(1);
});
