#!/usr/bin/env node
import path from 'node:path';
import { promises as fs } from 'node:fs';
import { Command } from 'commander';
import dotenv from 'dotenv';
import { loadOpenAiModel } from './analysis/openAiModel.js';
import { ScoreCache } from './analysis/scoreCache.js';
import { ModelHandle } from './analysis/sentimentModel.js';
import type { CacheClient } from './cache/cache.js';
import { FileCache } from './cache/fileCache.js';
import { MemoryCache } from './cache/memoryCache.js';
import {
  parseExportFormat,
  resolveModelSettings,
  resolveRunConfig,
  type Environment,
  type ExportFormat,
  type RawRunOptions,
} from './config.js';
import { CsvStreamWriter } from './csv/writer.js';
import { jot, parseJson } from './jot.js';
import { writeJsonRows } from './json/writer.js';
import { SentimentPipeline, type AnalysisRun } from './pipeline/orchestrator.js';
import { flattenSummary } from './pipeline/summary.js';
import type { RawRecord } from './types/index.js';
import { createLogger } from './utils/logger.js';
import { parseTimestamp } from './utils/time.js';

dotenv.config();

const uploadedRecordsNode = jot.array(
  jot.object({
    id: jot.string({ coerceNumber: true }),
    text: jot.string(),
    timestamp: jot.optional(jot.string({ coerceNumber: true })),
    author: jot.optional(jot.string()),
    engagement: jot.optional(jot.number()),
  }),
);

const program = new Command();
program
  .name('sentiment-ensemble')
  .description('Collect posts and reviews for a query and score them with a lexicon and a transformer model.');

configureScoringOptions(
  program
    .command('analyze')
    .description('Search the selected platforms and analyze what comes back.')
    .requiredOption('-q, --query <text>', 'Keyword or phrase to search for.')
    .option('--platforms <names>', 'Comma-separated platforms: reddit, social-x, marketplace.', 'reddit')
    .option('--limit <number>', 'Maximum records per platform (default 50).'),
).action(async (rawOptions: AnalyzeCommandOptions) => {
  await handleAnalyze(rawOptions);
});

configureScoringOptions(
  program
    .command('score-file')
    .description('Analyze a JSON array of records ({ id, text, timestamp?, author?, engagement? }).')
    .requiredOption('-i, --input <path>', 'Path to the JSON records file.'),
).action(async (rawOptions: ScoreFileCommandOptions) => {
  await handleScoreFile(rawOptions);
});

await program.parseAsync();

interface ScoringOptions {
  transformer?: boolean;
  cache?: boolean;
  output?: string;
  format?: string;
}

interface AnalyzeCommandOptions extends RawRunOptions, ScoringOptions {}

interface ScoreFileCommandOptions extends ScoringOptions {
  input: string;
}

function configureScoringOptions(command: Command): Command {
  return command
    .option('--transformer', 'Also score with the transformer model (needs OPENAI_API_KEY).')
    .option('--no-cache', 'Keep transformer logits in memory only.')
    .option('-o, --output <path>', 'File for the dataset (default output/<timestamp>_<name>.<format>).')
    .option('--format <format>', 'Dataset export format: csv or json.', 'csv');
}

async function handleAnalyze(rawOptions: AnalyzeCommandOptions) {
  const config = resolveRunConfig(rawOptions, process.env);
  const format = parseExportFormat(rawOptions.format);
  const pipeline = createPipeline(rawOptions, process.env);
  const run = await pipeline.search(config, interruptSignal());
  await report(run, { output: rawOptions.output, format, name: config.query });
}

async function handleScoreFile(rawOptions: ScoreFileCommandOptions) {
  const inputPath = path.resolve(rawOptions.input);
  const format = parseExportFormat(rawOptions.format);
  const records = await readRecords(inputPath);
  console.log(`Loaded ${records.length} records from ${inputPath}`);

  const pipeline = createPipeline(rawOptions, process.env);
  const run = await pipeline.analyzeRecords(records, {
    useTransformer: rawOptions.transformer ?? false,
    signal: interruptSignal(),
  });
  await report(run, { output: rawOptions.output, format, name: path.basename(inputPath, path.extname(inputPath)) });
}

function createPipeline(options: ScoringOptions, env: Environment): SentimentPipeline {
  const settings = resolveModelSettings(env);
  const cache: CacheClient = options.cache === false ? new MemoryCache() : new FileCache();
  const model = new ModelHandle(
    () => loadOpenAiModel({ ...settings, logger: createLogger('model') }),
    createLogger('model'),
  );

  return new SentimentPipeline({
    model,
    scoreCache: new ScoreCache(cache),
    collectorSettings: { loggerFor: (platform) => createLogger('collector', platform) },
  });
}

async function readRecords(filePath: string): Promise<RawRecord[]> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      throw new Error(`Records file not found at ${filePath}`);
    }
    throw error;
  }

  return parseJson(raw, uploadedRecordsNode, 'records').map((entry): RawRecord => {
    const timestamp = parseTimestamp(entry.timestamp);
    return {
      id: entry.id,
      platform: 'uploaded',
      text: entry.text,
      ...(timestamp ? { timestamp } : {}),
      ...(entry.author !== undefined ? { author: entry.author } : {}),
      ...(entry.engagement !== undefined ? { engagement: entry.engagement } : {}),
    };
  });
}

interface ExportTarget {
  output: string | undefined;
  format: ExportFormat;
  name: string;
}

async function report(run: AnalysisRun, target: ExportTarget) {
  for (const [key, value] of Object.entries(flattenSummary(run.summary))) {
    console.log(`${key}: ${value ?? '-'}`);
  }

  if (run.dataset.size === 0) {
    console.log('No records to export.');
    return;
  }

  const safeName = target.name.toLowerCase().replace(/[^a-z0-9-_]+/g, '-');
  const isoStamp = new Date().toISOString().replace(/[:]/g, '-');
  const outputPath = target.output
    ? path.resolve(target.output)
    : path.join('output', `${isoStamp}_${safeName}.${target.format}`);

  if (target.format === 'json') {
    await writeJsonRows(outputPath, run.dataset);
  } else {
    const writer = await CsvStreamWriter.create(outputPath);
    for (const row of run.dataset) {
      await writer.writeRow(row);
    }
    await writer.close();
  }
  console.log(`Wrote ${run.dataset.size} rows to ${outputPath}`);
}

/** Ctrl-C stops scoring at the next batch; the partial dataset is still exported. */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => {
    console.log('Interrupted, finishing the current batch...');
    controller.abort();
  });
  return controller.signal;
}
