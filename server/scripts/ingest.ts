#!/usr/bin/env node
import { parseArgs } from 'util';
import * as dotenv from 'dotenv';
import { loadConfig } from '../src/config.js';
import { openDatabase } from '../src/db/index.js';
import { ingestRawImages } from '../src/services/ingest.js';
import { PIPELINE_VERSION_PATTERN } from '../src/validation.js';
import { DEFAULT_PIPELINE_VERSION, DEFAULT_RAW_EXTENSIONS } from '../../shared/config.js';

dotenv.config();

const USAGE = `Usage: archive-ingest [--db <path>] [--extensions .nef,.cr2] [--pipeline-version v0.1.0] <path>...`;

function normalizeExtension(ext: string): string {
  const trimmed = ext.trim().toLowerCase();
  return trimmed.startsWith('.') ? trimmed : `.${trimmed}`;
}

async function main() {
  const { values, positionals } = parseArgs({
    allowPositionals: true,
    options: {
      db: { type: 'string' },
      extensions: { type: 'string' },
      'pipeline-version': { type: 'string' },
      help: { type: 'boolean', short: 'h' },
    },
  });

  if (values.help || positionals.length === 0) {
    console.log(USAGE);
    process.exit(values.help ? 0 : 1);
  }

  const pipelineVersion = values['pipeline-version'] ?? DEFAULT_PIPELINE_VERSION;
  if (!PIPELINE_VERSION_PATTERN.test(pipelineVersion)) {
    console.error(`Error: invalid pipeline version '${pipelineVersion}'`);
    process.exit(1);
  }

  const extensions = values.extensions
    ? values.extensions.split(',').filter((e) => e.trim() !== '').map(normalizeExtension)
    : DEFAULT_RAW_EXTENSIONS;

  const dbPath = values.db ?? loadConfig().dbPath;
  console.log(`[DB] Using database at: ${dbPath}`);
  const { sqlite, db } = openDatabase(dbPath);

  try {
    const stats = await ingestRawImages({ paths: positionals, extensions, pipelineVersion }, db);
    console.log('Ingestion completed.');
    console.log(`  Paths given:    ${stats.totalPaths}`);
    console.log(`  Files scanned:  ${stats.scanned}`);
    console.log(`  Inserted:       ${stats.inserted}`);
    console.log(`  Duplicates:     ${stats.duplicates}`);
    console.log(`  Invalid paths:  ${stats.invalidPaths}`);
    if (stats.invalidPaths > 0) process.exitCode = 1;
  } finally {
    sqlite.close();
  }
}

main().catch((err) => {
  console.error('Ingestion failed:', err instanceof Error ? err.message : err);
  process.exit(1);
});
