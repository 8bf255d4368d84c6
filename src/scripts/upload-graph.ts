#!/usr/bin/env node
/**
 * Graph Upload Script
 *
 * Uploads a JSON graph description into Neo4j inside a single transaction.
 *
 * Usage:
 *   upload-graph --host localhost -u neo4j -pw <password> -f graph.json [-p 7687] [-d neo4j] [--no-prior-clear]
 *
 * Environment variables (from .env file) fill in any flag not given:
 *   - NEO4J_HOST, NEO4J_PORT, NEO4J_USER, NEO4J_PASSWORD, NEO4J_DATABASE, NEO4J_SCHEME
 *   - GRAPH_FILE
 *   - LOG_LEVEL=debug prints every statement with its parameters
 */

import * as dotenv from 'dotenv';
import * as fs from 'fs';
import * as path from 'path';
import { loadUploadConfig } from '../config/uploadConfig';
import { Logger } from '../services/core/Logger';
import { loadGraphDescription } from '../services/graph/GraphDescriptionLoader';
import { GraphUploader } from '../services/graph/GraphUploader';
import { Neo4jGraphStore, buildConnectionUri } from '../services/graph/Neo4jConnection';
import { ConsoleProgressReporter } from '../services/graph/ProgressReporter';
import { StoreError } from '../types/UploadErrors';

const logger = new Logger('UploadGraph');

/**
 * Returns the process exit code: 0 on success, 1 on any failure.
 */
export async function main(args: string[], env: NodeJS.ProcessEnv = process.env): Promise<number> {
  let store: Neo4jGraphStore | null = null;

  try {
    const config = loadUploadConfig(args, env);
    const description = loadGraphDescription(config.file);

    store = new Neo4jGraphStore(config.connection);
    if (!(await store.healthCheck())) {
      throw new StoreError(
        `Cannot reach Neo4j at ${buildConnectionUri(config.connection)} (database '${config.connection.database}')`,
        { phase: 'OPENING' }
      );
    }

    const uploader = new GraphUploader();
    const summary = await uploader.upload(description, store, {
      clearFirst: config.clear,
      progress: new ConsoleProgressReporter(),
    });

    logger.info('Upload finished', { ...summary });
    return 0;
  } catch (error) {
    console.error(error instanceof Error ? error.message : String(error));
    return 1;
  } finally {
    if (store) {
      await store.close().catch((closeError: unknown) => {
        logger.warn('Failed to close Neo4j driver', { error: closeError });
      });
    }
  }
}

if (require.main === module) {
  const envPath = path.join(process.cwd(), '.env');
  if (fs.existsSync(envPath)) {
    dotenv.config({ path: envPath });
  }

  main(process.argv.slice(2))
    .then((code) => {
      process.exitCode = code;
    })
    .catch((error: unknown) => {
      console.error('Fatal error:', error instanceof Error ? error.message : String(error));
      process.exitCode = 1;
    });
}
