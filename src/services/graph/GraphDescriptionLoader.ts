/**
 * Loads a graph description document from disk
 */

import * as fs from 'fs';
import { GraphDescription } from '../../types/GraphTypes';
import { InvalidGraphDescriptionError } from '../../types/UploadErrors';
import { Logger } from '../core/Logger';
import { parseGraphDescription } from './GraphModel';

const logger = new Logger('GraphDescriptionLoader');

export function readGraphDocument(filePath: string): unknown {
  if (!fs.existsSync(filePath)) {
    throw new InvalidGraphDescriptionError(`Graph description not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, 'utf-8');
  try {
    return JSON.parse(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new InvalidGraphDescriptionError(`Graph description is not valid JSON (${filePath}): ${reason}`);
  }
}

export function loadGraphDescription(filePath: string): GraphDescription {
  const description = parseGraphDescription(readGraphDocument(filePath));
  logger.info('Graph description loaded', {
    filePath,
    nodes: description.nodes.size,
    edges: description.edges.size,
  });
  return description;
}
