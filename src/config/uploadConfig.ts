/**
 * Upload configuration: command line flags first, environment variables as fallback.
 */

import { z } from 'zod';
import { formatIssues } from '../types/GraphDescriptionSchema';
import { UploadConfigError } from '../types/UploadErrors';
import {
  DEFAULT_NEO4J_DATABASE,
  DEFAULT_NEO4J_PORT,
  Neo4jConnectionConfig,
} from '../services/graph/Neo4jConnection';

export const USAGE =
  'Usage: upload-graph --host <host> [-p|--port 7687] -u|--user <user> -pw|--password <password> ' +
  '[-d|--database neo4j] -f|--file <graph.json> [--no-prior-clear]';

const requiredString = (message: string) => z.string({ required_error: message }).min(1, message);

const UploadConfigSchema = z.object({
  scheme: z.string().min(1).default('neo4j'),
  host: requiredString('host is required (--host or NEO4J_HOST)'),
  port: z.coerce.number().int().positive().max(65535).default(DEFAULT_NEO4J_PORT),
  user: requiredString('user is required (-u/--user or NEO4J_USER)'),
  password: requiredString('password is required (-pw/--password or NEO4J_PASSWORD)'),
  database: z.string().min(1).default(DEFAULT_NEO4J_DATABASE),
  file: requiredString('file is required (-f/--file or GRAPH_FILE)'),
  clear: z.boolean().default(true),
});

export interface UploadConfig {
  connection: Neo4jConnectionConfig;
  file: string;
  clear: boolean;
}

interface RawEnv {
  [key: string]: string | undefined;
}

const VALUE_FLAGS: Record<string, 'host' | 'port' | 'user' | 'password' | 'database' | 'file' | 'scheme'> = {
  '--host': 'host',
  '-p': 'port',
  '--port': 'port',
  '-u': 'user',
  '--user': 'user',
  '-pw': 'password',
  '--password': 'password',
  '-d': 'database',
  '--database': 'database',
  '-f': 'file',
  '--file': 'file',
  '--scheme': 'scheme',
};

type RawFlags = Partial<Record<(typeof VALUE_FLAGS)[string], string>> & { clear?: boolean };

export function parseArgs(args: string[]): RawFlags {
  const flags: RawFlags = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '--no-prior-clear') {
      flags.clear = false;
      continue;
    }

    const [name, inlineValue]: [string, string | undefined] = arg.startsWith('--') && arg.includes('=') ? splitOnce(arg, '=') : [arg, undefined];
    const key = VALUE_FLAGS[name];
    if (!key) {
      throw new UploadConfigError(`Unknown argument: ${arg}\n${USAGE}`);
    }

    const value = inlineValue ?? args[i + 1];
    if (value === undefined) {
      throw new UploadConfigError(`Missing value for ${name}\n${USAGE}`);
    }
    if (inlineValue === undefined) {
      i++;
    }
    flags[key] = value;
  }

  return flags;
}

function splitOnce(value: string, separator: string): [string, string] {
  const index = value.indexOf(separator);
  return [value.slice(0, index), value.slice(index + separator.length)];
}

export function loadUploadConfig(args: string[], env: RawEnv = process.env): UploadConfig {
  const flags = parseArgs(args);

  const result = UploadConfigSchema.safeParse({
    scheme: flags.scheme ?? env.NEO4J_SCHEME,
    host: flags.host ?? env.NEO4J_HOST,
    port: flags.port ?? env.NEO4J_PORT,
    user: flags.user ?? env.NEO4J_USER,
    password: flags.password ?? env.NEO4J_PASSWORD,
    database: flags.database ?? env.NEO4J_DATABASE,
    file: flags.file ?? env.GRAPH_FILE,
    clear: flags.clear,
  });

  if (!result.success) {
    throw new UploadConfigError(`Invalid configuration: ${formatIssues(result.error).join('; ')}\n${USAGE}`);
  }

  const { file, clear, ...connection } = result.data;
  return { connection, file, clear };
}
