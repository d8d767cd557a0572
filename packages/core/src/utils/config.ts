import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from '../errors.js';
dotenv.config();
const ConfigSchema = z.object({
  model: z.object({
    file: z.string().min(1).default('data/kg-tax.xml'),
    format: z.string().default('archimate'),
  }),
  output: z.object({
    format: z.enum(['console', 'csv', 'table']).default('console'),
    reportsDir: z.string().min(1).default('reports'),
  }),
  debug: z.object({
    verbose: z.boolean().default(false),
  }),
  app: z.object({
    name: z.string().default('archi-reports'),
  }),
});
export type Config = z.infer<typeof ConfigSchema>;

const ENV_MAP: Record<string, string> = {
  ARCHI_MODEL_FILE: 'model.file',
  ARCHI_MODEL_FORMAT: 'model.format',
  ARCHI_OUTPUT_FORMAT: 'output.format',
  ARCHI_REPORTS_DIR: 'output.reportsDir',
  VERBOSE: 'debug.verbose',
};

type Coercer = (raw: string) => unknown;

const toBoolean: Coercer = (raw) => raw.toLowerCase() === 'true';
const identity: Coercer = (raw) => raw;

const COERCE_MAP: Record<string, Coercer> = {
  'debug.verbose': toBoolean,
};

function setNestedValue(obj: Record<string, unknown>, dotPath: string, value: unknown): void {
  const segments = dotPath.split('.');
  let current: Record<string, unknown> = obj;
  for (let i = 0; i < segments.length - 1; i++) {
    const seg = segments[i];
    if (!seg) continue;
    const next = current[seg];
    if (typeof next === 'object' && next !== null && !Array.isArray(next)) {
      current = next as Record<string, unknown>;
    } else {
      const created: Record<string, unknown> = {};
      current[seg] = created;
      current = created;
    }
  }
  const lastKey = segments.at(-1);
  if (lastKey) {
    current[lastKey] = value;
  }
}

function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const config: Record<string, unknown> = {
    model: {},
    output: {},
    debug: {},
    app: {},
  };

  for (const [envVar, dotPath] of Object.entries(ENV_MAP)) {
    const raw = env[envVar];
    if (raw === undefined) continue;
    const coerce = COERCE_MAP[dotPath] ?? identity;
    setNestedValue(config, dotPath, coerce(raw));
  }

  return config;
}

export function createConfig(env: NodeJS.ProcessEnv = process.env): Config {
  try {
    return ConfigSchema.parse(loadConfigFromEnv(env));
  } catch (error) {
    if (error instanceof z.ZodError) {
      const summary = error.issues
        .map((issue, idx) => `${String(idx + 1)}. ${issue.path.join('.')}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Config validation failed: ${summary}`, 'validation');
    }
    throw error;
  }
}

export const CONFIG = createConfig();
