/**
 * @fileoverview Agent configuration
 *
 * Defaults for the investigation loop, its external calls and the local
 * stores, overridable through `LINEAGE_*` environment variables.
 *
 * | Variable                      | Field             | Default                  |
 * |-------------------------------|-------------------|--------------------------|
 * | LINEAGE_MAX_STEPS             | maxSteps          | 8                        |
 * | LINEAGE_MAX_TOOLS             | maxTools          | 3                        |
 * | LINEAGE_TRANSITION_LIMIT      | transitionLimit   | 40                       |
 * | LINEAGE_LLM_TIMEOUT_MS        | llmTimeoutMs      | 30000                    |
 * | LINEAGE_TOOL_TIMEOUT_MS       | toolTimeoutMs     | 10000                    |
 * | LINEAGE_DB_PATH               | dbPath            | lineage.db               |
 * | OLLAMA_BASE_URL               | baseUrl           | http://localhost:11434   |
 * | LINEAGE_LLM_MODEL             | model             | mistral                  |
 * | LINEAGE_EMBEDDING_MODEL       | embeddingModel    | all-minilm               |
 * | LINEAGE_LLM_TEMPERATURE       | temperature       | 0.3                      |
 * | LINEAGE_LLM_TOP_P             | topP              | 0.9                      |
 * | LINEAGE_STALE_AFTER_HOURS     | staleAfterHours   | 168                      |
 * | LINEAGE_LOG_LEVEL             | logLevel          | info                     |
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';

// ============================================================================
// SCHEMA
// ============================================================================

export const LineageConfigSchema = z.object({
  maxSteps: z.number().int().min(1),
  maxTools: z.number().int().min(1),
  transitionLimit: z.number().int().min(4),
  llmTimeoutMs: z.number().int().min(0),
  toolTimeoutMs: z.number().int().min(0),
  dbPath: z.string().min(1),
  baseUrl: z.string().url(),
  model: z.string().min(1),
  embeddingModel: z.string().min(1),
  temperature: z.number().min(0).max(2),
  topP: z.number().gt(0).max(1),
  staleAfterHours: z.number().positive(),
  logLevel: z.enum(['debug', 'info', 'warn', 'error']),
}).refine((config) => config.maxSteps + 3 <= config.transitionLimit, {
  message: 'transitionLimit must be at least maxSteps + 3',
  path: ['transitionLimit'],
});

export type LineageConfig = z.infer<typeof LineageConfigSchema>;

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_CONFIG: LineageConfig = {
  maxSteps: 8,
  maxTools: 3,
  // Safety net only; normal runs stop after at most maxSteps + 3 phases.
  transitionLimit: 40,
  llmTimeoutMs: 30_000,
  toolTimeoutMs: 10_000,
  dbPath: 'lineage.db',
  baseUrl: 'http://localhost:11434',
  model: 'mistral',
  embeddingModel: 'all-minilm',
  temperature: 0.3,
  topP: 0.9,
  staleAfterHours: 168,
  logLevel: 'info',
};

interface EnvBinding {
  field: keyof LineageConfig;
  envKey: string;
  numeric: boolean;
}

const ENV_BINDINGS: EnvBinding[] = [
  { field: 'maxSteps', envKey: 'LINEAGE_MAX_STEPS', numeric: true },
  { field: 'maxTools', envKey: 'LINEAGE_MAX_TOOLS', numeric: true },
  { field: 'transitionLimit', envKey: 'LINEAGE_TRANSITION_LIMIT', numeric: true },
  { field: 'llmTimeoutMs', envKey: 'LINEAGE_LLM_TIMEOUT_MS', numeric: true },
  { field: 'toolTimeoutMs', envKey: 'LINEAGE_TOOL_TIMEOUT_MS', numeric: true },
  { field: 'dbPath', envKey: 'LINEAGE_DB_PATH', numeric: false },
  { field: 'baseUrl', envKey: 'OLLAMA_BASE_URL', numeric: false },
  { field: 'model', envKey: 'LINEAGE_LLM_MODEL', numeric: false },
  { field: 'embeddingModel', envKey: 'LINEAGE_EMBEDDING_MODEL', numeric: false },
  { field: 'temperature', envKey: 'LINEAGE_LLM_TEMPERATURE', numeric: true },
  { field: 'topP', envKey: 'LINEAGE_LLM_TOP_P', numeric: true },
  { field: 'staleAfterHours', envKey: 'LINEAGE_STALE_AFTER_HOURS', numeric: true },
  { field: 'logLevel', envKey: 'LINEAGE_LOG_LEVEL', numeric: false },
];

// ============================================================================
// LOADING
// ============================================================================

/**
 * Build a config from defaults, then environment, then explicit overrides.
 *
 * @throws ValidationError naming the first offending field
 */
export function loadConfig(
  env: NodeJS.ProcessEnv = process.env,
  overrides: Partial<LineageConfig> = {}
): LineageConfig {
  const fromEnv: Record<string, unknown> = {};
  for (const { field, envKey, numeric } of ENV_BINDINGS) {
    const raw = env[envKey]?.trim();
    if (!raw) continue;
    fromEnv[field] = numeric ? Number(raw) : raw;
  }

  const explicit = Object.fromEntries(
    Object.entries(overrides).filter(([, value]) => value !== undefined)
  );

  const parsed = LineageConfigSchema.safeParse({ ...DEFAULT_CONFIG, ...fromEnv, ...explicit });
  if (!parsed.success) {
    const issue = parsed.error.errors[0];
    const field = issue?.path.join('.') || 'config';
    const binding = ENV_BINDINGS.find((candidate) => candidate.field === field);
    const raw = binding ? env[binding.envKey] : undefined;
    throw new ValidationError(
      binding?.envKey ?? field,
      issue?.message ?? 'valid configuration',
      describeReceived(raw),
    );
  }
  return parsed.data;
}

function describeReceived(raw: string | undefined): string {
  return raw === undefined ? 'override' : JSON.stringify(raw);
}
