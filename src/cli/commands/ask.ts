import { parseArgs } from 'node:util';
import type { FinalResult } from '../../agent/orchestrator.js';
import type { LineageConfig } from '../../config/index.js';
import { getErrorMessage } from '../../utils/errors.js';
import { createError } from '../errors.js';
import { openRuntime } from '../runtime.js';

export interface AskCommandOptions {
  config: LineageConfig;
  /** Arguments after the `ask` command word. */
  args: string[];
  /** The global `--json` flag, given before the command word. */
  json?: boolean;
}

export interface AskArguments {
  question: string;
  maxSteps: number;
  maxTools: number;
  json: boolean;
}

function readAskFlags(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        'max-steps': { type: 'string' },
        'max-tools': { type: 'string' },
        json: { type: 'boolean', default: false },
      },
      allowPositionals: true,
      strict: true,
    });
  } catch (error) {
    throw createError('INVALID_ARGUMENT', getErrorMessage(error));
  }
}

export function parseAskArgs(
  args: string[],
  config: Pick<LineageConfig, 'maxSteps' | 'maxTools'>,
  globalJson = false
): AskArguments {
  const { values, positionals } = readAskFlags(args);

  const question = positionals.join(' ').trim();
  if (!question) {
    throw createError('INVALID_ARGUMENT', 'A question is required. Usage: lineage ask "<question>"');
  }

  return {
    question,
    maxSteps: parsePositiveInt('--max-steps', values['max-steps'], config.maxSteps),
    maxTools: parsePositiveInt('--max-tools', values['max-tools'], config.maxTools),
    json: globalJson || values.json === true,
  };
}

function parsePositiveInt(flag: string, raw: string | undefined, fallback: number): number {
  if (raw === undefined) {
    return fallback;
  }
  const value = Number(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw createError('INVALID_ARGUMENT', `${flag} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export async function askCommand(options: AskCommandOptions): Promise<void> {
  const parsed = parseAskArgs(options.args, options.config, options.json);
  const runtime = openRuntime(options.config);

  const controller = new AbortController();
  const onInterrupt = (): void => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    if (runtime.graph.listNodes().length === 0) {
      throw createError('NOT_SEEDED', `No lineage found in ${options.config.dbPath}`);
    }
    const result = await runtime.createAgent().run(parsed.question, {
      maxSteps: parsed.maxSteps,
      maxTools: parsed.maxTools,
      signal: controller.signal,
    });
    console.log(parsed.json ? JSON.stringify(result, null, 2) : formatAnswer(result));
  } finally {
    process.removeListener('SIGINT', onInterrupt);
    runtime.close();
  }
}

export function formatAnswer(result: FinalResult): string {
  const lines = [
    result.finalAnswer,
    '',
    `Confidence: ${(result.confidence * 100).toFixed(0)}%`,
    `Tools: ${result.toolsInvoked.length > 0 ? result.toolsInvoked.join(', ') : '(none)'}`,
    `Steps: ${result.stepCount}`,
  ];
  if (result.errors.length > 0) {
    lines.push('', 'Warnings:', ...result.errors.map((error) => `  - ${error}`));
  }
  return lines.join('\n');
}
