/**
 * In-process fakes for agent tests: a scripted decision maker and stub tools.
 */

import { vi } from 'vitest';
import type { KnownEntity } from '../prompts.js';
import type { DecisionMaker } from '../decision_maker.js';
import { TOOL_NAMES, type LineageTool, type ToolInput, type ToolResult } from '../../tools/types.js';

export type PromptKind = 'plan' | 'tool_choice' | 'synthesis';

export function classifyPrompt(prompt: string): PromptKind {
  if (prompt.includes('Which tool should we call FIRST')) return 'tool_choice';
  if (prompt.includes('ANSWER:')) return 'synthesis';
  return 'plan';
}

type Reply = string | ((prompt: string) => string | Promise<string>);

export interface ScriptedReplies {
  plan?: Reply;
  toolChoice?: Reply;
  synthesis?: Reply;
}

/**
 * Decision maker answering each prompt kind from the script; `generate` is a
 * `vi.fn` so tests can count and inspect calls.
 */
export function scriptedDecisionMaker(replies: ScriptedReplies = {}) {
  const pick = (kind: PromptKind): Reply | undefined => {
    if (kind === 'plan') return replies.plan;
    if (kind === 'tool_choice') return replies.toolChoice;
    return replies.synthesis;
  };
  const generate = vi.fn(async (prompt: string, _maxTokens: number): Promise<string> => {
    const reply = pick(classifyPrompt(prompt)) ?? '';
    return typeof reply === 'string' ? reply : reply(prompt);
  });
  const decisionMaker: DecisionMaker = { generate };
  return { decisionMaker, generate };
}

export function stubTool(
  name: string,
  invoke: (input: ToolInput) => ToolResult | Promise<ToolResult> = () => ({ success: true })
) {
  const spy = vi.fn(invoke);
  const tool: LineageTool = { name, description: `${name} stub`, invoke: spy };
  return { tool, invoke: spy };
}

/** The six tool names, all succeeding unless overridden. */
export function stubToolset(overrides: Partial<Record<string, LineageTool>> = {}): LineageTool[] {
  return TOOL_NAMES.map((name) => overrides[name] ?? stubTool(name).tool);
}

export const SAMPLE_VOCABULARY: KnownEntity[] = [
  { id: 'table_users', name: 'users' },
  { id: 'table_orders', name: 'orders' },
  { id: 'table_order_clean', name: 'order_clean' },
  { id: 'table_revenue_daily', name: 'revenue_daily' },
  { id: 'dashboard_revenue', name: 'revenue_dashboard' },
];
