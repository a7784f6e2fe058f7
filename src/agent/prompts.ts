/**
 * @fileoverview Prompt and response contracts for the decision maker
 *
 * Three prompts: the investigation plan, the single-tool choice, and the
 * final synthesis. The synthesis reply is expected in a fixed template:
 *
 * ```
 * Lineage:
 * <one sentence answer>
 *
 * Tables:
 * <comma-separated entity names>
 *
 * Path:
 * <optional a -> b -> c chain>
 * ```
 */

import type { LineageTool, ToolResult } from '../tools/types.js';
import type { AgentState } from './state.js';

export const PLAN_MAX_TOKENS = 500;
export const TOOL_CHOICE_MAX_TOKENS = 50;
export const SYNTHESIS_MAX_TOKENS = 500;

export interface KnownEntity {
  id: string;
  name: string;
}

// ============================================================================
// PROMPTS
// ============================================================================

export function buildPlanPrompt(query: string, tools: Array<Pick<LineageTool, 'name' | 'description'>>): string {
  const toolList = tools.map((tool, index) => `${index + 1}. ${tool.name} - ${tool.description}`).join('\n');
  return `You are a data lineage investigator. A user is asking:

"${query}"

Your job is to plan which tools you'll use to answer this question.

Available tools:
${toolList}

Create a concise investigation plan (2-3 steps):

PLAN:
`;
}

export function buildToolChoicePrompt(plan: string, query: string): string {
  return `Given the investigation plan:
${plan}

And the original query: "${query}"

Which tool should we call FIRST to make progress?

Respond with ONLY the tool name, like:
search_vector_db
`;
}

export function buildSynthesisPrompt(
  query: string,
  toolResults: Record<string, ToolResult>,
  entityNames: string[]
): string {
  const examplePath = entityNames.length >= 2 ? entityNames.join(' -> ') : 'source_table -> derived_table -> dashboard';
  return `You are a data lineage assistant.

You MUST:
1. Answer the question in a short sentence.
2. Then explicitly list ALL relevant table names taken from this set:
   ${entityNames.length > 0 ? entityNames.join(', ') : '(no known tables)'}
3. When describing a path, use the format:
   ${examplePath}

Question:
${query}

Tool results (JSON):
${JSON.stringify(toolResults, null, 2)}

Answer using this template:

Lineage:
<one sentence answer>

Tables:
<comma-separated list of table names>

Path:
<optional arrow-separated path if applicable>

ANSWER:
`;
}

// ============================================================================
// RESPONSE PARSING
// ============================================================================

export interface ParsedSynthesis {
  summary: string;
  /** Vocabulary names the answer references, in vocabulary order. */
  referencedEntities: string[];
  /** Arrow-separated chain from the `Path:` section, if any. */
  path: string[];
}

const SECTION_PATTERN = /^\s*(lineage|tables|path)\s*:\s*(.*)$/i;

/**
 * Split a synthesis reply into its template sections. Tolerates missing
 * sections, inline values (`Tables: a, b`) and surrounding chatter.
 */
export function parseSynthesis(answer: string, entityNames: string[]): ParsedSynthesis {
  const sections: Record<'lineage' | 'tables' | 'path', string[]> = { lineage: [], tables: [], path: [] };
  let current: keyof typeof sections | null = null;

  for (const line of answer.split(/\r?\n/)) {
    const match = SECTION_PATTERN.exec(line);
    if (match) {
      const heading = match[1].toLowerCase();
      current = heading === 'lineage' || heading === 'tables' || heading === 'path' ? heading : null;
      if (current && match[2].trim()) {
        sections[current].push(match[2].trim());
      }
      continue;
    }
    if (current && line.trim()) {
      sections[current].push(line.trim());
    }
  }

  const summary = sections.lineage.join(' ') || answer.trim().split(/\r?\n/)[0]?.trim() || '';
  const known = new Set(entityNames.map((name) => name.toLowerCase()));

  const tableText = sections.tables.length > 0 ? sections.tables.join(',') : answer;
  const referencedEntities = entityNames.filter((name) =>
    sections.tables.length > 0
      ? tableText.split(/[,\n]/).some((entry) => entry.trim().toLowerCase() === name.toLowerCase())
      : mentionsName(answer, name)
  );

  const pathLine = sections.path.find((line) => line.includes('->')) ?? '';
  const path = pathLine
    .split('->')
    .map((segment) => segment.trim())
    .filter((segment) => segment.length > 0 && known.has(segment.toLowerCase()));

  return { summary, referencedEntities, path };
}

/**
 * Whole-word, case-insensitive mention of an entity name; underscores in
 * the name also match spaces.
 */
export function mentionsName(text: string, name: string): boolean {
  return findMention(text, name) >= 0;
}

export function findMention(text: string, name: string): number {
  const escaped = name
    .toLowerCase()
    .split('_')
    .map((part) => part.replace(/[.*+?^${}()|[\]\\]/g, '\\$&'))
    .join('[_\\s]');
  const pattern = new RegExp(`(^|[^a-z0-9_])(${escaped})(?![a-z0-9_])`, 'i');
  const match = pattern.exec(text);
  return match ? match.index + match[1].length : -1;
}

// ============================================================================
// FALLBACK
// ============================================================================

/**
 * Deterministic answer used when the synthesis call yields no text.
 */
export function buildFallbackAnswer(
  state: Pick<AgentState, 'toolResults' | 'evidence' | 'dependencyContext'>,
  entityNames: string[]
): string {
  const total = Object.keys(state.toolResults).length;
  const successes = Object.values(state.toolResults).filter((result) => result.success === true).length;

  const found: string[] = [];
  const note = (name: string): void => {
    if (!found.includes(name)) found.push(name);
  };
  for (const dep of state.dependencyContext?.dependencies ?? []) {
    note(dep.name);
  }
  for (const hit of state.evidence) {
    note(hit.entityName);
  }
  const tables = found.filter((name) => entityNames.length === 0 || entityNames.includes(name));

  const lineage = total === 0
    ? 'No tool results were gathered, so the lineage could not be determined.'
    : tables.length > 0
      ? `The answer could not be synthesized; ${successes} of ${total} tools succeeded and point at the tables listed below.`
      : `The answer could not be synthesized; ${successes} of ${total} tools succeeded without identifying any table.`;

  return `Lineage:\n${lineage}\n\nTables:\n${tables.join(', ')}\n\nPath:\n`;
}
