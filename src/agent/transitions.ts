/**
 * @fileoverview Phase transition rules
 *
 * `act` is the only phase with a conditional successor. Its rules are
 * evaluated in a fixed priority order and the first match decides:
 *
 * 1. `step_budget`   stepCount >= maxSteps          -> synthesize
 * 2. `tool_budget`   distinct results >= maxTools   -> synthesize
 * 3. `need_evidence` no results yet                 -> investigate
 * 4. `confident`     confidence > 0.7               -> synthesize
 * 5. `evidence_cap`  distinct results >= 2          -> synthesize
 * 6. `continue`                                     -> investigate
 *
 * Rules 1-2 guarantee termination whatever the decision maker or tools do.
 * Rule 3 keeps the agent from answering with no evidence. Reordering the
 * list changes stopping behaviour.
 */

import { toolResultCount, type AgentPhase, type AgentState } from './state.js';

export type ActRule =
  | 'step_budget'
  | 'tool_budget'
  | 'need_evidence'
  | 'confident'
  | 'evidence_cap'
  | 'continue';

export type TransitionRule = ActRule | 'unconditional' | 'terminal';

export interface ActDecision {
  phase: 'investigate' | 'synthesize';
  rule: ActRule;
}

export const CONFIDENCE_STOP_THRESHOLD = 0.7;
export const EVIDENCE_CAP = 2;

type RuleInput = Pick<AgentState, 'stepCount' | 'maxSteps' | 'maxTools' | 'toolResults' | 'confidence'>;

interface StopRule {
  rule: ActRule;
  applies(state: RuleInput, resultCount: number): boolean;
  phase: ActDecision['phase'];
}

const ACT_RULES: readonly StopRule[] = [
  { rule: 'step_budget', phase: 'synthesize', applies: (s) => s.stepCount >= s.maxSteps },
  { rule: 'tool_budget', phase: 'synthesize', applies: (s, count) => count >= s.maxTools },
  { rule: 'need_evidence', phase: 'investigate', applies: (_s, count) => count === 0 },
  { rule: 'confident', phase: 'synthesize', applies: (s) => s.confidence > CONFIDENCE_STOP_THRESHOLD },
  { rule: 'evidence_cap', phase: 'synthesize', applies: (_s, count) => count >= EVIDENCE_CAP },
];

/**
 * Decide where `act` goes next. Pure.
 */
export function decideAfterAct(state: RuleInput): ActDecision {
  const resultCount = toolResultCount(state);
  for (const candidate of ACT_RULES) {
    if (candidate.applies(state, resultCount)) {
      return { phase: candidate.phase, rule: candidate.rule };
    }
  }
  return { phase: 'investigate', rule: 'continue' };
}

export interface Transition {
  phase: AgentPhase;
  rule: TransitionRule;
}

/**
 * Successor of the state's current phase, with the rule that chose it. Pure.
 */
export function resolveTransition(state: RuleInput & Pick<AgentState, 'phase'>): Transition {
  switch (state.phase) {
    case 'plan':
      return { phase: 'investigate', rule: 'unconditional' };
    case 'investigate':
      return { phase: 'act', rule: 'unconditional' };
    case 'act':
      return decideAfterAct(state);
    case 'synthesize':
      return { phase: 'done', rule: 'unconditional' };
    case 'done':
      return { phase: 'done', rule: 'terminal' };
  }
}

export function nextPhase(state: RuleInput & Pick<AgentState, 'phase'>): AgentPhase {
  return resolveTransition(state).phase;
}
