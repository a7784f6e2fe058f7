import { describe, expect, it } from 'vitest';
import { TOOL_NAMES } from '../../tools/types.js';
import {
  DEFAULT_TOOL_TARGETS,
  buildToolInput,
  findMentionedEntities,
  matchToolName,
  resolveToolTargets,
} from '../tool_selection.js';
import { SAMPLE_VOCABULARY } from './helpers.js';

describe('matchToolName', () => {
  it('matches an exact name regardless of case and whitespace', () => {
    expect(matchToolName('  Get_Node_Metadata\n', TOOL_NAMES)).toBe('get_node_metadata');
  });

  it('matches when the reply contains the name', () => {
    expect(matchToolName('I would call trace_data_flow first.', TOOL_NAMES)).toBe('trace_data_flow');
  });

  it('matches when the name contains the reply', () => {
    expect(matchToolName('freshness', TOOL_NAMES)).toBe('check_data_freshness');
  });

  it('takes the first registered match', () => {
    // "metadata" contains "data" and get_node_metadata is registered before trace_data_flow
    expect(matchToolName('data', TOOL_NAMES)).toBe('get_node_metadata');
    expect(matchToolName('get', TOOL_NAMES)).toBe('get_table_dependencies');
  });

  it('falls back to the default for empty or unknown replies', () => {
    expect(matchToolName('', TOOL_NAMES)).toBe('search_vector_db');
    expect(matchToolName('   ', TOOL_NAMES)).toBe('search_vector_db');
    expect(matchToolName('banana', TOOL_NAMES)).toBe('search_vector_db');
    expect(matchToolName('banana', TOOL_NAMES, 'get_node_metadata')).toBe('get_node_metadata');
  });
});

describe('resolveToolTargets', () => {
  it('orders mentions by position and treats underscores as spaces', () => {
    const mentioned = findMentionedEntities('Does revenue dashboard depend on orders?', SAMPLE_VOCABULARY);
    expect(mentioned.map((entity) => entity.name)).toEqual(['revenue_dashboard', 'orders']);
  });

  it('does not match names inside longer words', () => {
    expect(findMentionedEntities('the superusers table', SAMPLE_VOCABULARY)).toEqual([]);
  });

  it('targets the last mention and sources from the first other mention', () => {
    expect(resolveToolTargets('Is users upstream of revenue_daily?', SAMPLE_VOCABULARY)).toEqual({
      targetId: 'table_revenue_daily',
      sourceId: 'table_users',
      nodeId: 'table_revenue_daily',
    });
  });

  it('keeps the default source when only one entity is mentioned', () => {
    expect(resolveToolTargets('What feeds order_clean?', SAMPLE_VOCABULARY)).toEqual({
      targetId: 'table_order_clean',
      sourceId: 'table_orders',
      nodeId: 'table_order_clean',
    });
  });

  it('uses the defaults when nothing is mentioned', () => {
    expect(resolveToolTargets('Where does data come from?', SAMPLE_VOCABULARY)).toEqual(DEFAULT_TOOL_TARGETS);
  });
});

describe('buildToolInput', () => {
  const targets = { targetId: 'dashboard_revenue', sourceId: 'table_orders', nodeId: 'table_users' };

  it('sniffs the tool name for its input shape', () => {
    expect(buildToolInput('search_vector_db', 'q', targets)).toEqual({ query: 'q', limit: 3 });
    expect(buildToolInput('get_table_dependencies', 'q', targets)).toEqual({ tableId: 'dashboard_revenue', depth: 3 });
    expect(buildToolInput('validate_lineage_path', 'q', targets)).toEqual({
      sourceId: 'table_orders',
      targetId: 'dashboard_revenue',
    });
    expect(buildToolInput('trace_data_flow', 'q', targets)).toEqual({
      sourceId: 'table_orders',
      targetId: 'dashboard_revenue',
    });
    expect(buildToolInput('get_node_metadata', 'q', targets)).toEqual({ nodeId: 'table_users' });
    expect(buildToolInput('check_data_freshness', 'q', targets)).toEqual({ tableId: 'table_users' });
  });

  it('defaults to a search-shaped input for unknown names', () => {
    expect(buildToolInput('summarize_everything', 'q', targets)).toEqual({ query: 'q', limit: 3 });
  });
});
