import { describe, expect, it } from 'vitest';
import { LineageTracer, traceAsync } from '../tracer.js';

describe('LineageTracer', () => {
  it('nests spans and records events', () => {
    const tracer = new LineageTracer();
    const root = tracer.startSpan('agent_run', { attributes: { query: 'q' } });
    const child = tracer.startSpan('act', { parentId: root });
    tracer.addEvent(child, 'tool_selected', { tool: 'search_vector_db' });
    tracer.endSpan(child);

    const [rootSpan, childSpan] = tracer.exportTraces();
    expect(tracer.exportTraces()).toHaveLength(2);
    expect(rootSpan.id).toBe(root);
    expect(childSpan.parentId).toBe(root);
    expect(childSpan.events.map((event) => event.name)).toEqual(['tool_selected']);
    expect(childSpan.endTime).toBeDefined();
    expect(rootSpan.endTime).toBeUndefined();
  });

  it('keeps the first end time', () => {
    const tracer = new LineageTracer();
    const id = tracer.startSpan('plan');
    tracer.endSpan(id);
    const first = tracer.exportTraces()[0].endTime;
    tracer.endSpan(id);
    expect(tracer.exportTraces()[0].endTime).toBe(first);
  });

  it('records nothing when disabled', () => {
    const tracer = new LineageTracer({ enabled: false });
    const id = tracer.startSpan('plan');
    tracer.setAttribute(id, 'x', 1);

    expect(id).toBe('');
    expect(tracer.exportTraces()).toEqual([]);
  });
});

describe('traceAsync', () => {
  it('marks the span ok on success', async () => {
    const tracer = new LineageTracer();
    await expect(traceAsync(tracer, 'work', async () => 42)).resolves.toBe(42);

    const [span] = tracer.exportTraces();
    expect(span.attributes.status).toBe('ok');
    expect(span.endTime).toBeDefined();
  });

  it('records and rethrows a failure', async () => {
    const tracer = new LineageTracer();
    await expect(
      traceAsync(tracer, 'work', async () => {
        throw new RangeError('too deep');
      })
    ).rejects.toThrow('too deep');

    const [span] = tracer.exportTraces();
    expect(span.attributes).toMatchObject({ status: 'error', 'error.message': 'too deep', 'error.type': 'RangeError' });
    expect(span.endTime).toBeDefined();
  });
});
