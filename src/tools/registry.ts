/**
 * @fileoverview Tool registry
 *
 * Fixed set of named tools, looked up case-insensitively. Registration order
 * is significant: tool selection walks `names()` and the first match wins.
 */

import { ValidationError } from '../core/errors.js';
import type { LineageTool } from './types.js';

export class ToolRegistry {
  private readonly tools = new Map<string, LineageTool>();

  constructor(tools: Iterable<LineageTool> = []) {
    for (const tool of tools) {
      this.register(tool);
    }
  }

  register(tool: LineageTool): void {
    const key = tool.name.trim().toLowerCase();
    if (!key) {
      throw new ValidationError('tool.name', 'non-empty name', JSON.stringify(tool.name));
    }
    if (this.tools.has(key)) {
      throw new ValidationError('tool.name', 'unique name', tool.name);
    }
    this.tools.set(key, tool);
  }

  get(name: string): LineageTool | undefined {
    return this.tools.get(name.trim().toLowerCase());
  }

  has(name: string): boolean {
    return this.get(name) !== undefined;
  }

  /** Registered names, in registration order. */
  names(): string[] {
    return Array.from(this.tools.values(), (tool) => tool.name);
  }

  list(): LineageTool[] {
    return Array.from(this.tools.values());
  }

  size(): number {
    return this.tools.size;
  }
}
