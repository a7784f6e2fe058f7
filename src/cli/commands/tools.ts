import type { LineageConfig } from '../../config/index.js';
import { openRuntime } from '../runtime.js';

export interface ToolsCommandOptions {
  config: LineageConfig;
  json: boolean;
}

export function toolsCommand(options: ToolsCommandOptions): void {
  const runtime = openRuntime(options.config);
  try {
    const tools = runtime.registry.list().map((tool) => ({ name: tool.name, description: tool.description }));
    if (options.json) {
      console.log(JSON.stringify(tools, null, 2));
      return;
    }
    const width = Math.max(...tools.map((tool) => tool.name.length));
    for (const [index, tool] of tools.entries()) {
      console.log(`${String(index + 1).padStart(2)}. ${tool.name.padEnd(width)}  ${tool.description}`);
    }
  } finally {
    runtime.close();
  }
}
