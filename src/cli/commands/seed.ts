import type { LineageConfig } from '../../config/index.js';
import { safeAsync } from '../../core/result.js';
import { seedSampleLineage } from '../../storage/seed.js';
import { createLogger } from '../../telemetry/logger.js';
import { withTimeout } from '../../utils/async.js';
import { openRuntime } from '../runtime.js';

const log = createLogger('cli');

export interface SeedCommandOptions {
  config: LineageConfig;
  json: boolean;
}

export async function seedCommand(options: SeedCommandOptions): Promise<void> {
  const runtime = openRuntime(options.config);
  try {
    // Probe the embedder once so an offline model only skips the documents.
    const probe = await safeAsync(() =>
      withTimeout(runtime.embedder.embed('lineage'), options.config.llmTimeoutMs, { context: 'embedding probe' })
    );
    if (!probe.ok) {
      log.warn('embedding model unreachable, seeding graph only', { error: probe.error.message });
    }

    const report = probe.ok
      ? await seedSampleLineage(runtime.graph, runtime.store, runtime.embedder)
      : await seedSampleLineage(runtime.graph);

    if (options.json) {
      console.log(JSON.stringify({ dbPath: options.config.dbPath, ...report }, null, 2));
    } else {
      console.log(`Seeded ${options.config.dbPath}: ${report.nodes} nodes, ${report.edges} edges, ${report.documents} documents`);
    }
  } finally {
    runtime.close();
  }
}
