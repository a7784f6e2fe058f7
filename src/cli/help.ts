/**
 * @fileoverview Detailed help text for lineage CLI commands
 */

const HELP_TEXT = {
  main: `
lineage - Ask questions about where your data comes from

USAGE:
    lineage <command> [options]

COMMANDS:
    ask <question>      Investigate a lineage question and print the answer
    seed                Load the sample lineage into the local database
    tools               List the investigation tools
    help [command]      Show help for a command

GLOBAL OPTIONS:
    -h, --help          Show help information
    --json              Print results and errors as JSON

ENVIRONMENT:
    LINEAGE_DB_PATH            SQLite database file (default: lineage.db)
    OLLAMA_BASE_URL            Ollama server (default: http://localhost:11434)
    LINEAGE_LLM_MODEL          Generation model (default: mistral)
    LINEAGE_EMBEDDING_MODEL    Embedding model (default: all-minilm)
    LINEAGE_MAX_STEPS          Default step budget (default: 8)
    LINEAGE_MAX_TOOLS          Default tool budget (default: 3)
    LINEAGE_LOG_LEVEL          debug | info | warn | error (default: info)

EXAMPLES:
    lineage seed
    lineage ask "What feeds into the revenue dashboard?"
    lineage ask "Does orders feed revenue_daily?" --max-steps 6 --json

For more information on a specific command, run:
    lineage help <command>
`,

  ask: `
lineage ask - Investigate a lineage question

USAGE:
    lineage ask "<question>" [options]

OPTIONS:
    --max-steps <n>     Phase budget for the investigation (default: LINEAGE_MAX_STEPS)
    --max-tools <n>     Distinct tools to gather before answering (default: LINEAGE_MAX_TOOLS)
    --json              Print the full result, including spans, as JSON

DESCRIPTION:
    Plans an investigation, calls tools one at a time until it is confident
    or out of budget, then writes an answer listing the tables involved.
    Press Ctrl+C to cancel between phases.

EXAMPLES:
    lineage ask "What feeds into the revenue dashboard?"
    lineage ask "Trace orders to revenue_dashboard" --max-tools 2
`,

  seed: `
lineage seed - Load the sample lineage

USAGE:
    lineage seed

DESCRIPTION:
    Writes the sample nodes and FEEDS_INTO edges into the graph. When the
    embedding model is reachable the sample documents are embedded and
    stored for semantic search; otherwise only the graph is seeded.
`,

  tools: `
lineage tools - List the investigation tools

USAGE:
    lineage tools [--json]

DESCRIPTION:
    Prints each tool in selection order with its description.
`,
} as const;

export type HelpTopic = keyof typeof HELP_TEXT;

function isHelpTopic(topic: string): topic is HelpTopic {
  return Object.prototype.hasOwnProperty.call(HELP_TEXT, topic);
}

export function showHelp(command?: string): void {
  if (command && isHelpTopic(command)) {
    console.log(HELP_TEXT[command]);
  } else if (command) {
    console.log(`Unknown command: ${command}`);
    console.log(HELP_TEXT.main);
  } else {
    console.log(HELP_TEXT.main);
  }
}

export function getCommandHelp(command: string): string {
  return isHelpTopic(command) ? HELP_TEXT[command] : HELP_TEXT.main;
}
