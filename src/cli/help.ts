/**
 * CLI Help Text
 *
 * Help and usage text for the CLI
 */

/** Get the usage text */
export function getUsageText(): string {
  return `Usage: phasegate --task "<description>" [options]

Runs the phases of a workflow against a repository, validating each
worker response and looping back to implement when verification fails.

Options:
  --task <text>                   Task description (or give it as plain arguments)
  --workflow <path>               Workflow definition (default: agent/workflow.json)
  --repo <path>                   Repository root (default: current directory)
  --worker <command>              Worker CLI command (default: claude)
  --worker-args <args>            Arguments for the worker, split on spaces (default: -p)
  --timeout <seconds>             Timeout for each worker call (default: 600)
  --max-total-iterations <n>      Ceiling on phase entries across the run (default: 25)
  --max-phase-iterations <n>      Ceiling on entries into any one phase (default: 6)
  --verbose                       Show more progress details
  --debug                         Show debug diagnostics
  --json                          Emit log events as JSON lines on stderr
  -h, --help                      Show this help message
  -v, --version                   Show version number

Exit codes:
  0 success, 1 unexpected error, 2 usage, 3 invalid worker output,
  4 iteration limit, 5 worker failure, 6 configuration, 7 write policy

Examples:
  phasegate --task "Add input validation to the signup form"
  phasegate --task "Fix flaky date test" --max-phase-iterations 3
  phasegate --task "Tidy README" --worker my-agent --worker-args "--print --quiet"`;
}

