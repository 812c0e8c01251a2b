import { promises as fs } from 'fs';
import { z } from 'zod';
import { createArchitectureGraph } from '../architecture/graph.js';
import { buildArchitectureReport } from '../architecture/report.js';
import { validateContractInput } from '../contracts/validator.js';
import { PredicateRegistry } from '../predicates/registry.js';
import { formatViolation } from '../violations/summary.js';

/** sysexits-style codes. */
export const ExitCode = {
  SUCCESS: 0,
  VIOLATIONS: 2,
  USAGE: 64,
  DATA_ERROR: 65,
  NO_INPUT: 66,
} as const;

export type ExitCode = (typeof ExitCode)[keyof typeof ExitCode];

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  readFile: (path: string) => Promise<string>;
}

const identifier = z.string().trim().min(1);

const lintInputSchema = z.object({
  graph: z.object({
    layers: z.record(identifier, identifier),
    allowedEdges: z.array(z.tuple([identifier, identifier])),
    modules: z.array(identifier).optional(),
  }),
  edges: z.array(z.tuple([identifier, identifier])),
});

const USAGE = `Usage:
  contract-lint <snapshot.json> [--warn]

The snapshot is { "graph": { "layers": {module: layer}, "allowedEdges": [[from, to]] },
                  "edges": [[sourceModule, targetModule], ...] }

Options:
  --warn      Report violations and cycles but exit 0
  --help, -h  Show this help

Dependency cycles fail the check like layer violations.`;

const KNOWN_OPTIONS = new Set(['--warn', '--help', '-h']);

const defaultIO: CliIO = {
  out: line => console.log(line),
  err: line => console.error(line),
  readFile: path => fs.readFile(path, 'utf8'),
};

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * Whole-codebase layering check for CI. Returns the process exit code.
 */
export async function runLint(args: string[], io: CliIO = defaultIO): Promise<ExitCode> {
  if (args.includes('--help') || args.includes('-h')) {
    io.out(USAGE);
    return ExitCode.SUCCESS;
  }

  const unknown = args.find(a => a.startsWith('-') && !KNOWN_OPTIONS.has(a));
  if (unknown !== undefined) {
    io.err(`Unknown option: ${unknown}`);
    io.err(USAGE);
    return ExitCode.USAGE;
  }

  const warnOnly = args.includes('--warn');
  const positional = args.filter(a => !a.startsWith('-'));
  if (positional.length !== 1) {
    io.err(USAGE);
    return ExitCode.USAGE;
  }
  const file = positional[0];

  let text: string;
  try {
    text = await io.readFile(file);
  } catch (error) {
    if (isMissingFile(error)) {
      io.err(`File not found: ${file}`);
      return ExitCode.NO_INPUT;
    }
    throw error;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (error) {
    io.err(`${file}: ${error instanceof Error ? error.message : 'Malformed JSON'}`);
    return ExitCode.DATA_ERROR;
  }

  const parsed = lintInputSchema.safeParse(raw);
  if (!parsed.success) {
    for (const issue of parsed.error.issues) {
      io.err(`${file}: ${issue.path.join('.') || '(root)'}: ${issue.message}`);
    }
    return ExitCode.DATA_ERROR;
  }

  const graph = createArchitectureGraph(parsed.data.graph);
  const structural = validateContractInput(
    {
      name: file,
      rules: [{ id: 'layers', type: 'layer_dependency', severity: 'block', description: 'layers', graph }],
    },
    new PredicateRegistry()
  );
  if (structural.length > 0) {
    for (const issue of structural) {
      io.err(`${file}: ${issue.code}: ${issue.message}`);
    }
    return ExitCode.DATA_ERROR;
  }

  const report = buildArchitectureReport(graph, parsed.data.edges, {
    ruleId: 'layers',
    severity: warnOnly ? 'warn' : 'block',
  });

  for (const violation of report.violations) {
    io.out(formatViolation(violation));
  }
  for (const cycle of report.cycles) {
    io.out(`cycle: ${cycle.join(', ')}`);
  }
  for (const suggestion of report.suggestions) {
    io.out(`  hint: ${suggestion}`);
  }
  io.out(
    `${report.checkedEdges} edges checked, ${report.violations.length} violations, ${report.cycles.length} cycles`
  );

  return report.valid || warnOnly ? ExitCode.SUCCESS : ExitCode.VIOLATIONS;
}
