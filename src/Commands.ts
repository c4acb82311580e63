/**
 * Command surface: `verify` and `optimize`
 *
 * Exit status: 0 when the run finished within budget, 2 when a budget ran
 * out (verdicts are then inconclusive), 1 on error.
 */

import { readFileSync } from 'fs';
import type { Rule } from './egraph/Rules.js';
import { termToString } from './egraph/ENode.js';
import { parseSExpr } from './egraph/Syntax.js';
import { parseTerm } from './egraph/Convert.js';
import { verify } from './egraph/Verifier.js';
import { optimize } from './egraph/Optimizer.js';
import type { TensorData } from './tensor/Metadata.js';
import { tensorAxioms } from './tensor/Axioms.js';
import { parseRuleFile, parseCandidateFile } from './RuleFile.js';
import { formatError } from './Errors.js';

export const EXIT_OK = 0;
export const EXIT_ERROR = 1;
export const EXIT_BUDGET = 2;

/**
 * Where the commands read files and write output
 */
export interface CliIO {
  readFile(path: string): string;
  log(line: string): void;
  error(line: string): void;
}

export const nodeIO: CliIO = {
  readFile: path => readFileSync(path, 'utf-8'),
  log: line => console.log(line),
  error: line => console.error(line)
};

export interface CliOptions {
  command: 'verify' | 'optimize';
  file: string;
  axiomsFile?: string;
  maxIterations?: number;
  timeLimitMs?: number;
  nodeLimit?: number;
  verbose: boolean;
}

export const USAGE = `
Tensor rule verifier and graph optimizer (equality saturation)

Usage:
  tensor-eqsat verify <rules-file> [options]
  tensor-eqsat optimize <term-file> [options]

Options:
  --axioms <file>        Axiom rules (default: built-in tensor axioms)
  --max-iterations <n>   Saturation round budget (default: 30)
  --time-limit <ms>      Wall-clock budget (default: none)
  --node-limit <n>       E-node budget (default: 10000)
  --verbose              Log every saturation round
  --help, -h             Show this help message

Rule file format (one rule per line, # starts a comment):
  name: (ewadd ?x ?y) => (ewadd ?y ?x)
  name: (relu (matmul 0 ?x ?y)) <=> (matmul 2 ?x ?y)
  name: (ewadd ?x ?y) => (ewadd ?y ?x) if (same-shape ?x ?y)

Term file format (one term, names carry shapes as name@d1_d2):
  (matmul 0 (input a@8_16) (weight w@16_4))

Exit status:
  0  finished within budget
  2  a budget ran out; unverified rules are inconclusive
  1  error
`.trim();

/**
 * Parse command-line arguments. Returns a message string on bad usage.
 */
export function parseArgs(args: string[]): CliOptions | 'help' | string {
  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    return 'help';
  }

  const [command, file, ...rest] = args;
  if (command !== 'verify' && command !== 'optimize') {
    return `Unknown command "${command}". Must be: verify or optimize`;
  }
  if (file === undefined || file.startsWith('--')) {
    return `Missing input file for ${command}`;
  }

  const options: CliOptions = { command, file, verbose: false };

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i];

    const value = (): string | undefined => (i + 1 < rest.length ? rest[++i] : undefined);
    const count = (flag: string, allowZero: boolean): number | string => {
      const text = value();
      if (text === undefined) return `Missing value for ${flag}`;
      const n = Number(text);
      if (!Number.isInteger(n) || n < 0 || (!allowZero && n === 0)) {
        return `Invalid value for ${flag}: "${text}"`;
      }
      return n;
    };

    if (arg === '--axioms') {
      const text = value();
      if (text === undefined) return 'Missing value for --axioms';
      options.axiomsFile = text;
    } else if (arg === '--max-iterations') {
      const n = count(arg, true);
      if (typeof n === 'string') return n;
      options.maxIterations = n;
    } else if (arg === '--time-limit') {
      const n = count(arg, false);
      if (typeof n === 'string') return n;
      options.timeLimitMs = n;
    } else if (arg === '--node-limit') {
      const n = count(arg, false);
      if (typeof n === 'string') return n;
      options.nodeLimit = n;
    } else if (arg === '--verbose') {
      options.verbose = true;
    } else {
      return `Unknown option "${arg}"`;
    }
  }

  return options;
}

/**
 * Run the command line, returning the exit status
 */
export function runCli(args: string[], io: CliIO = nodeIO): number {
  const parsed = parseArgs(args);
  if (parsed === 'help') {
    io.log(USAGE);
    return EXIT_OK;
  }
  if (typeof parsed === 'string') {
    io.error(`Error: ${parsed}`);
    io.error(USAGE);
    return EXIT_ERROR;
  }

  try {
    return parsed.command === 'verify'
      ? runVerify(parsed, io)
      : runOptimize(parsed, io);
  } catch (err) {
    io.error(formatError(err, parsed.verbose));
    return EXIT_ERROR;
  }
}

function loadAxioms(options: CliOptions, io: CliIO): readonly Rule<TensorData>[] {
  return options.axiomsFile !== undefined
    ? parseRuleFile(io.readFile(options.axiomsFile))
    : tensorAxioms;
}

function runVerify(options: CliOptions, io: CliIO): number {
  const axioms = loadAxioms(options, io);
  const candidates = parseCandidateFile(io.readFile(options.file));

  const report = verify(axioms, candidates, {
    maxIterations: options.maxIterations,
    timeLimitMs: options.timeLimitMs,
    nodeLimit: options.nodeLimit,
    verbose: options.verbose
  });

  for (const v of report.verdicts) {
    const when = v.round !== undefined ? ` (round ${v.round})` : '';
    io.log(`${v.name}: ${v.verdict}${when}`);
  }

  const verified = report.verdicts.filter(v => v.verdict === 'verified').length;
  const detail = report.exhausted ? ` (${report.exhausted})` : '';
  io.log(`${verified}/${report.verdicts.length} verified after ${report.rounds} rounds: ${report.stopReason}${detail}`);

  if (report.inconclusive) {
    io.log('Budget exhausted: unverified rules are not proven within the budget, not disproven.');
    return EXIT_BUDGET;
  }
  return EXIT_OK;
}

function runOptimize(options: CliOptions, io: CliIO): number {
  const axioms = loadAxioms(options, io);
  const term = parseTerm(parseSExpr(io.readFile(options.file)));

  const result = optimize(term, {
    axioms,
    maxIterations: options.maxIterations,
    timeLimitMs: options.timeLimitMs,
    nodeLimit: options.nodeLimit,
    verbose: options.verbose
  });

  io.log(termToString(result.term));
  io.log(`Cost: ${result.cost} (input ${result.inputCost}, graph ${result.graphCost})`);

  const detail = result.stats.exhausted ? ` (${result.stats.exhausted})` : '';
  io.log(`Stopped after ${result.stats.iterations} rounds: ${result.stats.state}${detail}`);

  return result.stats.state === 'budget-exhausted' ? EXIT_BUDGET : EXIT_OK;
}
