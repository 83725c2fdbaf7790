#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { analyze } from './index.js';
import { sampleReportToJson, toJson } from './core/report/toJson.js';
import { sampleReportToText, toText } from './core/report/toText.js';
import { FdGenerator } from './core/sampling/generator.js';
import type { Distribution } from './core/sampling/generator.js';
import { SampleRush, summarizeSamples } from './core/sampling/sampleRush.js';
import type { SampleResult, SampleSummary } from './core/sampling/sampleRush.js';
import type {
  AnalysisResult,
  CoverMode,
  FormatOptions,
  NormalFormLevel,
  OutputFormat,
  SampleReport,
} from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_ISSUES = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_INPUT_ERROR = 3;

const COVER_MODES: readonly CoverMode[] = ['none', 'one', 'all', 'implied'];
const FAIL_ON_LEVELS: readonly NormalFormLevel[] = ['2NF', '3NF', 'BCNF'];
const NORMAL_FORM_RANK: Record<NormalFormLevel, number> = { '1NF': 0, '2NF': 1, '3NF': 2, BCNF: 3 };

const OPTIONS = {
  input: { type: 'string' },
  format: { type: 'string', default: 'json' },
  out: { type: 'string' },
  covers: { type: 'string', default: 'one' },
  'fail-on': { type: 'string' },
  'no-timestamp': { type: 'boolean', default: false },
  pretty: { type: 'boolean', default: false },
  'findings-only': { type: 'boolean', default: false },
  sample: { type: 'string' },
  seconds: { type: 'string', default: '1' },
  samples: { type: 'string' },
  seed: { type: 'string' },
  distribution: { type: 'string', default: 'uniform' },
  probability: { type: 'string', default: '0.5' },
  verbose: { type: 'boolean', default: false },
  help: { type: 'boolean', default: false },
} as const;

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({ args: argv, options: OPTIONS, strict: true });
}

type CliArgs = ReturnType<typeof parseCliArgs>;

function printUsage(): void {
  process.stdout.write(
    `Usage: fd-normalizer [options]

Options:
  --input <path>          Path to relations file (JSON) (default: relations.json)
  --format <fmt>          Output format: json | text (default: json)
  --out <path>            Write output to file instead of stdout
  --covers <mode>         Minimal covers to compute: none | one | all | implied (default: one)
  --fail-on <form>        Exit 1 if a relation is below this normal form: 2NF | 3NF | BCNF
  --no-timestamp          Omit timestamp from output
  --pretty                Pretty-print JSON output
  --findings-only         Omit relation reports from output (show only findings + metadata)
  --help                  Show this help message

Sampling:
  --sample <n>            Classify random dependency sets over n attributes instead of reading a file
  --seconds <s>           Wall-clock budget in seconds (default: 1)
  --samples <count>       Stop after this many samples
  --seed <int>            Seed for the random generator
  --distribution <kind>   Attribute set distribution: uniform | realistic | binomial (default: uniform)
  --probability <p>       Inclusion probability for the binomial distribution (default: 0.5)
  --verbose               Print one line per sample to stderr
`,
  );
}

export function main(argv?: string[]): number {
  let args: CliArgs;

  try {
    args = parseCliArgs(argv);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : 'Invalid arguments';
    process.stderr.write(`Error: ${detail}. Use --help for usage.\n`);
    return EXIT_CLI_ERROR;
  }

  if (args.values.help === true) {
    printUsage();
    return EXIT_OK;
  }

  // Validate format
  const format = args.values.format ?? 'json';
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(
      `Error: Invalid format "${format}". Must be "json" or "text".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;
  const pretty = args.values.pretty === true;

  if (args.values.sample !== undefined) {
    return runSampling(args, outputFormat, pretty);
  }

  // Validate covers
  const covers = COVER_MODES.find((mode) => mode === (args.values.covers ?? 'one'));
  if (covers === undefined) {
    process.stderr.write(
      `Error: Invalid --covers value "${args.values.covers ?? ''}". Must be one of: ${COVER_MODES.join(', ')}.\n`,
    );
    return EXIT_CLI_ERROR;
  }

  // Validate fail-on
  const failOnArg = args.values['fail-on'];
  const failOn = FAIL_ON_LEVELS.find((level) => level === failOnArg);
  if (failOnArg !== undefined && failOn === undefined) {
    process.stderr.write(
      `Error: Invalid --fail-on value "${failOnArg}". Must be "2NF", "3NF", or "BCNF".\n`,
    );
    return EXIT_CLI_ERROR;
  }

  // Resolve input path
  const inputPath = resolve(args.values.input ?? 'relations.json');
  if (!existsSync(inputPath)) {
    process.stderr.write(`Error: Relations file not found: ${inputPath}\n`);
    return EXIT_CLI_ERROR;
  }

  const noTimestamp = args.values['no-timestamp'] === true;
  const formatOptions: FormatOptions = { findingsOnly: args.values['findings-only'] === true };

  // Run analysis
  let result: AnalysisResult;
  try {
    result = analyze({ inputPath, covers, noTimestamp });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : '';
    process.stderr.write(`Error: Failed to read relations.${detail !== '' ? ` ${detail}` : ''}\n`);
    return EXIT_INPUT_ERROR;
  }

  // Format output
  const output =
    outputFormat === 'json' ? toJson(result, pretty, formatOptions) : toText(result, formatOptions);
  writeOutput(output, args.values.out);

  // Check fail-on threshold
  if (failOn !== undefined) {
    const threshold = NORMAL_FORM_RANK[failOn];
    const hasFailure = result.relations.some(
      (relation) => NORMAL_FORM_RANK[relation.highestNormalForm] < threshold,
    );
    if (hasFailure) {
      return EXIT_ISSUES;
    }
  }

  return EXIT_OK;
}

function runSampling(args: CliArgs, format: OutputFormat, pretty: boolean): number {
  const attributeCount = parseInteger(args.values.sample);
  if (attributeCount === null || attributeCount < 0) {
    process.stderr.write(`Error: Invalid --sample value "${args.values.sample ?? ''}". Must be a non-negative integer.\n`);
    return EXIT_CLI_ERROR;
  }

  const seconds = Number(args.values.seconds ?? '1');
  if (!Number.isFinite(seconds) || seconds <= 0) {
    process.stderr.write(`Error: Invalid --seconds value "${args.values.seconds ?? ''}". Must be a positive number.\n`);
    return EXIT_CLI_ERROR;
  }

  const maxSamples = args.values.samples === undefined ? undefined : parseInteger(args.values.samples);
  if (maxSamples === null || (maxSamples !== undefined && maxSamples < 1)) {
    process.stderr.write(`Error: Invalid --samples value "${args.values.samples ?? ''}". Must be a positive integer.\n`);
    return EXIT_CLI_ERROR;
  }

  const seed = args.values.seed === undefined ? undefined : parseInteger(args.values.seed);
  if (seed === null) {
    process.stderr.write(`Error: Invalid --seed value "${args.values.seed ?? ''}". Must be an integer.\n`);
    return EXIT_CLI_ERROR;
  }

  const distribution = resolveDistributionArg(args.values.distribution ?? 'uniform', args.values.probability ?? '0.5');
  if (typeof distribution === 'string') {
    process.stderr.write(`Error: ${distribution}\n`);
    return EXIT_CLI_ERROR;
  }

  const verbose = args.values.verbose === true;
  let summary: SampleSummary;
  try {
    const generator = new FdGenerator(attributeCount, {
      lhs: distribution,
      rhs: distribution,
      ...(seed !== undefined ? { seed } : {}),
    });
    const rush = new SampleRush(attributeCount, { generator, ...(seed !== undefined ? { seed } : {}) });
    const results = rush.run({
      budgetMs: seconds * 1000,
      ...(maxSamples !== undefined ? { maxSamples } : {}),
      ...(verbose ? { onSample: writeSampleLine } : {}),
    });
    summary = summarizeSamples(results);
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : '';
    process.stderr.write(`Error: Sampling failed.${detail !== '' ? ` ${detail}` : ''}\n`);
    return EXIT_INPUT_ERROR;
  }

  const report: SampleReport = { attributeCount, distribution: distribution.kind, summary };
  const output = format === 'json' ? sampleReportToJson(report, pretty) : sampleReportToText(report);
  writeOutput(output, args.values.out);
  return EXIT_OK;
}

function resolveDistributionArg(kind: string, probability: string): Distribution | string {
  switch (kind) {
    case 'uniform':
      return { kind: 'uniform' };
    case 'realistic':
      return { kind: 'realistic' };
    case 'binomial': {
      const p = Number(probability);
      if (!Number.isFinite(p) || p < 0 || p > 1) {
        return `Invalid --probability value "${probability}". Must be between 0 and 1.`;
      }
      return { kind: 'binomial', p };
    }
    default:
      return `Invalid --distribution value "${kind}". Must be "uniform", "realistic", or "binomial".`;
  }
}

function writeSampleLine(result: SampleResult): void {
  const flag = (value: boolean): string => (value ? 'yes' : 'no');
  process.stderr.write(
    `Sample #${String(result.index)}: ${String(result.dependencies.length)} FDs, BCNF=${flag(result.bcnf)} 3NF=${flag(result.thirdNf)} 2NF=${flag(result.secondNf)} (${result.elapsedMs.toFixed(3)} ms)\n`,
  );
}

function writeOutput(output: string, outPath: string | undefined): void {
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }
}

function parseInteger(value: string | undefined): number | null {
  if (value === undefined || !/^-?\d+$/.test(value)) {
    return null;
  }
  return Number(value);
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  try {
    process.exitCode = main();
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : String(error);
    process.stderr.write(`Error: ${detail}\n`);
    process.exitCode = EXIT_INPUT_ERROR;
  }
}
