#!/usr/bin/env node

import { parseArgs } from 'node:util';
import { resolve } from 'node:path';
import { existsSync, writeFileSync } from 'node:fs';
import { fileURLToPath } from 'node:url';
import { analyze } from './index.js';
import { toJson } from './core/report/toJson.js';
import { toText } from './core/report/toText.js';
import type { AnalysisResult, OutputFormat, FormatOptions, Severity } from './core/report/reportTypes.js';

/** Exit codes. */
const EXIT_OK = 0;
const EXIT_ISSUES = 1;
const EXIT_CLI_ERROR = 2;
const EXIT_PARSE_ERROR = 3;

const SEVERITY_ORDER: Record<Severity, number> = { info: 0, warning: 1, error: 2 };

function printUsage(): void {
  process.stdout.write(
    `Usage: fd-normalizer [options]

Options:
  --relations <path>    Path to relations file (JSON), required
  --closure <attrs>     Report the closure of a comma-separated attribute list (repeatable)
  --format <fmt>        Output format: json | text (default: json)
  --out <path>          Write output to file instead of stdout
  --fail-on <severity>  Exit 1 if findings at this severity or above: error | warning | info
  --no-timestamp        Omit timestamp from output
  --pretty              Pretty-print JSON output
  --findings-only       Omit relation detail from output (show only findings + metadata)
  --trace               Write closure computation steps to stderr
  --help                Show this help message
`,
  );
}

function parseCliArgs(argv: string[] | undefined) {
  return parseArgs({
    args: argv,
    options: {
      relations: { type: 'string' },
      closure: { type: 'string', multiple: true },
      format: { type: 'string', default: 'json' },
      out: { type: 'string' },
      'fail-on': { type: 'string' },
      'no-timestamp': { type: 'boolean', default: false },
      pretty: { type: 'boolean', default: false },
      'findings-only': { type: 'boolean', default: false },
      trace: { type: 'boolean', default: false },
      help: { type: 'boolean', default: false },
    },
    strict: true,
  });
}

function isSeverity(value: string): value is Severity {
  return value === 'error' || value === 'warning' || value === 'info';
}

function splitAttributeList(text: string): string[] {
  return text
    .split(',')
    .map((attr) => attr.trim())
    .filter((attr) => attr.length > 0);
}

export async function main(argv?: string[]): Promise<number> {
  let args: ReturnType<typeof parseCliArgs>;

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

  if (args.values.relations === undefined) {
    process.stderr.write('Error: --relations is required. Use --help for usage.\n');
    return EXIT_CLI_ERROR;
  }

  const relationPath = resolve(args.values.relations);
  if (!existsSync(relationPath)) {
    process.stderr.write(`Error: Relations file not found: ${relationPath}\n`);
    return EXIT_CLI_ERROR;
  }

  // Validate format
  const format = args.values.format;
  if (format !== 'json' && format !== 'text') {
    process.stderr.write(
      `Error: Invalid format "${format}". Must be "json" or "text".\n`,
    );
    return EXIT_CLI_ERROR;
  }
  const outputFormat: OutputFormat = format;

  // Validate fail-on
  const failOnArg = args.values['fail-on'];
  let failOn: Severity | undefined;
  if (failOnArg !== undefined) {
    if (!isSeverity(failOnArg)) {
      process.stderr.write(
        `Error: Invalid --fail-on value "${failOnArg}". Must be "error", "warning", or "info".\n`,
      );
      return EXIT_CLI_ERROR;
    }
    failOn = failOnArg;
  }

  const closures = (args.values.closure ?? []).map(splitAttributeList);
  if (closures.some((attrs) => attrs.length === 0)) {
    process.stderr.write('Error: --closure needs at least one attribute name.\n');
    return EXIT_CLI_ERROR;
  }

  const formatOptions: FormatOptions = { findingsOnly: args.values['findings-only'] === true };
  const onTrace = args.values.trace === true
    ? (line: string): void => {
        process.stderr.write(`trace: ${line}\n`);
      }
    : undefined;

  // Run analysis
  let result: AnalysisResult;
  try {
    result = analyze({
      relationPath,
      closures,
      noTimestamp: args.values['no-timestamp'] === true,
      onTrace,
    });
  } catch (error: unknown) {
    const detail = error instanceof Error ? error.message : '';
    process.stderr.write(`Error: Failed to analyze relations.${detail !== '' ? ` ${detail}` : ''}\n`);
    return EXIT_PARSE_ERROR;
  }

  // Format output
  const output =
    outputFormat === 'json'
      ? toJson(result, args.values.pretty === true, formatOptions)
      : toText(result, formatOptions);

  // Write output
  const outPath = args.values.out;
  if (outPath !== undefined) {
    writeFileSync(resolve(outPath), output, 'utf-8');
  } else {
    process.stdout.write(output);
    process.stdout.write('\n');
  }

  // Check fail-on threshold
  if (failOn !== undefined) {
    const threshold = SEVERITY_ORDER[failOn];
    const hasFailure = result.findings.some(
      (f) => SEVERITY_ORDER[f.severity] >= threshold,
    );
    if (hasFailure) {
      return EXIT_ISSUES;
    }
  }

  return EXIT_OK;
}

if (process.argv[1] !== undefined && resolve(process.argv[1]) === fileURLToPath(import.meta.url)) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch(() => {
      process.exitCode = EXIT_PARSE_ERROR;
    });
}
