import fs from 'node:fs';

import type { BatchDocumentResult } from '../batch/operationParser';
import type { BatchReport } from '../batch/batch.types';
import { BatchUpdateEngine } from '../batch/BatchUpdateEngine';
import type { ReadinessRepository } from '../readiness/ReadinessRepository';
import { asDomainError } from '../reliability/DomainError';

export type CliOutput = {
  out: (line: string) => void;
  err: (line: string) => void;
};

export const consoleOutput: CliOutput = {
  // eslint-disable-next-line no-console
  out: (line) => console.log(line),
  // eslint-disable-next-line no-console
  err: (line) => console.error(line),
};

export type ExitCode = 0 | 1;

/** Summary first, then each warning and error on its own line. */
export function formatReport(report: BatchReport): string[] {
  const lines = [...report.summary];
  const warnings = report.issues.filter((i) => i.severity === 'warning');
  const errors = report.issues.filter((i) => i.severity === 'error');
  if (warnings.length > 0) {
    lines.push('Warnings:');
    for (const issue of warnings) lines.push(`  ${issue.label}: ${issue.message}`);
  }
  if (errors.length > 0) {
    lines.push('Errors:');
    for (const issue of errors) lines.push(`  ${issue.label}: ${issue.message}`);
  }
  return lines;
}

/**
 * Reads, parses and applies one batch file. Unreadable files, structural
 * parse failures and rolled-back batches exit with 1.
 */
export function runBatchFile(args: {
  repository: ReadinessRepository;
  file: string;
  parse: (content: string) => BatchDocumentResult;
  output: CliOutput;
  now?: () => Date;
}): ExitCode {
  const { output } = args;
  let content: string;
  try {
    content = fs.readFileSync(args.file, 'utf-8');
  } catch (err) {
    output.err(`Error: cannot read ${args.file}: ${asDomainError(err).message}`);
    return 1;
  }

  const parsed = args.parse(content);
  if (!parsed.ok) {
    output.err(`Error: ${parsed.message}`);
    return 1;
  }

  output.out(`Processing ${args.file}...`);
  const report = new BatchUpdateEngine(args.repository, { now: args.now }).apply(
    parsed.batch,
  );
  for (const line of formatReport(report)) {
    if (report.fatal) output.err(line);
    else output.out(line);
  }
  return report.exitCode;
}

export function writeOutputFile(
  file: string,
  content: string,
  description: string,
  output: CliOutput,
): ExitCode {
  try {
    fs.writeFileSync(file, content, 'utf-8');
  } catch (err) {
    output.err(`Error: cannot write ${file}: ${asDomainError(err).message}`);
    return 1;
  }
  output.out(`${description} written to ${file}`);
  return 0;
}
