#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';

import { parseBatchCsv } from '../batch/csvBatchParser';
import { exportCapabilitiesCsv } from '../batch/exportService';
import { buildCsvTemplate } from '../batch/templates';
import { loadAppConfig } from '../config/appConfig';
import type { ReadinessRepository } from '../readiness/ReadinessRepository';
import { openReadinessRepository } from '../readiness/RepositoryStore';
import {
  consoleOutput,
  runBatchFile,
  writeOutputFile,
  type CliOutput,
  type ExitCode,
} from './batchCli';

export const DEFAULT_CSV_EXPORT = 'current_capabilities.csv';
export const DEFAULT_CSV_TEMPLATE = 'capability_updates_template.csv';

export const runCsvUpdate = (
  repository: ReadinessRepository,
  file: string,
  output: CliOutput = consoleOutput,
  now?: () => Date,
): ExitCode => runBatchFile({ repository, file, parse: parseBatchCsv, output, now });

export const runCsvExport = (
  repository: ReadinessRepository,
  file: string = DEFAULT_CSV_EXPORT,
  output: CliOutput = consoleOutput,
): ExitCode => writeOutputFile(file, exportCapabilitiesCsv(repository), 'Export', output);

export const runCsvTemplate = (
  file: string = DEFAULT_CSV_TEMPLATE,
  output: CliOutput = consoleOutput,
): ExitCode => writeOutputFile(file, buildCsvTemplate(), 'Template', output);

export function createCsvProgram(deps: {
  openRepository: () => ReadinessRepository;
  output?: CliOutput;
  onExit: (code: ExitCode) => void;
}): Command {
  const output = deps.output ?? consoleOutput;
  const program = new Command();

  program
    .name('trl-update-csv')
    .description('Apply capability due date and target TRL updates from a CSV file')
    .argument('[file]', 'CSV file to apply')
    .option('--template [file]', 'Write a CSV template', false)
    .option('--export [file]', 'Export current capabilities with their average TRL', false)
    .action(
      (
        file: string | undefined,
        options: { template?: string | boolean; export?: string | boolean },
      ) => {
        if (options.template) {
          const target =
            typeof options.template === 'string' ? options.template : DEFAULT_CSV_TEMPLATE;
          deps.onExit(runCsvTemplate(target, output));
          return;
        }
        if (!options.export && !file) {
          program.outputHelp();
          deps.onExit(1);
          return;
        }

        const repository = deps.openRepository();
        try {
          if (options.export) {
            const target =
              typeof options.export === 'string' ? options.export : DEFAULT_CSV_EXPORT;
            deps.onExit(runCsvExport(repository, target, output));
          } else {
            deps.onExit(runCsvUpdate(repository, file ?? '', output));
          }
        } finally {
          repository.close();
        }
      },
    );

  return program;
}

if (require.main === module) {
  createCsvProgram({
    openRepository: () => openReadinessRepository(loadAppConfig().databasePath),
    onExit: (code) => {
      process.exitCode = code;
    },
  }).parse(process.argv);
}
