#!/usr/bin/env node
import 'dotenv/config';
import { Command } from 'commander';

import { exportBatchDocument } from '../batch/exportService';
import { parseBatchJson } from '../batch/operationParser';
import { buildJsonTemplate } from '../batch/templates';
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

export const DEFAULT_JSON_EXPORT = 'current_data.json';
export const DEFAULT_JSON_TEMPLATE = 'batch_template.json';

const toJson = (value: unknown) => `${JSON.stringify(value, null, 2)}\n`;

export function runJsonUpdate(
  repository: ReadinessRepository,
  file: string,
  output: CliOutput = consoleOutput,
  now?: () => Date,
): ExitCode {
  return runBatchFile({ repository, file, parse: parseBatchJson, output, now });
}

export function runJsonExport(
  repository: ReadinessRepository,
  file: string = DEFAULT_JSON_EXPORT,
  output: CliOutput = consoleOutput,
  now = new Date(),
): ExitCode {
  return writeOutputFile(file, toJson(exportBatchDocument(repository, now)), 'Export', output);
}

export function runJsonTemplate(
  file: string = DEFAULT_JSON_TEMPLATE,
  output: CliOutput = consoleOutput,
  now = new Date(),
): ExitCode {
  return writeOutputFile(file, toJson(buildJsonTemplate(now)), 'Template', output);
}

type ProgramOptions = {
  template?: string | boolean;
  export?: string | boolean;
};

export function createJsonProgram(deps: {
  openRepository: () => ReadinessRepository;
  output?: CliOutput;
  onExit: (code: ExitCode) => void;
}): Command {
  const output = deps.output ?? consoleOutput;
  const program = new Command();

  program
    .name('trl-update-json')
    .description('Apply a JSON batch of readiness changes')
    .argument('[file]', 'JSON batch file to apply')
    .option('--template [file]', 'Write an example batch file', false)
    .option('--export [file]', 'Export the current database as a batch file', false)
    .action((file: string | undefined, options: ProgramOptions) => {
      if (options.template) {
        deps.onExit(
          runJsonTemplate(
            typeof options.template === 'string' ? options.template : DEFAULT_JSON_TEMPLATE,
            output,
          ),
        );
        return;
      }
      if (!options.export && !file) {
        program.outputHelp();
        deps.onExit(1);
        return;
      }

      const repository = deps.openRepository();
      try {
        deps.onExit(
          options.export
            ? runJsonExport(
                repository,
                typeof options.export === 'string' ? options.export : DEFAULT_JSON_EXPORT,
                output,
              )
            : runJsonUpdate(repository, file ?? '', output),
        );
      } finally {
        repository.close();
      }
    });

  return program;
}

if (require.main === module) {
  const program = createJsonProgram({
    openRepository: () => openReadinessRepository(loadAppConfig().databasePath),
    onExit: (code) => {
      process.exitCode = code;
    },
  });
  program.parse(process.argv);
}
