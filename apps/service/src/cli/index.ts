import { Command, InvalidArgumentError } from 'commander';

import type { ContactExtractionService } from '../extraction/service.js';
import { createServer } from '../http/server.js';

export const DEFAULT_CONFIG_PATH = 'ngos.yaml';

const parsePort = (value: string): number => {
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65_535) {
    throw new InvalidArgumentError(`Invalid port: ${value}`);
  }
  return port;
};

export interface CreateCliOptions {
  readonly service: ContactExtractionService;
  readonly port?: number;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const service = options.service;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('ngo-contacts').description('Extract NGO contact records from their websites');

  program
    .command('scrape')
    .argument('[config]', 'Path to the organization config (.yaml, .yml or .json)', DEFAULT_CONFIG_PATH)
    .description('Build one contact record per organization and write the CSV report')
    .option('--out <dir>', 'Directory the report is written to')
    .option('--continue-on-error', 'Skip organizations that fail instead of halting', false)
    .action(
      handle(async (configPath: string, command: { out?: string; continueOnError?: boolean }) => {
        const result = await service.run({
          configPath,
          outputDirectory: command.out,
          continueOnError: command.continueOnError ?? false
        });
        writeJson({
          organizations: result.organizations,
          rows: result.records.length,
          outputPath: result.outputPath,
          failures: result.failures
        });
      })
    );

  program
    .command('validate <config>')
    .description('Load and compile a config without fetching any page')
    .action(
      handle(async (configPath: string) => {
        const organizations = await service.loadConfig(configPath);
        writeJson({
          organizations: [...organizations.values()].map((config) => ({
            id: config.id,
            contactPages: config.contactPages.length
          }))
        });
      })
    );

  program
    .command('serve')
    .description('Start the HTTP API')
    .option('--port <port>', 'Port to listen on', parsePort)
    .action(
      handle(async (command: { port?: number }) => {
        const app = createServer({ service });
        const address = await app.listen({ port: command.port ?? options.port ?? 3000, host: '0.0.0.0' });
        stderr.write(`Listening on ${address}\n`);
      })
    );

  return program;
};
