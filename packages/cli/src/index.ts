#!/usr/bin/env node

// CLI entry point
// - Command name: `schema-rules` with subcommand `generate`.
// - `generate` reads a JSON manifest (types, validators, operations), builds the
//   document for the selected model through the core facades and prints it to
//   stdout. Diagnostics go to stderr.

import { Command } from 'commander';
import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import {
  ConfigError,
  DiagnosticCollector,
  ErrorCode,
  ErrorPresenter,
  buildJsonSchemaDocument,
  buildOpenApiDocument,
  isSchemaRulesError,
  manifestBuildParams,
  parseManifest,
  SchemaRulesError,
} from '@schema-rules/core';
import { printDiagnostics } from './debug.js';
import {
  parseManifestOverrides,
  resolveModel,
  type CliOptions,
} from './flags.js';
import { renderCLIView } from './render.js';

const program = new Command();

program
  .name('schema-rules')
  .description('Reflect validation rules into generated API schemas')
  .version('0.1.0');

program
  .command('generate')
  .description('Build the augmented document described by a manifest')
  .requiredOption('-m, --manifest <file>', 'Manifest file path')
  .option('--model <model>', 'Schema model: openapi|json-schema', 'openapi')
  .option('--naming <policy>', 'Property naming: identity|camel')
  .option(
    '--one-validator-per-type <bool>',
    'Use only the first validator registered for a type'
  )
  .option(
    '--use-references',
    'json-schema model: reference nested types through definitions'
  )
  .option('--debug', 'Print every diagnostic to stderr', false)
  .action(async (options: CliOptions) => {
    await runGenerate(options);
  });

async function readManifest(file: string): Promise<string> {
  try {
    return await readFile(file, 'utf8');
  } catch (error) {
    throw new ConfigError({
      message: `Cannot read manifest "${file}"`,
      context: { setting: 'manifest', value: file },
      cause: error instanceof Error ? error : undefined,
    });
  }
}

export async function runGenerate(options: CliOptions): Promise<void> {
  const model = resolveModel(options.model);
  const overrides = parseManifestOverrides(options);

  const parsed = parseManifest(await readManifest(options.manifest));
  if (parsed.isErr()) throw parsed.error;

  const diagnostics = new DiagnosticCollector();
  const params = {
    ...manifestBuildParams(parsed.value, overrides),
    diagnostics,
  };
  const document =
    model === 'openapi'
      ? buildOpenApiDocument(params)
      : buildJsonSchemaDocument({
          ...params,
          settings: { useReferences: options.useReferences === true },
        });

  process.stdout.write(JSON.stringify(document, null, 2) + '\n');
  printDiagnostics(diagnostics.entries(), options.debug === true);
}

function toSchemaRulesError(err: unknown): SchemaRulesError {
  if (isSchemaRulesError(err)) return err;
  const message = err instanceof Error ? err.message : String(err);
  return new (class extends SchemaRulesError {})({
    message: message || 'Unexpected error',
    errorCode: ErrorCode.INTERNAL_ERROR,
    cause: err instanceof Error ? err : undefined,
  });
}

function handleCliError(err: unknown): void {
  const env = process.env.NODE_ENV === 'production' ? 'prod' : 'dev';
  const presenter = new ErrorPresenter(env, { colors: true });
  const error = toSchemaRulesError(err);

  console.error(renderCLIView(presenter.formatForCLI(error)));
  process.exitCode = error.getExitCode();
}

export async function main(argv: string[] = process.argv): Promise<void> {
  await program.parseAsync(argv).catch(handleCliError);
}

export { program };

const entryFile =
  typeof process.argv[1] === 'string' ? fs.realpathSync(process.argv[1]) : '';
const moduleFile = fileURLToPath(import.meta.url);
const isDirectExecution = entryFile === moduleFile;

if (isDirectExecution) {
  await main();
}
