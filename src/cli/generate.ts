#!/usr/bin/env node
/**
 * Offline certificate generation.
 *
 *   generate-certificates <participants.json> [--send-email]
 *
 * Reads `{ "participants": [{ "name", "email" }], "sendEmail"?: boolean }`
 * and generates every certificate through the same template, asset storage
 * and record store the server uses, without starting it. Exits 1 when the
 * input is unusable or any participant failed.
 */

import 'dotenv/config';
import { readFile } from 'fs/promises';
import { parseArgs } from 'util';
import { configWarnings, loadConfig } from '../config';
import { CertificateError, isCertificateError, storageNotConfiguredError, validationError } from '../domain/errors';
import { BatchSummary, CertificateGenerator } from '../generation/generator';
import { generationRequestSchema, parsePayload } from '../generation/schemas';
import { Logger, errorContext, logger as rootLogger, setLogLevel } from '../logger';
import { openStore } from '../resources';
import { createAppContext } from '../server';

export const USAGE = 'Usage: generate-certificates <participants.json> [--send-email]';

export interface GenerateOptions {
  file: string;
  sendEmail: boolean;
}

export interface GenerateCommandDeps {
  generator: CertificateGenerator;
  maxBatchSize: number;
  readFile?: (path: string) => Promise<string>;
  logger?: Logger;
}

function readArgs(argv: string[]) {
  return parseArgs({
    args: argv,
    options: { 'send-email': { type: 'boolean', default: false } },
    allowPositionals: true,
  });
}

export function parseGenerateArgs(argv: string[]): GenerateOptions {
  let args: ReturnType<typeof readArgs>;
  try {
    args = readArgs(argv);
  } catch (err) {
    throw new CertificateError(validationError(`${errorMessage(err)}\n${USAGE}`));
  }
  if (args.positionals.length !== 1) {
    throw new CertificateError(validationError(USAGE));
  }
  return { file: args.positionals[0], sendEmail: args.values['send-email'] === true };
}

export async function runGenerateCommand(options: GenerateOptions, deps: GenerateCommandDeps): Promise<BatchSummary> {
  const log = deps.logger ?? rootLogger.child({ module: 'cli' });
  const read = deps.readFile ?? ((path: string) => readFile(path, 'utf8'));

  let raw: string;
  try {
    raw = await read(options.file);
  } catch (err) {
    throw new CertificateError(validationError(`Cannot read participants file ${options.file}: ${errorMessage(err)}`));
  }

  let data: unknown;
  try {
    data = JSON.parse(raw);
  } catch (err) {
    throw new CertificateError(validationError(`Participants file ${options.file} is not valid JSON: ${errorMessage(err)}`));
  }

  const request = parsePayload(generationRequestSchema(deps.maxBatchSize), data);
  const summary = await deps.generator.generateBatch(request.participants, {
    sendEmail: options.sendEmail || request.sendEmail,
  });

  for (const result of summary.results) {
    if (result.success) {
      log.info('Certificate ready', { name: result.name, slug: result.slug, url: result.url });
    } else {
      log.warn('Certificate failed', { name: result.name, email: result.email, error: result.error });
    }
  }
  log.info('Generation summary', { total: summary.total, succeeded: summary.succeeded, failed: summary.failed });
  return summary;
}

export async function main(argv: string[] = process.argv.slice(2)): Promise<number> {
  const options = parseGenerateArgs(argv);
  const config = loadConfig();
  setLogLevel(config.logLevel);
  for (const warning of configWarnings(config)) {
    rootLogger.warn(warning);
  }

  const { store, close } = await openStore(config);
  try {
    const context = await createAppContext({ config, store });
    if (!context.generator.ready) {
      throw new CertificateError(storageNotConfiguredError());
    }
    const summary = await runGenerateCommand(options, {
      generator: context.generator,
      maxBatchSize: config.generation.maxBatchSize,
    });
    return summary.failed > 0 ? 1 : 0;
  } finally {
    await close();
  }
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

if (require.main === module) {
  main()
    .then((code) => {
      process.exitCode = code;
    })
    .catch((err: unknown) => {
      rootLogger.error('Generation failed', {
        ...errorContext(err),
        ...(isCertificateError(err) ? { code: err.code, details: err.typedError.details } : {}),
      });
      process.exitCode = 1;
    });
}
