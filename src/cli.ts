#!/usr/bin/env node
import { readFile } from 'fs/promises';
import { Command, CommanderError } from 'commander';
import { loadConfig, requireBase } from './config';
import { formatReport, formatSummary } from './diagnostics';
import { decodeBuffer } from './file';
import { createLogger } from './logger';
import { parseAbc } from './parser';
import { extractFeatures, getTitle } from './query';
import { serializeAll } from './serializer';
import { loadCacheFile, saveCacheFile, scanDirectory } from './storage';

export const VERSION = '0.1.0';

export interface CliOptions {
  stdin?: NodeJS.ReadableStream;
  stdout?: NodeJS.WritableStream;
  stderr?: NodeJS.WritableStream;
  env?: NodeJS.ProcessEnv;
}

interface GlobalOptions {
  base?: string;
  logLevel?: string;
  pretty: string;
}

async function readStream(stream: NodeJS.ReadableStream): Promise<Buffer> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk, 'utf-8') : chunk);
  }
  return Buffer.concat(chunks);
}

/**
 * Run the command line with `args` (without the node and script entries).
 * Resolves to the process exit code; never rejects.
 */
export async function run(args: string[], options: CliOptions = {}): Promise<number> {
  const stdin = options.stdin ?? process.stdin;
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const env = options.env ?? process.env;
  let exitCode = 0;

  const readSource = async (file: string | undefined): Promise<string> =>
    decodeBuffer(file ? await readFile(file) : await readStream(stdin));

  const program = new Command();

  program
    .name('abc-tunes')
    .version(VERSION)
    .description('Check, clean up and index ABC tunes')
    .option('--base <path>', 'Base directory of the tune collection (overrides BASE)')
    .option('--log-level <level>', 'debug, info, warn, error or silent (overrides LOG_LEVEL)')
    .option('-p, --pretty <n>', 'Pretty-print JSON output with <n> spaces', '2')
    .exitOverride()
    .configureOutput({
      writeOut: text => stdout.write(text),
      writeErr: text => stderr.write(text),
    });

  program
    .command('check [file]')
    .description('Report every error in an ABC file (default: stdin)')
    .action(async (file: string | undefined) => {
      const source = await readSource(file);
      const { diagnostics } = parseAbc(source);
      if (diagnostics.length > 0) {
        stderr.write(formatReport(source, diagnostics));
        exitCode = 1;
      }
    });

  program
    .command('cleanup [file]')
    .description('Print the canonical form of every tune that could be read')
    .action(async (file: string | undefined) => {
      const { tunes, diagnostics } = parseAbc(await readSource(file));
      stdout.write(serializeAll(tunes));
      if (diagnostics.length > 0) {
        stderr.write(`${formatSummary(diagnostics.length)}\n`);
      }
    });

  program
    .command('features [file]')
    .description('Print key, metre and rhythm features of each tune as JSON')
    .action(async (file: string | undefined) => {
      const { pretty } = program.opts<GlobalOptions>();
      const { tunes } = parseAbc(await readSource(file));
      const report = tunes.map(tune => ({
        referenceNumber: tune.referenceNumber ?? null,
        title: getTitle(tune) ?? null,
        features: extractFeatures(tune),
      }));
      stdout.write(`${JSON.stringify(report, null, Number(pretty) || 0)}\n`);
    });

  program
    .command('scan')
    .description('Add new tunes under the base directory to the tune cache')
    .action(async () => {
      const globals = program.opts<GlobalOptions>();
      const config = loadConfig(env, { base: globals.base, logLevel: globals.logLevel });
      const { base, cacheFile } = requireBase(config);
      const logger = createLogger({ level: config.logLevel, stream: stderr });

      logger.info('Start scan...');
      const cache = await loadCacheFile(cacheFile, { maxId: config.debugMaxId, logger });
      const result = await scanDirectory(cache, base, { logger });
      logger.info(`Scanned ${result.scanned} tunes, indexed ${result.indexed}`);
      await saveCacheFile(cache, cacheFile, { logger });
    });

  try {
    await program.parseAsync(args, { from: 'user' });
    return exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    stderr.write(`${error instanceof Error ? error.message : String(error)}\n`);
    return 1;
  }
}

if (require.main === module) {
  run(process.argv.slice(2)).then(
    code => {
      process.exitCode = code;
    },
    (error: unknown) => {
      process.stderr.write(`${String(error)}\n`);
      process.exitCode = 1;
    }
  );
}
