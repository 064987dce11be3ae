import { Command, CommanderError } from 'commander';
import pc from 'picocolors';

import { loadConfig } from './config';
import { QuarryError } from './errors';
import { Logger } from './logger';
import { transcodeFile } from './transcoder';

export function formatError(err: unknown): string {
  if (err instanceof QuarryError) return err.describe();
  if (err instanceof Error) return err.message;
  return String(err);
}

/**
 * `quarry <schema> <input> <output>`: three positional arguments, no flags.
 * Logging, batching and error policy come from QUARRY_* environment variables.
 */
export function createProgram(env: Record<string, string | undefined> = process.env): Command {
  const program = new Command();

  program
    .name('quarry')
    .description('Transcode newline-delimited JSON into a schema-typed binary record container')
    .argument('<schema>', 'path to the record schema (JSON)')
    .argument('<input>', 'path to the newline-delimited JSON input')
    .argument('<output>', 'path of the container to write (replaced if present)')
    .action(async (schemaPath: string, inputPath: string, outputPath: string) => {
      const config = loadConfig(env);
      const logger = new Logger({ level: config.logLevel, format: config.logFormat });

      const stats = await transcodeFile(
        { schemaPath, inputPath, outputPath },
        { logger, recordsPerBlock: config.recordsPerBlock, onError: config.onError },
      );
      logger.info('transcode complete', { ...stats });
    });

  return program;
}

/** Parse argv and run. Resolves to the process exit code. */
export async function run(argv: readonly string[], env: Record<string, string | undefined> = process.env): Promise<number> {
  const program = createProgram(env);
  program.exitOverride();

  try {
    await program.parseAsync([...argv]);
    return 0;
  } catch (err) {
    // Usage errors and --help are already reported by commander.
    if (err instanceof CommanderError) return err.exitCode;
    console.error(pc.red(`Error: ${formatError(err)}`));
    return 1;
  }
}
