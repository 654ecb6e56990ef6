/**
 * Command-line interface for extracting archives described by a directory file.
 */

import { Command, CommanderError } from 'commander';
import { EXTRACTED_ROOT } from './constants/directory-format.js';
import { ArgumentError, ExtractError } from './errors.js';
import { extractArchive } from './extract.js';
import type { Logger } from './types/logger.js';

export const PROGRAM_NAME = 'zdir-extract';

// Version is set at build time
const version = '0.1.0';

interface CliOptions {
  readonly output: string;
  readonly names?: string;
  readonly dryRun?: boolean;
  readonly verbose?: boolean;
}

interface CliArguments {
  readonly directoryFile: string;
  readonly archiveFiles: readonly [string, ...string[]];
}

/**
 * Usage text printed when the directory file or the archive is missing.
 */
export function usageText(programName: string = PROGRAM_NAME): string {
  return [
    `Usage: ${programName} <ZDIR> <ZZDATA>`,
    `Usage: ${programName} <ZDIR> <ZZDATA0> <ZZDATA1> <ZZDATA2> ...`,
    `Usage: ${programName} <ZDIR> <ZZDATA{0..3}> ...`,
  ].join('\n');
}

function parseArguments(directoryFile: string | undefined, archiveFiles: readonly string[]): CliArguments {
  if (directoryFile === undefined || archiveFiles.length === 0) {
    throw new ArgumentError('A directory file and at least one archive file are required');
  }
  const [archiveFile, ...rest] = archiveFiles;
  return { directoryFile, archiveFiles: [archiveFile, ...rest] };
}

/**
 * Runs the CLI against user arguments (without the node and script entries).
 *
 * @param args - Command-line arguments
 * @param logger - Receives standard output lines through `log` and errors through `error`
 * @returns Process exit status
 */
export async function runCli(args: readonly string[], logger: Logger = console): Promise<number> {
  let exitCode = 0;

  const program = new Command()
    .name(PROGRAM_NAME)
    .description('Extract the files packed in a game archive using its directory file')
    .version(version)
    .argument('[directory-file]', 'Directory file listing the packed entries')
    .argument('[archive-files...]', 'Data archive files (only the first is read)')
    .option('-o, --output <dir>', 'Root directory for extracted files', EXTRACTED_ROOT)
    .option('-n, --names <file>', 'Name list used to restore original paths (defaults to the bundled list)')
    .option('--dry-run', 'Print output paths without extracting anything')
    .option('--verbose', 'Print diagnostics to standard error')
    .exitOverride()
    .configureOutput({
      writeOut: (text: string) => logger.log(text.trimEnd()),
      writeErr: (text: string) => logger.error(text.trimEnd()),
    })
    .action(async (directoryFile: string | undefined, archiveFiles: string[] | undefined, options: CliOptions) => {
      let cliArguments: CliArguments;
      try {
        cliArguments = parseArguments(directoryFile, archiveFiles ?? []);
      } catch (error) {
        if (error instanceof ArgumentError) {
          logger.log(usageText());
          exitCode = 1;
          return;
        }
        throw error;
      }

      try {
        await extractArchive({
          directoryFile: cliArguments.directoryFile,
          archiveFiles: cliArguments.archiveFiles,
          outputRoot: options.output,
          namesFile: options.names,
          dryRun: options.dryRun,
          verbose: options.verbose,
          logger,
        });
      } catch (error) {
        if (!(error instanceof ExtractError)) {
          throw error;
        }
        logger.error(`Error: ${error.message}`);
        exitCode = 1;
      }
    });

  try {
    await program.parseAsync([...args], { from: 'user' });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  }
  return exitCode;
}
