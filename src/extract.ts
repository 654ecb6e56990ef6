/**
 * Extraction orchestrator - restores every file listed in a directory file from its archive.
 *
 * Records are processed one at a time in directory order. The first failure aborts the run;
 * files written before it are left in place.
 */

import { extractSlice } from './archive-slice.js';
import { EXTRACTED_ROOT } from './constants/directory-format.js';
import { DirectoryBinary, toArchiveByteOffset } from './directory-binary.js';
import { ExtractError } from './errors.js';
import { readNameCatalog } from './name-catalog.js';
import { resolveOutputPath } from './output-path.js';
import type { CanonicalDirectoryRecord, DirectoryLayout } from './types/directory-record.js';
import type { Logger } from './types/logger.js';
import type { NameCatalog } from './types/name-catalog.js';

export interface ExtractOptions {
  /** Directory file listing the packed entries. */
  readonly directoryFile: string;
  /** Data archives. Only the first is read; the rest are accepted and ignored. */
  readonly archiveFiles: readonly [string, ...string[]];
  /** Root of the restored tree. Defaults to `EXTRACTED`. */
  readonly outputRoot?: string;
  /** Prebuilt catalog. Takes precedence over `namesFile`. */
  readonly catalog?: NameCatalog;
  /** Name list to build the catalog from. Defaults to the bundled list. */
  readonly namesFile?: string;
  /** Report output paths without writing anything. */
  readonly dryRun?: boolean;
  /** Write diagnostics through `logger.error`. */
  readonly verbose?: boolean;
  readonly logger?: Logger;
}

export interface ExtractSummary {
  readonly recordCount: number;
  readonly knownCount: number;
  readonly unknownCount: number;
  /** Output paths in record order. */
  readonly outputPaths: readonly string[];
}

async function loadRecords(directoryFile: string): Promise<CanonicalDirectoryRecord[]> {
  try {
    return await DirectoryBinary.read({ filePath: directoryFile });
  } catch (error) {
    throw new ExtractError('failed to load headers', error);
  }
}

async function loadCatalog(options: ExtractOptions): Promise<NameCatalog> {
  if (options.catalog) {
    return options.catalog;
  }
  try {
    return await readNameCatalog(options.namesFile);
  } catch (error) {
    throw new ExtractError('failed to load name list', error);
  }
}

/**
 * Extracts every record of a directory file from its archive.
 *
 * Each output path is passed to `logger.log` as soon as its file has been written.
 *
 * @param options - Input files, output root and reporting options
 * @returns Summary of the extracted records
 * @throws ExtractError on the first load or extraction failure; its context is the
 *   load phase or the output path of the failing record
 */
export async function extractArchive(options: ExtractOptions): Promise<ExtractSummary> {
  const logger: Logger = options.logger ?? console;
  const root: string = options.outputRoot ?? EXTRACTED_ROOT;
  const [archiveFile, ...ignoredArchives] = options.archiveFiles;

  const records: CanonicalDirectoryRecord[] = await loadRecords(options.directoryFile);
  const catalog: NameCatalog = await loadCatalog(options);

  if (options.verbose) {
    let layout: DirectoryLayout;
    try {
      layout = await DirectoryBinary.detect({ filePath: options.directoryFile });
    } catch (error) {
      throw new ExtractError('failed to load headers', error);
    }
    logger.error(`Directory ${options.directoryFile}: ${records.length} records (size matches ${layout} layout, reading canonical)`);
    logger.error(`Name catalog: ${catalog.size} entries`);
    for (const ignored of ignoredArchives) {
      logger.error(`Ignoring additional archive ${ignored}`);
    }
  }

  const outputPaths: string[] = [];
  let knownCount = 0;

  for (const record of records) {
    const outputPath: string = resolveOutputPath(record, catalog, root);
    if (catalog.has(record.nameHash)) {
      knownCount++;
    }

    if (!options.dryRun) {
      try {
        await extractSlice({
          archivePath: archiveFile,
          outputPath,
          offset: toArchiveByteOffset(record.localOffset),
          length: record.size,
        });
      } catch (error) {
        throw new ExtractError(outputPath, error);
      }
    }

    outputPaths.push(outputPath);
    logger.log(outputPath);
  }

  return {
    recordCount: records.length,
    knownCount,
    unknownCount: records.length - knownCount,
    outputPaths,
  };
}
