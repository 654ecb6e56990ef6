import * as assert from 'node:assert/strict';
import { promises as fs } from 'node:fs';
import * as path from 'node:path';

import { ExtractError, InvalidFormatError, IoError } from '../errors.js';
import { extractArchive } from '../extract.js';
import { hashName } from '../name-hash.js';
import { parseNameCatalog } from '../name-catalog.js';
import { CapturingLogger, createPatternArchive, createTempDirectory, encodeDirectory, pathExists } from './fixtures.js';

suite('extract', () => {
  let tempDir: string;
  let directoryFile: string;
  let archiveFile: string;
  let outputRoot: string;
  const archive = createPatternArchive(0x2b * 2048);
  const catalog = parseNameCatalog('sound/test.wav\nDATA\\BOOT.BIN\n');

  setup(async () => {
    tempDir = await createTempDirectory();
    directoryFile = path.join(tempDir, 'ZDIR');
    archiveFile = path.join(tempDir, 'ZZDATA');
    outputRoot = path.join(tempDir, 'EXTRACTED');
    await fs.writeFile(archiveFile, archive);
  });

  teardown(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  test('extracts known and unknown records in directory order', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([
      { nameHash: hashName('sound/test.wav'), localOffset: 0, size: 16 },
      { nameHash: 0x12345678, localOffset: 0x2a, size: 32 },
      { nameHash: hashName('DATA\\BOOT.BIN'), localOffset: 1, size: 2048 },
    ]));
    const logger = new CapturingLogger();

    const summary = await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, logger });

    const expectedPaths = [
      path.join(outputRoot, 'sound', 'test.wav'),
      path.join(outputRoot, '__UNKNOWN__', '2A'),
      path.join(outputRoot, 'DATA', 'BOOT.BIN'),
    ];
    assert.deepStrictEqual(logger.lines, expectedPaths);
    assert.deepStrictEqual(summary, { recordCount: 3, knownCount: 2, unknownCount: 1, outputPaths: expectedPaths });
    assert.deepStrictEqual(await fs.readFile(expectedPaths[0]), archive.subarray(0, 16));
    assert.deepStrictEqual(await fs.readFile(expectedPaths[1]), archive.subarray(86016, 86048));
    assert.deepStrictEqual(await fs.readFile(expectedPaths[2]), archive.subarray(2048, 4096));
  });

  test('produces identical output when run twice', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([
      { nameHash: hashName('sound/test.wav'), localOffset: 3, size: 5000 },
    ]));
    const outputPath = path.join(outputRoot, 'sound', 'test.wav');

    await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, logger: new CapturingLogger() });
    const first = await fs.readFile(outputPath);
    await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, logger: new CapturingLogger() });

    assert.deepStrictEqual(await fs.readFile(outputPath), first);
    assert.deepStrictEqual(await fs.readFile(archiveFile), archive);
  });

  test('stops at the first failing record', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([
      { nameHash: 1, localOffset: 0, size: 4 },
      { nameHash: 2, localOffset: 0x2a, size: 4096 },
      { nameHash: 3, localOffset: 2, size: 4 },
    ]));
    const logger = new CapturingLogger();
    const failingPath = path.join(outputRoot, '__UNKNOWN__', '2A');

    await assert.rejects(extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, logger }), (error: unknown) => {
      assert.ok(error instanceof ExtractError);
      assert.strictEqual(error.context, failingPath);
      assert.ok(error.cause instanceof IoError);
      return true;
    });
    assert.deepStrictEqual(logger.lines, [path.join(outputRoot, '__UNKNOWN__', '0')]);
    assert.strictEqual(await pathExists(path.join(outputRoot, '__UNKNOWN__', '0')), true);
    assert.strictEqual(await pathExists(path.join(outputRoot, '__UNKNOWN__', '2')), false);
  });

  test('reports a malformed directory as a header load failure', async () => {
    await fs.writeFile(directoryFile, Buffer.alloc(13));

    await assert.rejects(extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, logger: new CapturingLogger() }), (error: unknown) => {
      assert.ok(error instanceof ExtractError);
      assert.strictEqual(error.context, 'failed to load headers');
      assert.ok(error.cause instanceof InvalidFormatError);
      return true;
    });
    assert.strictEqual(await pathExists(outputRoot), false);
  });

  test('reports an unreadable name list', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([{ nameHash: 1, localOffset: 0, size: 1 }]));

    await assert.rejects(
      extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, namesFile: path.join(tempDir, 'missing.list'), logger: new CapturingLogger() }),
      (error: unknown) => {
        assert.ok(error instanceof ExtractError);
        assert.strictEqual(error.context, 'failed to load name list');
        return true;
      },
    );
  });

  test('builds the catalog from a names file', async () => {
    const namesFile = path.join(tempDir, 'names.list');
    await fs.writeFile(namesFile, 'MUSIC\\TITLE.MUS\r\n');
    await fs.writeFile(directoryFile, encodeDirectory([{ nameHash: hashName('MUSIC\\TITLE.MUS'), localOffset: 0, size: 8 }]));
    const logger = new CapturingLogger();

    await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, namesFile, logger });

    assert.deepStrictEqual(logger.lines, [path.join(outputRoot, 'MUSIC', 'TITLE.MUS')]);
  });

  test('reports paths without writing in dry-run mode', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([
      { nameHash: hashName('sound/test.wav'), localOffset: 0, size: 16 },
      { nameHash: 9, localOffset: 0xffff, size: 16 },
    ]));
    const logger = new CapturingLogger();

    await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, dryRun: true, logger });

    assert.deepStrictEqual(logger.lines, [
      path.join(outputRoot, 'sound', 'test.wav'),
      path.join(outputRoot, '__UNKNOWN__', 'FFFF'),
    ]);
    assert.strictEqual(await pathExists(outputRoot), false);
  });

  test('writes diagnostics in verbose mode', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([
      { nameHash: 1, localOffset: 0, size: 1 },
      { nameHash: 2, localOffset: 1, size: 1 },
    ]));
    const logger = new CapturingLogger();

    await extractArchive({
      directoryFile,
      archiveFiles: [archiveFile, 'ZZDATA1'],
      outputRoot,
      catalog,
      verbose: true,
      logger,
    });

    assert.deepStrictEqual(logger.errors, [
      `Directory ${directoryFile}: 2 records (size matches extended layout, reading canonical)`,
      'Name catalog: 2 entries',
      'Ignoring additional archive ZZDATA1',
    ]);
    assert.strictEqual(logger.lines.length, 2);
  });

  test('reports the canonical layout when the directory size is not a multiple of 24', async () => {
    await fs.writeFile(directoryFile, encodeDirectory([{ nameHash: 1, localOffset: 0, size: 1 }]));
    const logger = new CapturingLogger();

    await extractArchive({ directoryFile, archiveFiles: [archiveFile], outputRoot, catalog, verbose: true, logger });

    assert.strictEqual(logger.errors[0], `Directory ${directoryFile}: 1 records (size matches canonical layout, reading canonical)`);
  });
});
