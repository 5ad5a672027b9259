import * as fs from 'fs';
import * as path from 'path';
import { alreadyExists, notFound, validateEntryName } from 'slotpak-protocol';
import {
  Archive,
  ArchiveOptions,
  ArchiveReader,
  EntryInfo,
  FileStore,
  Logger,
  ReadOnlyFileStore,
  RepackResult,
} from 'slotpak-db';
import { CollectedFile, FileCollector } from './file_collector';

export interface CommandContext {
  readonly cwd: string;
  readonly logger: Logger;
  stdout(line: string): void;
}

/** Failure of the command line itself, reported with `code` like archive errors. */
export class CommandError extends Error {
  constructor(readonly code: string, message: string) {
    super(message);
    this.name = 'CommandError';
  }
}

export interface AddOptions {
  compress: boolean;
  level?: number;
  overwrite: boolean;
  repack: boolean;
}

function archiveOptions(ctx: CommandContext, level?: number): ArchiveOptions {
  return level === undefined ? { logger: ctx.logger } : { logger: ctx.logger, compressionLevel: level };
}

function withReader<T>(ctx: CommandContext, archivePath: string, fn: (reader: ArchiveReader) => T): T {
  const store = new ReadOnlyFileStore(path.resolve(ctx.cwd, archivePath));
  let reader: ArchiveReader;
  try {
    reader = ArchiveReader.open(store, archiveOptions(ctx));
  } catch (error) {
    store.close();
    throw error;
  }
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}

async function withArchive<T>(
  ctx: CommandContext,
  archivePath: string,
  fn: (archive: Archive) => Promise<T> | T,
  options: { level?: number; create?: boolean } = {}
): Promise<T> {
  const resolved = path.resolve(ctx.cwd, archivePath);
  const create = options.create === true && !fs.existsSync(resolved);
  const store = new FileStore(resolved, { create });
  let archive: Archive;
  try {
    archive = create
      ? Archive.create(store, archiveOptions(ctx, options.level))
      : Archive.open(store, archiveOptions(ctx, options.level));
  } catch (error) {
    store.close();
    throw error;
  }
  if (create) {
    ctx.logger.info(`Created ${archivePath}`);
  }
  try {
    return await fn(archive);
  } finally {
    archive.close();
  }
}

function byName(a: { name: string }, b: { name: string }): number {
  return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
}

function describeEntry(info: EntryInfo): string {
  return `${info.size}\t${info.storedSize}\t${info.compressed ? 'deflate' : 'stored'}\t${info.name}`;
}

function describeRepack(result: RepackResult): string {
  return `repacked: ${result.previousLength} -> ${result.length} bytes, ${result.capacity} slots`;
}

export function listCommand(ctx: CommandContext, archivePath: string, long: boolean): void {
  withReader(ctx, archivePath, reader => {
    for (const info of [...reader.entries()].sort(byName)) {
      ctx.stdout(long ? describeEntry(info) : info.name);
    }
  });
}

export function infoCommand(ctx: CommandContext, archivePath: string): void {
  withReader(ctx, archivePath, reader => {
    const stats = reader.stats();
    ctx.stdout(`capacity: ${stats.capacity}`);
    ctx.stdout(`entries: ${stats.liveCount}`);
    ctx.stdout(`removed: ${stats.tombstoneCount}`);
    ctx.stdout(`data: ${stats.dataStart}..${stats.dataEnd}`);
    ctx.stdout(`free bytes: ${stats.freeBytes}`);
    ctx.stdout(`stored bytes: ${stats.storedBytes}`);
    ctx.stdout(`uncompressed bytes: ${stats.uncompressedBytes}`);
  });
}

function extractTarget(outdir: string, name: string): string {
  const target = path.resolve(outdir, name);
  const relative = path.relative(outdir, target);
  if (!relative || relative === '..' || relative.startsWith(`..${path.sep}`) || path.isAbsolute(relative)) {
    throw new CommandError('UnsafePath', `Entry '${name}' would be written outside '${outdir}'`);
  }
  return target;
}

interface ExtractTarget {
  name: string;
  target: string;
}

/** Directories from the parent of `target` up to and including `root`. */
function parentsWithin(root: string, target: string): string[] {
  const parents: string[] = [];
  for (let dir = path.dirname(target); dir.startsWith(root); dir = path.dirname(dir)) {
    parents.push(dir);
    if (dir === root) {
      break;
    }
  }
  return parents;
}

/** Every check that can fail before the first file is written. */
function planExtraction(reader: ArchiveReader, root: string, names: string[]): ExtractTarget[] {
  const targets = names.map(name => {
    if (!reader.contains(name)) {
      throw notFound(name);
    }
    const target = extractTarget(root, name);
    if (fs.existsSync(target)) {
      throw new CommandError('TargetExists', `Refusing to overwrite '${target}'`);
    }
    for (const dir of parentsWithin(root, target)) {
      if (fs.existsSync(dir) && !fs.statSync(dir).isDirectory()) {
        throw new CommandError('TargetExists', `'${dir}' is in the way of entry '${name}'`);
      }
    }
    return { name, target };
  });

  const files = new Map(targets.map(({ name, target }) => [target, name]));
  for (const { name, target } of targets) {
    for (const dir of parentsWithin(root, target)) {
      const owner = files.get(dir);
      if (owner !== undefined) {
        throw new CommandError('PathConflict', `Entry '${name}' would be written below the file for entry '${owner}'`);
      }
    }
  }
  return targets;
}

function writeEntry(reader: ArchiveReader, name: string, target: string, created: string[]): void {
  const dir = fs.mkdirSync(path.dirname(target), { recursive: true });
  if (dir !== undefined) {
    created.push(dir);
  }
  const fd = fs.openSync(target, 'wx');
  created.push(target);
  try {
    reader.extractTo(name, chunk => {
      let written = 0;
      while (written < chunk.length) {
        written += fs.writeSync(fd, chunk, written, chunk.length - written);
      }
    });
  } finally {
    fs.closeSync(fd);
  }
}

/**
 * Extracts the named entries, or all of them, refusing to replace any existing
 * file. A failure part way removes every file and directory the run created.
 */
export function extractCommand(ctx: CommandContext, archivePath: string, outdir: string, names: string[]): void {
  const root = path.resolve(ctx.cwd, outdir);
  withReader(ctx, archivePath, reader => {
    const selected = names.length > 0 ? [...new Set(names)] : [...reader.list()].sort();
    const targets = planExtraction(reader, root, selected);

    const created: string[] = [];
    try {
      for (const { name, target } of targets) {
        writeEntry(reader, name, target, created);
      }
    } catch (error) {
      ctx.logger.warn(`Extraction failed, removing ${created.length} created paths`);
      for (const createdPath of created.reverse()) {
        fs.rmSync(createdPath, { recursive: true, force: true });
      }
      throw error;
    }
    for (const { name } of targets) {
      ctx.stdout(`extracted ${name}`);
    }
  });
}

async function collectInputs(ctx: CommandContext, archivePath: string, inputs: string[]): Promise<CollectedFile[]> {
  const exclude = new Set([path.resolve(ctx.cwd, archivePath)]);
  const files: CollectedFile[] = [];
  for (const input of inputs) {
    const resolved = path.resolve(ctx.cwd, input);
    const stat = await fs.promises.stat(resolved);
    if (stat.isDirectory()) {
      files.push(...await new FileCollector(resolved, exclude).collect());
    } else if (stat.isFile()) {
      files.push({ path: resolved, name: path.basename(resolved) });
    } else {
      throw new CommandError('Usage', `'${input}' is neither a file nor a directory`);
    }
  }

  const seen = new Map<string, string>();
  for (const file of files) {
    validateEntryName(file.name);
    const previous = seen.get(file.name);
    if (previous !== undefined) {
      throw new CommandError('DuplicateName', `Entry '${file.name}' would come from both '${previous}' and '${file.path}'`);
    }
    seen.set(file.name, file.path);
  }
  return files;
}

/** Adds files and directory trees, creating the archive when it does not exist yet. */
export async function addCommand(ctx: CommandContext, archivePath: string, inputs: string[], options: AddOptions): Promise<void> {
  const files = await collectInputs(ctx, archivePath, inputs);
  if (files.length === 0) {
    ctx.logger.warn('Nothing to add');
  }
  const contents = await Promise.all(files.map(file => fs.promises.readFile(file.path)));

  await withArchive(ctx, archivePath, archive => {
    if (!options.overwrite) {
      for (const file of files) {
        if (archive.contains(file.name)) {
          throw alreadyExists(file.name);
        }
      }
    }

    files.forEach((file, i) => {
      archive.insertOrReplace(file.name, contents[i], options.compress);
      const info = archive.stat(file.name);
      ctx.stdout(`added ${file.name} (${info.size} -> ${info.storedSize} bytes)`);
    });

    if (options.repack) {
      ctx.stdout(describeRepack(archive.repack()));
    }
  }, { level: options.level, create: true });
}

export async function removeCommand(ctx: CommandContext, archivePath: string, names: string[]): Promise<void> {
  await withArchive(ctx, archivePath, archive => {
    for (const name of names) {
      if (!archive.contains(name)) {
        throw notFound(name);
      }
    }
    for (const name of new Set(names)) {
      archive.remove(name);
      ctx.stdout(`removed ${name}`);
    }
  });
}

export async function renameCommand(
  ctx: CommandContext,
  archivePath: string,
  from: string,
  to: string,
  overwrite: boolean
): Promise<void> {
  await withArchive(ctx, archivePath, archive => {
    archive.rename(from, to, { overwrite });
    ctx.stdout(`renamed ${from} -> ${to}`);
  });
}

export async function repackCommand(ctx: CommandContext, archivePath: string): Promise<void> {
  await withArchive(ctx, archivePath, archive => {
    ctx.stdout(describeRepack(archive.repack()));
  });
}

/** Stores every uncompressed entry compressed, then repacks to reclaim the old payloads. */
export async function compressCommand(ctx: CommandContext, archivePath: string, level?: number): Promise<void> {
  await withArchive(ctx, archivePath, archive => {
    const pending = [...archive.entries()].filter(info => !info.compressed).map(info => info.name);
    for (const name of pending) {
      archive.insertOrReplace(name, archive.get(name), true);
    }
    ctx.stdout(`compressed ${pending.length} entries`);
    ctx.stdout(describeRepack(archive.repack()));
  }, { level });
}
