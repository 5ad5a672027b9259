import { afterEach, beforeEach, describe, test, expect, jest } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { Archive, ArchiveReader, FileStore, ReadOnlyFileStore, silentLogger } from 'slotpak-db';
import { CliIo, describeFailure, run, usage } from '../cli';

interface Captured {
  code: number;
  stdout: string[];
  stderr: string[];
}

let workDir: string;

beforeEach(async () => {
  workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'slotpak-cli-test-'));
});

afterEach(async () => {
  jest.restoreAllMocks();
  await fs.promises.rm(workDir, { recursive: true, force: true });
});

async function slotpak(args: string[], env: Record<string, string | undefined> = { SLOTPAK_LOG: 'silent' }): Promise<Captured> {
  const stdout: string[] = [];
  const stderr: string[] = [];
  const io: CliIo = {
    stdout: line => stdout.push(line),
    stderr: line => stderr.push(line),
    env,
    cwd: workDir,
  };
  const code = await run(args, io);
  return { code, stdout, stderr };
}

function writeFile(relative: string, content: string) {
  const target = path.join(workDir, relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

function readArchive<T>(fn: (reader: ArchiveReader) => T): T {
  const reader = ArchiveReader.open(new ReadOnlyFileStore(path.join(workDir, 'pack.spak')), { logger: silentLogger });
  try {
    return fn(reader);
  } finally {
    reader.close();
  }
}

function writeArchive(entries: Record<string, string>) {
  const archive = Archive.create(new FileStore(path.join(workDir, 'pack.spak'), { create: true }), { logger: silentLogger });
  try {
    for (const [name, content] of Object.entries(entries)) {
      archive.insertOrReplace(name, Buffer.from(content), false);
    }
  } finally {
    archive.close();
  }
}

function writeDocs() {
  writeFile('docs/a.txt', 'alpha');
  writeFile('docs/sub/b.txt', 'beta');
  writeFile('docs/skip.log', 'ignored');
  writeFile('docs/.slotpakignore', '# logs stay out\n*.log\n');
}

describe('slotpak add and list', () => {
  test('should add a directory tree and honour the ignore file', async () => {
    writeDocs();
    const added = await slotpak(['add', 'pack.spak', 'docs']);
    expect(added).toEqual({
      code: 0,
      stdout: ['added docs/a.txt (5 -> 5 bytes)', 'added docs/sub/b.txt (4 -> 4 bytes)'],
      stderr: [],
    });

    const listed = await slotpak(['list', 'pack.spak']);
    expect(listed.stdout).toEqual(['docs/a.txt', 'docs/sub/b.txt']);
  });

  test('should show sizes with --long', async () => {
    writeFile('notes.txt', 'some notes');
    await slotpak(['add', 'pack.spak', 'notes.txt']);
    const listed = await slotpak(['list', 'pack.spak', '--long']);
    expect(listed.stdout).toEqual(['10\t10\tstored\tnotes.txt']);
  });

  test('should compress added entries when asked', async () => {
    writeFile('big.txt', 'x'.repeat(4000));
    const added = await slotpak(['add', 'pack.spak', 'big.txt', '--compress', '--level', '9']);
    expect(added.code).toBe(0);
    const info = readArchive(reader => reader.stat('big.txt'));
    expect(info.compressed).toBe(true);
    expect(added.stdout).toEqual([`added big.txt (4000 -> ${info.storedSize} bytes)`]);
  });

  test('should refuse existing names without --overwrite and add nothing', async () => {
    writeFile('a.txt', 'first');
    writeFile('b.txt', 'second');
    await slotpak(['add', 'pack.spak', 'a.txt']);

    const refused = await slotpak(['add', 'pack.spak', 'b.txt', 'a.txt']);
    expect(refused.code).toBe(1);
    expect(refused.stderr).toEqual(["error: AlreadyExists: Entry 'a.txt' already exists"]);
    expect((await slotpak(['list', 'pack.spak'])).stdout).toEqual(['a.txt']);

    writeFile('a.txt', 'replaced');
    const replaced = await slotpak(['add', 'pack.spak', 'a.txt', '--overwrite']);
    expect(replaced.code).toBe(0);
    expect(readArchive(reader => reader.get('a.txt').toString())).toBe('replaced');
  });

  test('should reject two inputs that map to the same name before creating the archive', async () => {
    writeFile('a.txt', 'top');
    writeFile('sub/a.txt', 'nested');
    const result = await slotpak(['add', 'pack.spak', 'a.txt', 'sub/a.txt']);
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual([
      `error: DuplicateName: Entry 'a.txt' would come from both '${path.join(workDir, 'a.txt')}' and '${path.join(workDir, 'sub', 'a.txt')}'`,
    ]);
    expect(fs.existsSync(path.join(workDir, 'pack.spak'))).toBe(false);
  });

  test('should read every input before the first insert', async () => {
    writeFile('a.txt', 'alpha');
    writeFile('b.txt', 'beta');
    writeFile('c.txt', 'gamma');
    await slotpak(['add', 'pack.spak', 'c.txt']);

    const readFile = fs.promises.readFile;
    jest.spyOn(fs.promises, 'readFile').mockImplementation(file =>
      String(file).endsWith('b.txt')
        ? Promise.reject(Object.assign(new Error("EACCES: permission denied, open 'b.txt'"), { code: 'EACCES' }))
        : readFile(file)
    );
    const result = await slotpak(['add', 'pack.spak', 'a.txt', 'b.txt']);
    jest.restoreAllMocks();

    expect(result.code).toBe(1);
    expect(result.stderr).toEqual(["error: EACCES: permission denied, open 'b.txt'"]);
    expect((await slotpak(['list', 'pack.spak'])).stdout).toEqual(['c.txt']);
  });

  test('should report a no-op repack on a fresh archive', async () => {
    writeFile('a.txt', 'abc');
    const added = await slotpak(['add', 'pack.spak', 'a.txt', '--repack']);
    expect(added.stdout).toEqual(['added a.txt (3 -> 3 bytes)', 'repacked: 8259 -> 8259 bytes, 64 slots']);
  });
});

describe('slotpak info', () => {
  test('should print the archive statistics', async () => {
    writeDocs();
    await slotpak(['add', 'pack.spak', 'docs']);
    const result = await slotpak(['info', 'pack.spak']);
    expect(result.stdout).toEqual([
      'capacity: 64',
      'entries: 2',
      'removed: 0',
      'data: 8256..8265',
      'free bytes: 0',
      'stored bytes: 9',
      'uncompressed bytes: 9',
    ]);
  });

  test('should report a file that is not an archive', async () => {
    fs.writeFileSync(path.join(workDir, 'pack.spak'), Buffer.alloc(100));
    const result = await slotpak(['info', 'pack.spak']);
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual(['error: BadMagic: Store does not start with the archive magic number']);
  });

  test('should report a missing archive', async () => {
    const result = await slotpak(['info', 'missing.spak']);
    expect(result.code).toBe(1);
    expect(result.stderr).toHaveLength(1);
    expect(result.stderr[0]).toMatch(/^error: ENOENT: no such file or directory/);
  });
});

describe('slotpak extract', () => {
  test('should write every entry below the output directory', async () => {
    writeDocs();
    await slotpak(['add', 'pack.spak', 'docs']);
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.stdout).toEqual(['extracted docs/a.txt', 'extracted docs/sub/b.txt']);
    expect(fs.readFileSync(path.join(workDir, 'out', 'docs', 'a.txt'), 'utf8')).toBe('alpha');
    expect(fs.readFileSync(path.join(workDir, 'out', 'docs', 'sub', 'b.txt'), 'utf8')).toBe('beta');
  });

  test('should refuse to overwrite existing files', async () => {
    writeDocs();
    await slotpak(['add', 'pack.spak', 'docs']);
    writeFile('out/docs/sub/b.txt', 'local edit');
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual([
      `error: TargetExists: Refusing to overwrite '${path.join(workDir, 'out', 'docs', 'sub', 'b.txt')}'`,
    ]);
    expect(fs.existsSync(path.join(workDir, 'out', 'docs', 'a.txt'))).toBe(false);
  });

  test('should extract only the named entries', async () => {
    writeDocs();
    await slotpak(['add', 'pack.spak', 'docs']);
    const result = await slotpak(['extract', 'pack.spak', 'out', 'docs/sub/b.txt']);
    expect(result.stdout).toEqual(['extracted docs/sub/b.txt']);
    expect(fs.existsSync(path.join(workDir, 'out', 'docs', 'a.txt'))).toBe(false);
  });

  test('should report unknown entries', async () => {
    writeFile('a.txt', 'abc');
    await slotpak(['add', 'pack.spak', 'a.txt']);
    const result = await slotpak(['extract', 'pack.spak', 'out', 'nope']);
    expect(result.stderr).toEqual(["error: NotFound: Entry 'nope' does not exist"]);
  });
});

describe('slotpak extract without partial results', () => {
  test('should refuse an entry that would land below another entry file', async () => {
    writeArchive({ d: 'file', 'd/f': 'nested' });
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.code).toBe(1);
    expect(result.stderr).toEqual(["error: PathConflict: Entry 'd/f' would be written below the file for entry 'd'"]);
    expect(fs.existsSync(path.join(workDir, 'out'))).toBe(false);
  });

  test('should refuse an entry whose directory is an existing file', async () => {
    writeArchive({ 'a.txt': 'alpha', 'd/f': 'nested' });
    writeFile('out/d', 'local');
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.stderr).toEqual([`error: TargetExists: '${path.join(workDir, 'out', 'd')}' is in the way of entry 'd/f'`]);
    expect(fs.existsSync(path.join(workDir, 'out', 'a.txt'))).toBe(false);
  });

  test('should remove written files when a later entry fails', async () => {
    writeArchive({ 'a.txt': 'alpha', 'b.txt': 'beta' });
    const offset = readArchive(reader => reader.stat('b.txt').offset);
    const fd = fs.openSync(path.join(workDir, 'pack.spak'), 'r+');
    try {
      fs.writeSync(fd, Buffer.from('X'), 0, 1, offset);
    } finally {
      fs.closeSync(fd);
    }

    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.code).toBe(1);
    expect(result.stdout).toEqual([]);
    expect(result.stderr).toHaveLength(1);
    expect(result.stderr[0]).toMatch(/^error: IntegrityMismatch: /);
    expect(fs.existsSync(path.join(workDir, 'out'))).toBe(false);
  });

  test('should accept names that only start with two dots', async () => {
    writeArchive({ '..notes/a.txt': 'kept' });
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.stdout).toEqual(['extracted ..notes/a.txt']);
    expect(fs.readFileSync(path.join(workDir, 'out', '..notes', 'a.txt'), 'utf8')).toBe('kept');
  });

  test('should refuse names that climb out of the output directory', async () => {
    writeArchive({ '../escape.txt': 'nope' });
    const result = await slotpak(['extract', 'pack.spak', 'out']);
    expect(result.stderr).toEqual([
      `error: UnsafePath: Entry '../escape.txt' would be written outside '${path.join(workDir, 'out')}'`,
    ]);
    expect(fs.existsSync(path.join(workDir, 'escape.txt'))).toBe(false);
  });
});

describe('slotpak remove, rename and repack', () => {
  test('should remove entries only when all of them exist', async () => {
    writeFile('a.txt', 'abc');
    writeFile('b.txt', 'def');
    await slotpak(['add', 'pack.spak', 'a.txt', 'b.txt']);

    const refused = await slotpak(['remove', 'pack.spak', 'a.txt', 'c.txt']);
    expect(refused.stderr).toEqual(["error: NotFound: Entry 'c.txt' does not exist"]);
    expect((await slotpak(['list', 'pack.spak'])).stdout).toEqual(['a.txt', 'b.txt']);

    const removed = await slotpak(['remove', 'pack.spak', 'a.txt']);
    expect(removed.stdout).toEqual(['removed a.txt']);
    expect((await slotpak(['list', 'pack.spak'])).stdout).toEqual(['b.txt']);
  });

  test('should rename an entry', async () => {
    writeFile('a.txt', 'abc');
    await slotpak(['add', 'pack.spak', 'a.txt']);
    const result = await slotpak(['rename', 'pack.spak', 'a.txt', 'renamed.txt']);
    expect(result.stdout).toEqual(['renamed a.txt -> renamed.txt']);
    expect(readArchive(reader => reader.get('renamed.txt').toString())).toBe('abc');
  });

  test('should reclaim space left by removed entries', async () => {
    writeFile('a.txt', 'aaaaaaaaaa');
    writeFile('b.txt', 'bbbbb');
    await slotpak(['add', 'pack.spak', 'a.txt', 'b.txt']);
    await slotpak(['remove', 'pack.spak', 'a.txt']);
    const result = await slotpak(['repack', 'pack.spak']);
    expect(result.stdout).toEqual(['repacked: 8271 -> 8261 bytes, 64 slots']);
    expect(fs.statSync(path.join(workDir, 'pack.spak')).size).toBe(8261);
  });

  test('should compress stored entries and repack', async () => {
    writeFile('big.txt', 'y'.repeat(1000));
    await slotpak(['add', 'pack.spak', 'big.txt']);
    const result = await slotpak(['compress', 'pack.spak']);
    const info = readArchive(reader => reader.stat('big.txt'));
    expect(info.compressed).toBe(true);
    expect(result.stdout).toEqual([
      'compressed 1 entries',
      `repacked: ${9256 + info.storedSize} -> ${8256 + info.storedSize} bytes, 64 slots`,
    ]);
    expect(readArchive(reader => reader.get('big.txt').toString())).toBe('y'.repeat(1000));
  });
});

describe('slotpak command line', () => {
  test('should print usage for --help', async () => {
    const result = await slotpak(['--help']);
    expect(result).toEqual({ code: 0, stdout: [usage()], stderr: [] });
  });

  test('should print usage and fail without a command', async () => {
    const result = await slotpak([]);
    expect(result).toEqual({ code: 1, stdout: [], stderr: [usage()] });
  });

  test('should reject unknown commands', async () => {
    const result = await slotpak(['frobnicate']);
    expect(result.stderr).toEqual(["error: Usage: Unknown command 'frobnicate'"]);
  });

  test('should reject options that do not apply to the command', async () => {
    const result = await slotpak(['list', 'pack.spak', '--compress']);
    expect(result.stderr).toEqual(["error: Usage: Option '--compress' does not apply to 'list'"]);
  });

  test('should reject a missing argument', async () => {
    const result = await slotpak(['rename', 'pack.spak', 'a.txt']);
    expect(result.stderr).toEqual(['error: Usage: slotpak rename <archive> <from> <to> [--overwrite]']);
  });

  test('should reject an out-of-range level', async () => {
    writeFile('a.txt', 'abc');
    const result = await slotpak(['add', 'pack.spak', 'a.txt', '--level', '12']);
    expect(result.stderr).toEqual(["error: Usage: --level takes an integer from 0 to 9, got '12'"]);
  });

  test('should log archive operations with --verbose', async () => {
    writeFile('a.txt', 'abc');
    const result = await slotpak(['add', 'pack.spak', 'a.txt', '--verbose'], {});
    expect(result.stderr.slice(0, 2)).toEqual([
      '[slotpak] debug: Created archive with 64 slots',
      '[slotpak] Created pack.spak',
    ]);
    expect(result.stderr).toContain("[slotpak] debug: Inserted 'a.txt': 3 bytes stored as 3 at 8256");
  });

  test('should take the log level from SLOTPAK_LOG', async () => {
    writeFile('a.txt', 'abc');
    const result = await slotpak(['add', 'pack.spak', 'a.txt'], { SLOTPAK_LOG: 'info' });
    expect(result.stderr).toEqual(['[slotpak] Created pack.spak']);
  });
});

describe('describeFailure', () => {
  test('should print the code of errors that are not Error instances', () => {
    expect(describeFailure({ code: 'ENOENT', message: "ENOENT: no such file or directory, open 'x'" })).toBe(
      "ENOENT: no such file or directory, open 'x'"
    );
    expect(describeFailure({ code: 'EACCES', message: 'permission denied' })).toBe('EACCES: permission denied');
  });

  test('should fall back to the name or the string form', () => {
    expect(describeFailure(new TypeError('bad value'))).toBe('TypeError: bad value');
    expect(describeFailure({ message: 'plain' })).toBe('Error: plain');
    expect(describeFailure('oops')).toBe('oops');
  });
});
