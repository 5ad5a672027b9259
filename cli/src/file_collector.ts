import * as fs from 'fs';
import * as path from 'path';
import ignore, { Ignore } from 'ignore';

export interface CollectedFile {
  /** Absolute path on disk. */
  readonly path: string;
  /** Entry name: the path below the collection root's parent, with `/` separators. */
  readonly name: string;
}

export const IGNORE_FILE = '.slotpakignore';

const DEFAULT_IGNORE_PATTERNS = ['.git/', 'node_modules/', IGNORE_FILE];

export function toEntryName(relativePath: string): string {
  return relativePath.split(path.sep).join('/');
}

/** An anchored gitignore pattern that matches exactly one path below the root. */
function literalPattern(relativePath: string): string {
  return `/${toEntryName(relativePath).replace(/[\\*?[\]]/g, '\\$&')}`;
}

function readIgnoreFile(fsModule: typeof fs, root: string): string[] {
  const ignoreFile = path.join(root, IGNORE_FILE);
  if (!fsModule.existsSync(ignoreFile)) {
    return [];
  }
  return fsModule
    .readFileSync(ignoreFile, 'utf8')
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(line => line && !line.startsWith('#'));
}

/**
 * Walks a directory for files to archive. Skips the default patterns, the
 * rules in `.slotpakignore` at the root (gitignore syntax) and the excluded
 * absolute paths.
 */
export class FileCollector {
  private readonly rules: Ignore;

  constructor(
    private readonly root: string,
    exclude: Iterable<string> = [],
    private readonly fsModule: typeof fs = fs
  ) {
    const excluded = [...exclude]
      .map(excludedPath => path.relative(root, excludedPath))
      .filter(relative => relative && !relative.startsWith(`..${path.sep}`) && relative !== '..' && !path.isAbsolute(relative))
      .map(literalPattern);
    this.rules = ignore({ ignorecase: false })
      .add(DEFAULT_IGNORE_PATTERNS)
      .add(readIgnoreFile(fsModule, root))
      .add(excluded);
  }

  async collect(): Promise<CollectedFile[]> {
    const found: CollectedFile[] = [];
    await this.walk(this.root, found);
    return found.sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  }

  private async walk(directory: string, found: CollectedFile[]): Promise<void> {
    for (const entry of await this.fsModule.promises.readdir(directory, { withFileTypes: true })) {
      const fullPath = path.join(directory, entry.name);
      const relative = toEntryName(path.relative(this.root, fullPath));
      if (entry.isDirectory()) {
        if (!this.rules.ignores(`${relative}/`)) {
          await this.walk(fullPath, found);
        }
      } else if (entry.isFile() && !this.rules.ignores(relative)) {
        found.push({ path: fullPath, name: toEntryName(path.relative(path.dirname(this.root), fullPath)) });
      }
    }
  }
}
