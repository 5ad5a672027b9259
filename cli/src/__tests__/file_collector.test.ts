import { afterEach, beforeEach, describe, test, expect } from '@jest/globals';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { FileCollector } from '../file_collector';

let workDir: string;

beforeEach(async () => {
  workDir = await fs.promises.mkdtemp(path.join(os.tmpdir(), 'slotpak-collector-test-'));
});

afterEach(async () => {
  await fs.promises.rm(workDir, { recursive: true, force: true });
});

function touch(relative: string, content = 'x') {
  const target = path.join(workDir, relative);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, content);
}

describe('FileCollector', () => {
  test('should name files relative to the parent of the root', async () => {
    touch('site/index.html');
    touch('site/css/main.css');
    const files = await new FileCollector(path.join(workDir, 'site')).collect();
    expect(files).toEqual([
      { path: path.join(workDir, 'site', 'css', 'main.css'), name: 'site/css/main.css' },
      { path: path.join(workDir, 'site', 'index.html'), name: 'site/index.html' },
    ]);
  });

  test('should skip default and user ignore patterns', async () => {
    touch('site/keep.txt');
    touch('site/node_modules/pkg/index.js');
    touch('site/.git/HEAD');
    touch('site/build/out.bin');
    touch('site/.slotpakignore', 'build/\n\n# comment\n');
    const files = await new FileCollector(path.join(workDir, 'site')).collect();
    expect(files.map(file => file.name)).toEqual(['site/keep.txt']);
  });

  test('should leave out excluded paths', async () => {
    touch('site/keep.txt');
    touch('site/pack.spak');
    const excluded = new Set([path.join(workDir, 'site', 'pack.spak')]);
    const files = await new FileCollector(path.join(workDir, 'site'), excluded).collect();
    expect(files.map(file => file.name)).toEqual(['site/keep.txt']);
  });

  test('should exclude only the exact path given', async () => {
    touch('site/pack.spak');
    touch('site/sub/pack.spak');
    touch('other/pack.spak');
    const excluded = [path.join(workDir, 'site', 'sub', 'pack.spak'), path.join(workDir, 'other', 'pack.spak')];
    const files = await new FileCollector(path.join(workDir, 'site'), excluded).collect();
    expect(files.map(file => file.name)).toEqual(['site/pack.spak']);
  });

  test('should fail for a missing root', async () => {
    await expect(new FileCollector(path.join(workDir, 'missing')).collect()).rejects.toMatchObject({ code: 'ENOENT' });
  });
});
