import {existsSync} from 'node:fs';
import {readFile, writeFile, mkdir} from 'node:fs/promises';
import path from 'node:path';
import {IOError} from '../src/errors.js';
import {ensureDir, Workspace} from '../src/workspace.js';
import {cleanup, ICON, tempRoot, writeIcons} from './helpers.js';

let root: string;
beforeEach(async () => { root = await tempRoot(); });
afterEach(async () => { await cleanup(root); });

test('lays out the output tree under xamarin/', () => {
  const ws = Workspace.forRoot(root);
  expect(ws.paths.source).toBe(path.join(root, 'svg'));
  expect(ws.svgDir).toBe(path.join(root, 'xamarin', 'svg'));
  expect(ws.iosDir).toBe(path.join(root, 'xamarin', 'ios'));
  expect(ws.androidDir).toBe(path.join(root, 'xamarin', 'android'));
});

test('reset removes stale output and tolerates a missing dir', async () => {
  const ws = Workspace.forRoot(root);
  await ws.reset();

  await mkdir(ws.iosDir, { recursive: true });
  await writeFile(path.join(ws.iosDir, 'old.png'), 'x');
  await ws.reset();
  expect(existsSync(ws.paths.output)).toBe(false);
});

test('populate copies the source tree', async () => {
  await writeIcons(root, { 'svg/a.svg': ICON, 'svg/filled/b.svg': ICON });
  const ws = Workspace.forRoot(root);
  await ws.populate();
  expect(await readFile(path.join(ws.svgDir, 'filled', 'b.svg'), 'utf8')).toBe(ICON);
  expect(await readFile(path.join(root, 'svg', 'a.svg'), 'utf8')).toBe(ICON);
});

test('populate fails with IOError when the source is missing', async () => {
  const ws = Workspace.forRoot(root);
  await expect(ws.populate()).rejects.toBeInstanceOf(IOError);
  await expect(ws.populate()).rejects.toMatchObject({ path: path.join(root, 'svg') });
});

test('ensureDir is idempotent', async () => {
  const ws = Workspace.forRoot(root);
  const dir = path.join(ws.androidDir, 'drawable-hdpi');
  await ensureDir(dir);
  await ensureDir(dir);
  expect(existsSync(dir)).toBe(true);
});

test('ensureDir wraps failures', async () => {
  await writeFile(path.join(root, 'file'), 'x');
  await expect(ensureDir(path.join(root, 'file', 'sub'))).rejects.toBeInstanceOf(IOError);
});
