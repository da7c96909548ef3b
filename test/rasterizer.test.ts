import path from 'node:path';
import sharp from 'sharp';
import {RasterizationError} from '../src/errors.js';
import {inkscapeArgs, inkscapeRasterizer, sharpRasterizer, SpawnResult} from '../src/rasterizer.js';
import {cleanup, ICON, tempRoot, writeIcons} from './helpers.js';

function fakeSpawn(result: SpawnResult) {
  const calls: { command: string; args: string[] }[] = [];
  const spawnSync = (command: string, args: string[]) => {
    calls.push({ command, args });
    return result;
  };
  return { calls, spawnSync };
}

test('builds the inkscape command line', () => {
  expect(inkscapeArgs('in.svg', 48, 48, 'out@2x.png')).toEqual(['-w', '48', '-h', '48', 'in.svg', '-o', 'out@2x.png']);
});

test('runs the configured binary', async () => {
  const { calls, spawnSync } = fakeSpawn({ status: 0, stderr: '' });
  await inkscapeRasterizer({ bin: '/opt/inkscape', spawnSync })('a.svg', 24, 24, 'a.png');
  expect(calls).toEqual([{ command: '/opt/inkscape', args: ['-w', '24', '-h', '24', 'a.svg', '-o', 'a.png'] }]);
});

test('non-zero exit becomes a RasterizationError', async () => {
  const { spawnSync } = fakeSpawn({ status: 3, stderr: 'parse error\n' });
  const run = inkscapeRasterizer({ spawnSync })('bad.svg', 24, 24, 'bad.png');
  await expect(run).rejects.toBeInstanceOf(RasterizationError);
  await expect(run).rejects.toMatchObject({
    exitCode: 3,
    stderr: 'parse error\n',
    message: 'Rasterizing bad.svg -> bad.png failed (exit 3): parse error',
  });
});

test('a converter that cannot start is reported', async () => {
  const { spawnSync } = fakeSpawn({ status: null, stderr: '', error: new Error('spawn inkscape ENOENT') });
  await expect(inkscapeRasterizer({ spawnSync })('a.svg', 24, 24, 'a.png')).rejects.toMatchObject({
    exitCode: null,
    message: 'Rasterizing a.svg -> a.png failed: spawn inkscape ENOENT',
  });
});

describe('sharp', () => {
  let root: string;
  beforeEach(async () => { root = await tempRoot(); });
  afterEach(async () => { await cleanup(root); });

  test('renders at the exact size', async () => {
    await writeIcons(root, { 'a.svg': ICON });
    const out = path.join(root, 'a@3x.png');
    await sharpRasterizer()(path.join(root, 'a.svg'), 72, 72, out);
    const meta = await sharp(out).metadata();
    expect(meta.format).toBe('png');
    expect(meta.width).toBe(72);
    expect(meta.height).toBe(72);
  });

  test('wraps decoder failures', async () => {
    await writeIcons(root, { 'broken.svg': 'not an image' });
    await expect(sharpRasterizer()(path.join(root, 'broken.svg'), 24, 24, path.join(root, 'b.png')))
      .rejects.toBeInstanceOf(RasterizationError);
  });
});
