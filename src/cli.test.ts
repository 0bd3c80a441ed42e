import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, vi, beforeAll, afterAll, beforeEach } from 'vitest';

vi.mock('./media/process.js', () => ({ runTool: vi.fn() }));

import { runTool } from './media/process.js';
import { runCli } from './cli.js';
import { USAGE } from './pipeline/options.js';
import { UsageError } from './utils/errors.js';

async function run(...argv: string[]): Promise<string> {
  let out = '';
  await runCli(argv, text => {
    out += text;
  });
  return out;
}

describe('runCli', () => {
  let root: string;

  beforeAll(() => {
    root = fs.mkdtempSync(path.join(os.tmpdir(), 'framescan-cli-'));
    for (const name of ['comp_v003.1001.exr', 'comp_v003.1002.exr', 'comp_v003.1003.exr', 'comp_v003.1005.exr']) {
      fs.writeFileSync(path.join(root, name), '');
    }
  });

  afterAll(() => {
    fs.rmSync(root, { recursive: true, force: true });
  });

  beforeEach(() => {
    vi.mocked(runTool).mockReset();
  });

  it('prints usage for help', async () => {
    expect(await run('help')).toBe(USAGE);
  });

  it('format rewrites a single path', async () => {
    expect(await run('format', 'plates/bg.1001.dpx', '--pad', '#', '--ext', 'exr')).toBe('plates/bg.####.exr\n');
  });

  it('range prints the decoded bounds', async () => {
    expect(await run('range', '1-4,7,9-10')).toBe('{"first":1,"last":10,"count":10}\n');
  });

  it('range rejects malformed input', async () => {
    await expect(run('range', 'ten')).rejects.toThrow(UsageError);
  });

  it('ls lists sequences under a root', async () => {
    const template = path.join(root, 'comp_v003.%04d.exr');

    expect(await run('ls', root)).toBe(`${template}\t1001-1003,1005\t4\n`);
  });

  it('convert hands each sequence to oiiotool and prints the outputs', async () => {
    const out = await run('convert', 'comp.%04d.exr', '--frames', '1-10', '--ext', 'jpg', '--', '--resize', '50%');

    expect(out).toBe('comp.%04d.jpg\n');
    expect(runTool).toHaveBeenCalledWith(
      'oiiotool',
      ['comp.%04d.exr', '--frames', '1-10', '--resize', '50%', '-v', '-o', 'comp.%04d.jpg'],
      'oiiotool convert',
    );
  });

  it('encode hands each sequence to ffmpeg', async () => {
    const out = await run('encode', 'comp.%04d.exr', '--frames', '1001-1100', '--framerate', '25');

    expect(out).toBe('comp.mov\n');
    expect(runTool).toHaveBeenCalledWith(
      'ffmpeg',
      ['-y', '-r', '25', '-start_number', '1001', '-i', 'comp.%04d.exr', 'comp.mov'],
      'ffmpeg encode',
    );
  });

  it('rejects unknown commands', async () => {
    await expect(run('publish')).rejects.toThrow('Unknown command: publish');
  });
});
