import { describe, it, expect } from 'vitest';
import { parseSequencePath, printfPlaceholder, templatePath } from './path-parser.js';

describe('parseSequencePath', () => {
  it('splits directory, basename, frame and extension', () => {
    expect(parseSequencePath('dir/base_0001.exr')).toEqual({
      directory: 'dir/',
      basename: 'base_',
      frame: '0001',
      extension: '.exr',
    });
  });

  it('assigns everything up to the last separator before the frame to the basename', () => {
    expect(parseSequencePath('shot.v002.1001.exr')).toEqual({
      directory: '',
      basename: 'shot.v002.',
      frame: '1001',
      extension: '.exr',
    });
  });

  it('takes the final digit run when two are dot-separated', () => {
    expect(parseSequencePath('a_1.2.exr')).toEqual({
      directory: '',
      basename: 'a_1.',
      frame: '2',
      extension: '.exr',
    });
  });

  it('accepts compound extensions with a leading numeral group', () => {
    expect(parseSequencePath('file.0001.1bar.exr')).toEqual({
      directory: '',
      basename: 'file.',
      frame: '0001',
      extension: '.1bar.exr',
    });
  });

  it('accepts dotted extensions such as .tar.gz', () => {
    expect(parseSequencePath('/cache/sim_042.tar.gz')).toEqual({
      directory: '/cache/',
      basename: 'sim_',
      frame: '042',
      extension: '.tar.gz',
    });
  });

  it('allows an empty basename', () => {
    expect(parseSequencePath('renders/0001.png')).toEqual({
      directory: 'renders/',
      basename: '',
      frame: '0001',
      extension: '.png',
    });
  });

  it('allows a missing extension', () => {
    expect(parseSequencePath('base_0001')).toEqual({
      directory: '',
      basename: 'base_',
      frame: '0001',
      extension: '',
    });
  });

  it('understands backslash directories', () => {
    expect(parseSequencePath('C:\\renders\\beauty.0010.exr')).toEqual({
      directory: 'C:\\renders\\',
      basename: 'beauty.',
      frame: '0010',
      extension: '.exr',
    });
  });

  it('does not take digits from the directory', () => {
    expect(parseSequencePath('shot_010/.hidden')).toEqual({
      directory: 'shot_010/',
      basename: '',
      extension: '.hidden',
    });
  });

  it('returns null for names without a frame next to the extension', () => {
    expect(parseSequencePath('notasequence.exr')).toBeNull();
    expect(parseSequencePath('plate-0001.exr')).toBeNull();
    expect(parseSequencePath('README')).toBeNull();
  });

  it('reconstructs the input exactly', () => {
    const inputs = [
      'dir/base_0001.exr',
      'shot.v002.1001.exr',
      'file.0001.1bar.exr',
      '/a/b/c_7',
      'C:\\x\\y.12.tif',
    ];
    for (const input of inputs) {
      const parsed = parseSequencePath(input);
      expect(parsed).not.toBeNull();
      if (!parsed) continue;
      expect(parsed.directory + parsed.basename + (parsed.frame ?? '') + parsed.extension).toBe(input);
    }
  });
});

describe('templatePath', () => {
  it('replaces the frame with a printf placeholder of the same width', () => {
    expect(templatePath({ directory: 'dir/', basename: 'base_', frame: '0001', extension: '.exr' }))
      .toBe('dir/base_%04d.exr');
  });

  it('uses the literal digit count for unpadded frames', () => {
    expect(templatePath({ directory: '', basename: 'img.', frame: '12', extension: '.png' }))
      .toBe('img.%02d.png');
  });

  it('printfPlaceholder pads to the requested width', () => {
    expect(printfPlaceholder(4)).toBe('%04d');
    expect(printfPlaceholder(10)).toBe('%010d');
  });
});
