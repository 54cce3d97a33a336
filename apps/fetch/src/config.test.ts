import { describe, it, expect } from 'vitest';
import { ConfigError } from '@loopfetch/protocol';
import { createProgram, parseCliOptions } from './cli.js';
import { defaultAnimDir, expandHome, resolveConfig } from './config.js';

const HOME = '/home/tester';

describe('resolveConfig', () => {
  it('falls back to defaults', () => {
    expect(resolveConfig({}, {}, HOME)).toEqual({
      animDir: '/home/tester/.local/share/loopfetch/anim',
      width: 40,
      height: 20,
      fps: 12,
      align: 'left',
      genFrames: false,
      input: undefined,
      out: undefined,
      color: false,
      invert: false,
      theme: true,
    });
  });

  it('prefers the command line over the environment', () => {
    const env = { LOOPFETCH_WIDTH: '30', LOOPFETCH_FPS: '24', LOOPFETCH_ALIGN: 'center' };
    const config = resolveConfig({ width: '50' }, env, HOME);

    expect(config.width).toBe(50);
    expect(config.fps).toBe(24);
    expect(config.align).toBe('center');
  });

  it('expands ~ in paths', () => {
    const config = resolveConfig({ animDir: '~/anim', genFrames: true, input: '~/cat.gif' }, {}, HOME);
    expect(config.animDir).toBe('/home/tester/anim');
    expect(config.input).toBe('/home/tester/cat.gif');
  });

  it('lists every invalid option', () => {
    try {
      resolveConfig({ width: '0', align: 'right' }, {}, HOME);
      expect.unreachable('resolveConfig should throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      const issues = error instanceof ConfigError ? error.issues : [];
      expect(issues).toHaveLength(2);
      expect(issues[0]).toMatch(/^width: /);
      expect(issues[1]).toMatch(/^align: /);
    }
  });

  it('requires an input image for --gen-frames', () => {
    expect(() => resolveConfig({ genFrames: true }, {}, HOME)).toThrow('input: --gen-frames needs --input <gif>');
  });
});

describe('expandHome', () => {
  it('leaves other paths alone', () => {
    expect(expandHome('/srv/anim', HOME)).toBe('/srv/anim');
    expect(expandHome('~', HOME)).toBe(HOME);
  });
});

describe('defaultAnimDir', () => {
  it('lives under the XDG data directory', () => {
    expect(defaultAnimDir(HOME)).toBe('/home/tester/.local/share/loopfetch/anim');
  });
});

describe('parseCliOptions', () => {
  it('maps flags to option names', () => {
    const options = parseCliOptions(
      ['node', 'loopfetch', '--anim-dir', '/tmp/anim', '--fps', '30', '--gen-frames', '-i', 'in.gif', '-o', 'out', '--color', '--no-theme'],
      createProgram().exitOverride()
    );

    expect(options).toEqual({
      animDir: '/tmp/anim',
      fps: '30',
      genFrames: true,
      input: 'in.gif',
      out: 'out',
      color: true,
      theme: false,
    });
  });

  it('keeps the theme on by default', () => {
    expect(parseCliOptions(['node', 'loopfetch'], createProgram().exitOverride())).toEqual({ theme: true });
  });
});
