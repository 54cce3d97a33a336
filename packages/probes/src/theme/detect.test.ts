import { describe, it, expect } from 'vitest';
import { fakeContext } from '../__fixtures__/fake-context.js';
import {
  detectTerminal,
  detectTerminalTheme,
  parseAlacrittyConfig,
  parseDconfColors,
  parseKittyConfig,
  parseKonsoleScheme,
  parseXresources,
} from './detect.js';

describe('parseKittyConfig', () => {
  it('reads colors and prefers color4 as accent', () => {
    const colors = parseKittyConfig(['# theme\nforeground #ffffff\nbackground #000000\ncolor4 #0000ff\ncolor2 #00ff00\n']);
    expect(colors?.foreground).toEqual({ r: 255, g: 255, b: 255 });
    expect(colors?.background).toEqual({ r: 0, g: 0, b: 0 });
    expect(colors?.accent).toEqual({ r: 0, g: 0, b: 255 });
  });

  it('falls back to color2, then the foreground', () => {
    expect(parseKittyConfig(['foreground #ffffff\ncolor2 #00ff00'])?.accent).toEqual({ r: 0, g: 255, b: 0 });
    expect(parseKittyConfig(['foreground #abc'])?.accent).toEqual({ r: 170, g: 187, b: 204 });
  });

  it('yields nothing for a config without colors', () => {
    expect(parseKittyConfig(['font_family Fira Code'])).toBeNull();
  });
});

describe('parseAlacrittyConfig', () => {
  it('reads the YAML form', () => {
    const yml = "colors:\n  primary:\n    foreground: '#d0d0d0'\n  normal:\n    blue: '#1010f0'\n";
    const colors = parseAlacrittyConfig(yml);
    expect(colors?.palette.color4).toEqual({ r: 16, g: 16, b: 240 });
    expect(colors?.accent).toEqual({ r: 16, g: 16, b: 240 });
  });

  it('reads the TOML form', () => {
    const toml = '[colors.primary]\nforeground = "#d0d0d0"\nbackground = "#101010"\n';
    const colors = parseAlacrittyConfig(toml);
    expect(colors?.background).toEqual({ r: 16, g: 16, b: 16 });
    expect(colors?.accent).toEqual({ r: 208, g: 208, b: 208 });
  });
});

describe('parseKonsoleScheme', () => {
  it('keeps colors in their sections', () => {
    const scheme = '[Background]\nColor=10,10,10\n\n[Color4]\nColor=30,60,200\n\n[Foreground]\nColor=220,220,220\n';
    const colors = parseKonsoleScheme(scheme);
    expect(colors?.background).toEqual({ r: 10, g: 10, b: 10 });
    expect(colors?.foreground).toEqual({ r: 220, g: 220, b: 220 });
    expect(colors?.accent).toEqual({ r: 30, g: 60, b: 200 });
  });
});

describe('parseDconfColors', () => {
  it('indexes the palette list', () => {
    const palette = "['#000000', '#aa0000', '#00aa00', '#aaaa00', '#0000aa']";
    const colors = parseDconfColors(palette, "'#eeeeee'", null);
    expect(colors?.palette.color1).toEqual({ r: 170, g: 0, b: 0 });
    expect(colors?.accent).toEqual({ r: 0, g: 0, b: 170 });
    expect(colors?.background).toBeNull();
  });
});

describe('parseXresources', () => {
  it('reads wildcard resources', () => {
    const colors = parseXresources('*.foreground: #c0c0c0\n*color4: #3050f0\n! comment\n');
    expect(colors?.foreground).toEqual({ r: 192, g: 192, b: 192 });
    expect(colors?.accent).toEqual({ r: 48, g: 80, b: 240 });
  });
});

describe('detectTerminal', () => {
  it('walks up the process tree to a known emulator', async () => {
    const ctx = fakeContext({
      ppid: 300,
      commands: {
        'ps -o comm= -p 300': 'bash',
        'ps -o ppid= -p 300': '200',
        'ps -o comm= -p 200': 'Kitty',
      },
    });
    expect(await detectTerminal(ctx)).toBe('kitty');
  });

  it('treats an empty TERM as unknown', async () => {
    expect(await detectTerminal(fakeContext({ env: { TERM: '' } }))).toBe('unknown');
  });

  it('falls back to TERM', async () => {
    expect(await detectTerminal(fakeContext({ env: { TERM: 'xterm-256color' } }))).toBe('xterm-256color');
  });
});

describe('detectTerminalTheme', () => {
  it('takes the first config that yields colors', async () => {
    const ctx = fakeContext({
      env: { TERM_PROGRAM: 'kitty' },
      files: {
        '/home/tester/.config/kitty/kitty.conf': 'foreground #ffffff\ncolor4 #0000ff\n',
        '/home/tester/.Xresources': '*color4: #ff0000\n',
      },
    });
    const theme = await detectTerminalTheme(ctx);
    expect(theme.terminal).toBe('kitty');
    expect(theme.accent).toEqual({ r: 0, g: 0, b: 255 });
  });

  it('returns an empty theme when nothing is configured', async () => {
    const theme = await detectTerminalTheme(fakeContext({ env: { TERM_PROGRAM: 'test-term' } }));
    expect(theme).toEqual({ terminal: 'test-term', foreground: null, background: null, accent: null, palette: {} });
  });
});
