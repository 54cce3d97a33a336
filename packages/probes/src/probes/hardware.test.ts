import { describe, it, expect } from 'vitest';
import { fakeContext } from '../__fixtures__/fake-context.js';
import { battery, cpu, packages, powerAdapter } from './hardware.js';

describe('packages', () => {
  it('lists counts for installed managers only', async () => {
    const ctx = fakeContext({
      binaries: ['pacman', 'flatpak'],
      commands: { 'pacman -Qq | wc -l': '812', 'flatpak list --app | wc -l': '4' },
    });
    expect(await packages(ctx)).toBe('pacman:812, flatpak:4');
  });

  it('is absent without any manager', async () => {
    expect(await packages(fakeContext())).toBeNull();
  });
});

describe('cpu', () => {
  it('reads the model from /proc/cpuinfo', async () => {
    const ctx = fakeContext({ files: { '/proc/cpuinfo': 'model name\t: Test CPU 8-Core\n' } });
    expect(await cpu(ctx)).toBe('Test CPU 8-Core');
  });
});

describe('battery', () => {
  it('reads capacity and status from sysfs', async () => {
    const ctx = fakeContext({
      dirs: { '/sys/class/power_supply': ['AC', 'BAT0'] },
      files: {
        '/sys/class/power_supply/BAT0/capacity': '87\n',
        '/sys/class/power_supply/BAT0/status': 'Charging\n',
      },
    });
    expect(await battery(ctx)).toBe('87% (Charging)');
  });

  it('is absent on machines without a battery', async () => {
    const ctx = fakeContext({ dirs: { '/sys/class/power_supply': ['AC'] } });
    expect(await battery(ctx)).toBeNull();
  });
});

describe('powerAdapter', () => {
  it('reports AC when an adapter is present', async () => {
    expect(await powerAdapter(fakeContext({ dirs: { '/sys/class/power_supply': ['ACAD', 'BAT1'] } }))).toBe('AC');
  });

  it('is absent otherwise', async () => {
    expect(await powerAdapter(fakeContext())).toBeNull();
  });
});
