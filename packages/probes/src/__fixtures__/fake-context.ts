import type { ProbeContext } from '../context.js';

export interface FakeSystem {
  commands?: Record<string, string>;
  files?: Record<string, string>;
  dirs?: Record<string, string[]>;
  binaries?: string[];
  env?: Record<string, string>;
  home?: string;
  ppid?: number;
}

/**
 * In-memory ProbeContext. Unknown commands and files read as absent.
 */
export function fakeContext(system: FakeSystem = {}): ProbeContext & { ran: string[] } {
  const ran: string[] = [];
  const files = system.files ?? {};

  return {
    ran,
    env: system.env ?? {},
    home: system.home ?? '/home/tester',
    ppid: system.ppid ?? 4242,
    async run(command) {
      ran.push(command);
      return system.commands?.[command] ?? null;
    },
    async readText(file) {
      return files[file] ?? null;
    },
    async list(dir) {
      return system.dirs?.[dir] ?? [];
    },
    exists(file) {
      return file in files;
    },
    which(binary) {
      return system.binaries?.includes(binary) ?? false;
    },
  };
}
