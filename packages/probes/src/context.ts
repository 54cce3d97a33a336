import { exec } from 'child_process';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { promisify } from 'util';
import { PROBE_TIMEOUT_MS } from '@loopfetch/protocol';

const execAsync = promisify(exec);

/**
 * Everything a probe may touch. Probes never reach the system any other way,
 * so tests can hand them a fake.
 */
export interface ProbeContext {
  /** Run a shell command; trimmed stdout, or null on failure, timeout or empty output */
  run(command: string): Promise<string | null>;
  /** File contents, or null when unreadable */
  readText(file: string): Promise<string | null>;
  /** Directory entries, or an empty list when unreadable */
  list(dir: string): Promise<string[]>;
  exists(file: string): boolean;
  /** Whether an executable is on PATH */
  which(binary: string): boolean;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly home: string;
  /** Process id of whatever launched us */
  readonly ppid: number;
}

export interface ProbeContextOptions {
  timeoutMs?: number;
  env?: Readonly<Record<string, string | undefined>>;
  home?: string;
}

/**
 * Context backed by the real machine
 */
export function createProbeContext(options: ProbeContextOptions = {}): ProbeContext {
  const timeout = options.timeoutMs ?? PROBE_TIMEOUT_MS;
  const env = options.env ?? process.env;
  const home = options.home ?? os.homedir();

  return {
    env,
    home,
    ppid: process.ppid,

    async run(command) {
      try {
        const { stdout } = await execAsync(command, { timeout, encoding: 'utf-8' });
        const out = stdout.trim();
        return out.length > 0 ? out : null;
      } catch {
        // Missing binaries, non-zero exits and timeouts all read as absent
        return null;
      }
    },

    async readText(file) {
      try {
        return await fs.promises.readFile(file, 'utf-8');
      } catch {
        return null;
      }
    },

    async list(dir) {
      try {
        return await fs.promises.readdir(dir);
      } catch {
        return [];
      }
    },

    exists(file) {
      return fs.existsSync(file);
    },

    which(binary) {
      const dirs = (env.PATH ?? '').split(path.delimiter).filter(Boolean);
      return dirs.some((dir) => {
        try {
          fs.accessSync(path.join(dir, binary), fs.constants.X_OK);
          return true;
        } catch {
          return false;
        }
      });
    },
  };
}
