/**
 * Trim the quotes and spaces gsettings/dconf put around values
 */
export function stripQuotes(value: string | null): string | null {
  if (value === null) return null;
  const stripped = value.replace(/^['"\s]+|['"\s]+$/g, '');
  return stripped.length > 0 ? stripped : null;
}

/**
 * Value of the first `key = value` line whose key contains `key`
 */
export function iniValue(text: string | null, key: string): string | null {
  if (text === null) return null;
  for (const line of text.split('\n')) {
    if (!line.includes(key)) continue;
    const eq = line.indexOf('=');
    if (eq === -1) continue;
    const value = line.slice(eq + 1).trim();
    if (value) return value;
  }
  return null;
}

/**
 * Everything after the first space of the first line starting with `prefix`
 */
export function prefixedLine(text: string | null, prefix: string): string | null {
  if (text === null) return null;
  for (const raw of text.split('\n')) {
    const line = raw.trim();
    if (line.startsWith(prefix)) {
      const value = line.slice(prefix.length).trim();
      if (value) return value;
    }
  }
  return null;
}

/**
 * `PRETTY_NAME` from an os-release file
 */
export function parseOsRelease(text: string | null): string | null {
  if (text === null) return null;
  const match = /^PRETTY_NAME="?([^"\n]+)"?/m.exec(text);
  return match?.[1] ?? null;
}

/**
 * `model name` from /proc/cpuinfo
 */
export function parseCpuModel(text: string | null): string | null {
  if (text === null) return null;
  const match = /^model name\s*:\s*(.+)$/m.exec(text);
  return match?.[1]?.trim() ?? null;
}

/**
 * Compact uptime, largest unit first
 */
export function formatUptime(totalSeconds: number): string {
  const totalMinutes = Math.floor(totalSeconds / 60);
  const minutes = totalMinutes % 60;
  const totalHours = Math.floor(totalMinutes / 60);
  const hours = totalHours % 24;
  const days = Math.floor(totalHours / 24);

  if (days) return `${days}d ${hours}h ${minutes}m`;
  if (hours) return `${hours}h ${minutes}m`;
  return `${minutes}m`;
}
