import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const PackageInfoSchema = z.object({
  name: z.string(),
  version: z.string(),
});

let cachedVersion: string | null = null;

/**
 * Version from the app's package.json, found from either src/ or the build output
 */
export function getVersion(): string {
  if (cachedVersion) return cachedVersion;

  const __dirname = path.dirname(fileURLToPath(import.meta.url));
  const locations = [
    path.join(__dirname, '../package.json'), // apps/fetch/src
    path.join(__dirname, '../../../../apps/fetch/package.json'), // dist/apps/fetch/src
  ];

  for (const loc of locations) {
    if (!fs.existsSync(loc)) continue;
    try {
      const parsed = PackageInfoSchema.safeParse(JSON.parse(fs.readFileSync(loc, 'utf-8')));
      if (parsed.success) {
        cachedVersion = parsed.data.version;
        return cachedVersion;
      }
    } catch (error) {
      console.warn('Failed to read package.json:', error);
    }
  }

  // Fallback
  cachedVersion = '0.0.0-dev';
  return cachedVersion;
}
