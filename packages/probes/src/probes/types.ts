import type { FieldTier } from '@loopfetch/protocol';
import type { ProbeContext } from '../context.js';

export type Probe = (ctx: ProbeContext) => string | null | Promise<string | null>;

/**
 * One row of the provider table
 */
export interface ProbeEntry {
  name: string;
  tier: FieldTier;
  label?: string;
  probe: Probe;
}
