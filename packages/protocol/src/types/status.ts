/**
 * heavy: fetched once when the loop starts
 * light: re-fetched on a timer while the loop runs
 */
export type FieldTier = 'heavy' | 'light';

/**
 * Produces an optional status value. `null` means absent.
 */
export type StatusProvider = () => string | null | Promise<string | null>;

/**
 * One named status value in the panel
 */
export interface Field {
  readonly name: string;
  readonly tier: FieldTier;
  readonly label?: string;
  readonly provider: StatusProvider;
  value: string | null;
}
