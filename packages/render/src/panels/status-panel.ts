import { ProviderUnavailable } from '@loopfetch/protocol';
import type { Field, Rgb, StyledLine } from '@loopfetch/protocol';
import { STYLE } from '../ansi/codes.js';
import { fgRgb } from '../ansi/colors.js';

/**
 * Fields drawn as their bare value, without a label
 */
export const BARE_FIELDS: ReadonlySet<string> = new Set(['title', 'separator', 'colors', 'break']);

/**
 * A field as registered, before any value is fetched
 */
export type FieldDefinition = Omit<Field, 'value'>;

export interface PanelStyle {
  /** Label color; labels are only bold when absent */
  accent: Rgb | null;
}

export const DEFAULT_PANEL_STYLE: PanelStyle = { accent: null };

/**
 * Called when a provider throws. The field is shown as absent either way.
 */
export type UnavailableHandler = (error: ProviderUnavailable) => void;

export function labelFor(field: Pick<Field, 'name' | 'label'>): string {
  if (field.label) return field.label;
  return field.name.charAt(0).toUpperCase() + field.name.slice(1);
}

/**
 * Render present fields in order; absent ones are skipped
 */
export function buildLines(fields: readonly Field[], style: PanelStyle = DEFAULT_PANEL_STYLE): StyledLine[] {
  const emphasis = STYLE.bold + (style.accent ? fgRgb(style.accent) : '');
  const lines: StyledLine[] = [];

  for (const field of fields) {
    if (field.value === null) continue;
    if (BARE_FIELDS.has(field.name)) {
      lines.push(field.value);
      continue;
    }
    lines.push(`${emphasis}${labelFor(field)}:${STYLE.reset} ${field.value}`);
  }

  return lines;
}

async function fetchValue(field: Field, onUnavailable?: UnavailableHandler): Promise<string | null> {
  try {
    return (await field.provider()) ?? null;
  } catch (error) {
    onUnavailable?.(new ProviderUnavailable(field.name, { cause: error }));
    return null;
  }
}

/**
 * Re-query every light field in place. One failing provider never stops
 * the others; it only leaves its own field absent.
 */
export async function refreshLight(fields: readonly Field[], onUnavailable?: UnavailableHandler): Promise<void> {
  for (const field of fields) {
    if (field.tier !== 'light') continue;
    field.value = await fetchValue(field, onUnavailable);
  }
}

/**
 * Fetch every field once, heavy and light alike
 */
export async function populate(fields: readonly Field[], onUnavailable?: UnavailableHandler): Promise<void> {
  for (const field of fields) {
    field.value = await fetchValue(field, onUnavailable);
  }
}

/**
 * Ordered status fields with their current values
 */
export class StatusPanel {
  private readonly fields: readonly Field[];
  private style: PanelStyle;
  private onUnavailable: UnavailableHandler | undefined;

  constructor(
    definitions: readonly FieldDefinition[],
    options: { style?: PanelStyle; onUnavailable?: UnavailableHandler } = {}
  ) {
    this.fields = Object.freeze(definitions.map((definition) => ({ ...definition, value: null })));
    this.style = options.style ?? DEFAULT_PANEL_STYLE;
    this.onUnavailable = options.onUnavailable;
  }

  populate(): Promise<void> {
    return populate(this.fields, this.onUnavailable);
  }

  refreshLight(): Promise<void> {
    return refreshLight(this.fields, this.onUnavailable);
  }

  lines(): StyledLine[] {
    return buildLines(this.fields, this.style);
  }

  setStyle(style: PanelStyle): void {
    this.style = style;
  }

  getFields(): readonly Field[] {
    return this.fields;
  }
}
