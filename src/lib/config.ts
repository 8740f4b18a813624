import { z } from 'zod';
import { ConfigError } from './errors';

export const FusionConfigSchema = z.object({
  /** Largest edit distance between canonical keys still accepted as a fuzzy match. */
  maxEditDistance: z.number().int().min(0).default(2),
  /** Leading rows inspected when deciding between one and two name columns. */
  layoutSampleRows: z.number().int().min(1).default(5),
  /** Last-resort tier: a single candidate sharing at least one name token. */
  partialTokenMatch: z.boolean().default(true),
  outputSheetName: z.string().trim().min(1).max(31).default('Fusion'),
  highlightColor: z
    .string()
    .regex(/^[0-9A-Fa-f]{8}$/, 'must be an ARGB hex color such as FFFF1111')
    .transform((s) => s.toUpperCase())
    .default('FFFF1111'),
  columnWidth: z.number().positive().default(25),
  unmatchedNotice: z.string().min(1).default('Warning: some rows could not be merged:'),
});

export type FusionConfig = z.output<typeof FusionConfigSchema>;
export type FusionConfigInput = z.input<typeof FusionConfigSchema>;

const ENV_KEYS = {
  FUSION_MAX_EDIT_DISTANCE: 'maxEditDistance',
  FUSION_LAYOUT_SAMPLE_ROWS: 'layoutSampleRows',
  FUSION_PARTIAL_TOKEN_MATCH: 'partialTokenMatch',
  FUSION_SHEET_NAME: 'outputSheetName',
  FUSION_HIGHLIGHT_COLOR: 'highlightColor',
  FUSION_COLUMN_WIDTH: 'columnWidth',
} as const;

const NUMERIC_KEYS = new Set<string>(['maxEditDistance', 'layoutSampleRows', 'columnWidth']);

function parseEnvValue(field: string, raw: string): string | number | boolean {
  if (NUMERIC_KEYS.has(field)) {
    const n = Number(raw.trim());
    return raw.trim() === '' || Number.isNaN(n) ? raw : n;
  }
  if (field === 'partialTokenMatch') {
    const v = raw.trim().toLowerCase();
    if (['1', 'true', 'yes', 'on'].includes(v)) return true;
    if (['0', 'false', 'no', 'off'].includes(v)) return false;
  }
  return raw;
}

export function configFromEnv(env: Record<string, string | undefined>): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [key, field] of Object.entries(ENV_KEYS)) {
    const raw = env[key];
    if (raw === undefined) continue;
    out[field] = parseEnvValue(field, raw);
  }
  return out;
}

export function loadConfig(
  overrides: FusionConfigInput = {},
  env: Record<string, string | undefined> = {},
): FusionConfig {
  const definedOverrides = Object.fromEntries(
    Object.entries(overrides).filter(([, v]) => v !== undefined),
  );
  const parsed = FusionConfigSchema.safeParse({ ...configFromEnv(env), ...definedOverrides });
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((i) => `${i.path.join('.') || 'config'}: ${i.message}`),
    );
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: FusionConfig = FusionConfigSchema.parse({});
