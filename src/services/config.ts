import fs from 'fs-extra';
import { z } from 'zod';
import { UsageError, describeError } from '../utils/errors';

const spacingGroupSchema = z.object({
  name: z.string(),
  side: z.enum(['left', 'right']),
  members: z.array(z.string()).min(2),
});

const ratioPairSchema = z.object({
  straight: z.string(),
  round: z.string(),
});

export const AuditConfigSchema = z.object({
  startNodeWidthRatio: z.number().positive().default(0.3),
  startNodeMinDistance: z.number().nonnegative().default(100),
  kerningOutlierRatio: z.number().positive().default(0.4),
  kerningEpsilon: z.number().nonnegative().default(0.01),
  stemToleranceRatio: z.number().positive().default(0.1),
  minSpacingTolerance: z.number().nonnegative().default(5),
  referenceRatioBand: z
    .tuple([z.number(), z.number()])
    .refine(([lo, hi]) => lo < hi, 'band must be [low, high]')
    .default([1.2, 2.0]),
  ratioDriftTolerance: z.number().positive().default(0.15),
  sidebearingBand: z.array(z.number().gt(0).lt(1)).min(1).default([0.25, 0.5, 0.75]),
  densityResolution: z.number().positive().default(10),
  spacingGroups: z.array(spacingGroupSchema).default([
    { name: 'lowercase round', side: 'left', members: ['c', 'd', 'e', 'g', 'o', 'q'] },
    { name: 'lowercase straight', side: 'left', members: ['h', 'i', 'k', 'l', 'm', 'n', 'p', 'r'] },
    { name: 'uppercase round', side: 'left', members: ['C', 'G', 'O', 'Q'] },
    { name: 'uppercase straight', side: 'left', members: ['B', 'D', 'E', 'F', 'H', 'I', 'K', 'L', 'N', 'P', 'R'] },
    { name: 'lowercase straight', side: 'right', members: ['d', 'h', 'i', 'l', 'm', 'n', 'q', 'u'] },
    { name: 'lowercase round', side: 'right', members: ['b', 'o', 'p'] },
  ]),
  symmetricGlyphs: z
    .array(z.string())
    .default(['A', 'H', 'I', 'M', 'O', 'T', 'U', 'V', 'W', 'X', 'Y', 'o', 'v', 'w', 'x']),
  ratioPairs: z.array(ratioPairSchema).default([
    { straight: 'n', round: 'o' },
    { straight: 'H', round: 'O' },
  ]),
});

export type AuditConfig = z.infer<typeof AuditConfigSchema>;
export type AuditConfigInput = z.input<typeof AuditConfigSchema>;

export function resolveAuditConfig(overrides: AuditConfigInput = {}, base?: AuditConfig): AuditConfig {
  // undefined must not reset a base value to the schema default
  const defined = Object.fromEntries(Object.entries(overrides).filter(([, value]) => value !== undefined));
  const parsed = AuditConfigSchema.safeParse({ ...base, ...defined });
  if (!parsed.success) {
    throw new UsageError(`Invalid audit configuration: ${parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ')}`);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: AuditConfig = resolveAuditConfig();

export async function loadAuditConfig(configPath?: string): Promise<AuditConfig> {
  if (!configPath) {
    return DEFAULT_CONFIG;
  }
  if (!(await fs.pathExists(configPath))) {
    throw new UsageError(`Config file ${configPath} does not exist`);
  }
  let raw: unknown;
  try {
    raw = await fs.readJson(configPath);
  } catch (error) {
    throw new UsageError(`Error reading config ${configPath}: ${describeError(error)}`);
  }
  const parsed = AuditConfigSchema.safeParse(raw);
  if (!parsed.success) {
    throw new UsageError(`Invalid audit configuration in ${configPath}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
  }
  return parsed.data;
}
