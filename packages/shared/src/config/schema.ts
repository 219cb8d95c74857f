import { z } from 'zod';

/**
 * Target platform of the Xcode project. Omitted means every platform.
 */
export const PlatformTypeSchema = z.enum(['iOS', 'macOS', 'tvOS', 'watchOS']);
export type PlatformType = z.infer<typeof PlatformTypeSchema>;

export const CarthageConfigSchema = z
  .object({
    cache: z.boolean().default(false),
    archive: z.boolean().default(false),
    serializeDebugging: z.boolean().default(false),
    executable: z.string().min(1).default('carthage'),
  })
  .default({
    cache: false,
    archive: false,
    serializeDebugging: false,
    executable: 'carthage',
  });
export type CarthageConfig = z.infer<typeof CarthageConfigSchema>;

export const XcodeConfigSchema = z
  .object({
    version: z.string().min(1).optional(),
    majorVersion: z.number().int().positive().optional(),
    applicationsDir: z.string().default('/Applications'),
  })
  .default({ applicationsDir: '/Applications' });
export type XcodeConfig = z.infer<typeof XcodeConfigSchema>;

export const ConfigSchema = z.object({
  configVersion: z.literal(1).default(1),
  platform: PlatformTypeSchema.optional(),
  derivedDataPath: z.string().min(1).default('build/DerivedData'),
  carthage: CarthageConfigSchema,
  xcode: XcodeConfigSchema,
});

export type Config = z.infer<typeof ConfigSchema>;
/** Config as written in `.cartwright.yaml` or passed as flags, before defaults. */
export type ConfigInput = z.input<typeof ConfigSchema>;
