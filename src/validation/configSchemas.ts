import { z } from 'zod';

/**
 * Configuration Validation Schemas
 *
 * Zod schemas for validating the merged (defaults + environment) configuration
 */

const extensionSchema = z.string()
  .min(1, 'Extension must not be empty')
  .regex(/^[a-z0-9_]+$/, 'Extension must be lowercase alphanumeric without a leading dot');

/**
 * ISO 639 code: empty (disabled), two or three letters
 */
export const languageCodeSchema = z.string()
  .regex(/^([a-z]{2,3})?$/i, 'Language code must be empty or a 2/3-letter ISO 639 code');

/**
 * A single directory name inside the working directory
 */
const backupDirNameSchema = z.string()
  .min(1, 'Backup directory name is required')
  .refine(name => !/[\\/]/.test(name), 'Backup directory name must not contain path separators')
  .refine(name => name !== '.' && name !== '..', 'Backup directory name must not be "." or ".."');

export const appConfigSchema = z.object({
  media: z.object({
    videoExtensions: z.array(extensionSchema).min(1, 'At least one video extension is required'),
    subtitleExtensions: z.array(extensionSchema).min(1, 'At least one subtitle extension is required'),
  }),
  matching: z.object({
    strictMovieMode: z.boolean(),
    movieSimilarityThreshold: z.number().min(0).max(1),
    identifierCacheSize: z.number().int().positive(),
  }),
  renaming: z.object({
    languageSuffix: z.string().regex(/^[A-Za-z0-9_-]*$/, 'Language suffix may only contain letters, digits, "-" and "_"'),
    report: z.boolean(),
  }),
  embedding: z.object({
    mergeToolPath: z.string(),
    languageCode: languageCodeSchema,
    defaultTrack: z.boolean(),
    report: z.boolean(),
    backupDirName: backupDirNameSchema,
    containerExtensions: z.array(extensionSchema).min(1),
  }),
  logging: z.object({
    level: z.enum(['error', 'warn', 'info', 'debug']),
    file: z.object({
      enabled: z.boolean(),
      path: z.string().min(1),
      maxSizeMb: z.number().int().positive(),
      maxFiles: z.number().int().positive(),
    }),
    console: z.object({
      enabled: z.boolean(),
      colorize: z.boolean(),
    }),
  }),
});

/**
 * Options accepted by runMergeTransaction / runEmbedBatch
 */
export const mergeOptionsSchema = z.object({
  mergeToolPath: z.string().min(1, 'Merge tool path is required'),
  languageCode: languageCodeSchema.optional().default(''),
  defaultTrack: z.boolean().optional().default(true),
  backupDirName: backupDirNameSchema.optional().default('backups'),
  containerExtensions: z.array(extensionSchema).min(1).optional().default(['mkv']),
  spaceSafetyFactor: z.number().min(1).optional().default(1.1),
});

export type MergeOptionsInput = z.input<typeof mergeOptionsSchema>;
export type MergeOptions = z.output<typeof mergeOptionsSchema>;
