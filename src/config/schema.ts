import { z } from 'zod';

/**
 * Project configuration file (sgr-template.json)
 * Every field is optional; missing fields fall back to DEFAULT_CONFIG
 */
export const ProjectConfigSchema = z
  .object({
    $schema: z.string().optional(),

    // Compilation
    raw: z.boolean().optional(),
    output: z.enum(['text', 'literal', 'escaped']).optional(),

    // Reporting
    verbosity: z.enum(['quiet', 'normal', 'verbose']).optional(),
    enableLog: z.boolean().optional(),
    logDir: z.string().min(1).optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;
