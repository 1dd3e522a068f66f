/**
 * Configuration schema using Zod
 */

import { z } from 'zod';

/**
 * Comma separated list from the environment, or an array from code.
 */
const stringList = z
  .union([z.string(), z.array(z.string())])
  .transform((value) =>
    (Array.isArray(value) ? value : value.split(','))
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  );

/**
 * Application configuration schema
 */
export const configSchema = z.object({
  app: z
    .object({
      name: z.string().default('jobsub'),
      version: z.coerce.string().default('0.1.0'),
    })
    .default({}),

  logging: z
    .object({
      // Relative to the working directory unless the command picks its own file
      fileName: z.string().min(1).default('jobsub.log'),
    })
    .default({}),

  server: z
    .object({
      instance: z.string().min(1).default('prod'),
      url: z.string().url().optional(),
      instances: z
        .record(z.string().url())
        .default({
          prod: 'https://jobs.example.org/jobsub',
          preprod: 'https://jobs-preprod.example.org/jobsub',
          dev: 'https://jobs-dev.example.org/jobsub',
        }),
    })
    .default({}),

  upload: z
    .object({
      enabled: z.boolean().default(true),
      timeoutMs: z.number().int().positive().default(30000),
    })
    .default({}),

  plugins: z
    .object({
      modules: stringList.default([]),
      importTimeoutMs: z.number().int().positive().default(5000),
    })
    .default({}),

  support: z
    .object({
      contact: z.string().default('jobsub-support@example.org'),
    })
    .default({}),

  parameters: z
    .object({
      aliasFile: z.string().optional(),
    })
    .default({}),
});

/**
 * Inferred configuration type
 */
export type Config = z.infer<typeof configSchema>;

/**
 * Raw configuration accepted by the schema, before defaults are applied
 */
export type ConfigInput = z.input<typeof configSchema>;

/**
 * Environment variable mapping
 */
export const envMapping: Record<string, string> = {
  JOBSUB_VERSION: 'app.version',
  JOBSUB_LOG_FILE: 'logging.fileName',
  JOBSUB_INSTANCE: 'server.instance',
  JOBSUB_SERVER_URL: 'server.url',
  JOBSUB_UPLOAD_ENABLED: 'upload.enabled',
  JOBSUB_UPLOAD_TIMEOUT_MS: 'upload.timeoutMs',
  JOBSUB_PLUGINS: 'plugins.modules',
  JOBSUB_PLUGIN_TIMEOUT_MS: 'plugins.importTimeoutMs',
  JOBSUB_SUPPORT_CONTACT: 'support.contact',
  JOBSUB_PARAMETER_ALIASES: 'parameters.aliasFile',
};
