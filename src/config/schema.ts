import { z } from 'zod';

const extensionSchema = z
  .string()
  .min(1)
  .transform((ext) => {
    const lower = ext.trim().toLowerCase();
    return lower.startsWith('.') ? lower : `.${lower}`;
  });

const nonEmpty = z.string().trim().min(1);

export const ENTRY_KEYS = ['basename', 'relative-path'] as const;

export type EntryKeyMode = (typeof ENTRY_KEYS)[number];

/**
 * Shape of config.yaml. Keys follow the snake_case layout of the file;
 * loadConfig maps them onto AppConfig.
 */
export const ConfigFileSchema = z.object({
  paths: z.object({
    root_folder: nonEmpty,
    output_folder: nonEmpty,
  }),
  file_types: z.object({
    documents: z.array(extensionSchema).min(1),
    ignore: z.array(extensionSchema).default([]),
  }),
  folders: z.object({
    external: nonEmpty,
    internal: nonEmpty,
    client: nonEmpty,
  }),
  xml: z.object({
    external_file: nonEmpty,
    internal_file: nonEmpty,
    client_file: nonEmpty,
  }),
  tracker: z
    .object({
      file: nonEmpty.default('file_tracker.json'),
    })
    .default({}),
  processing: z
    .object({
      entry_key: z.enum(ENTRY_KEYS).default('basename'),
      exclude: z.array(nonEmpty).default([]),
    })
    .default({}),
  logging: z
    .object({
      level: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    })
    .default({}),
});

export type ConfigFile = z.infer<typeof ConfigFileSchema>;
