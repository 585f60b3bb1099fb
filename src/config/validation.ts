import { z } from 'zod';

export const configSchema = z.object({
  server: z.object({
    nodeEnv: z.enum(['development', 'production', 'test']).default('development'),
    logLevel: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  }),
  pipeline: z.object({
    sourceDir: z.string().min(1).default('data/raw_txt'),
    destDir: z.string().min(1).default('data/filtered_data'),
    rulesPath: z.string().min(1).default('config/ingestion.yaml'),
    pathLimit: z.number().int().min(40).default(200),
    parallelThreshold: z.number().int().nonnegative().default(10),
    workerFraction: z.number().gt(0).max(1).default(0.7),
  }),
});

export type Config = z.infer<typeof configSchema>;

const sourceGroupSchema = z.union([z.string().min(1), z.array(z.string().min(1)).min(1)]);

export const ingestionRulesSchema = z.object({
  sourceGroups: z.array(sourceGroupSchema).min(1),
  excludeFolders: z.array(z.string().min(1)).default(['_files']),
  excludeFilePrefixes: z.array(z.string().min(1)).default(['fig_', '~$']),
  excludePathPatterns: z.array(z.string().min(1)).default([]),
});

export type IngestionRulesInput = z.input<typeof ingestionRulesSchema>;

export interface IngestionRules {
  sourceFolders: string[];
  excludeFolders: string[];
  excludeFilePrefixes: string[];
  excludePathPatterns: string[];
}
