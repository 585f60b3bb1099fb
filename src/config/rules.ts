import { readFile } from 'fs/promises';
import yaml from 'js-yaml';
import { ZodError } from 'zod';
import { ConfigurationError } from '../utils/errors.js';
import { ingestionRulesSchema, type IngestionRules, type IngestionRulesInput } from './validation.js';

export function parseIngestionRules(raw: unknown): IngestionRules {
  try {
    const parsed = ingestionRulesSchema.parse(raw);
    const sourceFolders = new Set<string>();
    for (const group of parsed.sourceGroups) {
      for (const folder of Array.isArray(group) ? group : [group]) {
        sourceFolders.add(folder);
      }
    }

    return {
      sourceFolders: [...sourceFolders].sort(),
      excludeFolders: parsed.excludeFolders,
      excludeFilePrefixes: parsed.excludeFilePrefixes,
      excludePathPatterns: parsed.excludePathPatterns,
    };
  } catch (error) {
    if (error instanceof ZodError) {
      const issues = error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
      throw new ConfigurationError(`Invalid ingestion rules: ${issues.join('; ')}`, error.issues);
    }
    throw error;
  }
}

export function defineIngestionRules(input: IngestionRulesInput): IngestionRules {
  return parseIngestionRules(input);
}

export async function loadIngestionRules(rulesPath: string): Promise<IngestionRules> {
  let text: string;
  try {
    text = await readFile(rulesPath, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Ingestion rules file not readable: ${rulesPath}`, error);
  }

  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (error) {
    throw new ConfigurationError(`Ingestion rules file is not valid YAML: ${rulesPath}`, error);
  }

  return parseIngestionRules(raw ?? {});
}
