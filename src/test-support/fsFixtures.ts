import { mkdtemp, mkdir, writeFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import { basename, dirname, join } from 'path';
import yaml from 'js-yaml';
import type { IngestionRulesInput } from '../config/validation.js';
import type { TextExtractor } from '../services/ingestion/DocumentProcessor.js';

export async function makeTempDir(prefix = 'normalize-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/** Writes `relativePath -> content` pairs below `root`, creating folders as needed. */
export async function writeTree(root: string, files: Record<string, string>): Promise<void> {
  for (const [relativePath, content] of Object.entries(files)) {
    const target = join(root, ...relativePath.split('/'));
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content, 'utf-8');
  }
}

export async function writeRules(path: string, rules: IngestionRulesInput): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, yaml.dump(rules), 'utf-8');
  return path;
}

export const stubExtractor = (textFor: (name: string) => string = name => `text of ${name}`): TextExtractor => ({
  extract: async source => ({
    text: textFor(basename(source.absolutePath)),
    metadata: { fileName: basename(source.absolutePath), fileSize: 0 },
  }),
});
