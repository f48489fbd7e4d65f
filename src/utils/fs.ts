import { mkdir, readFile, stat, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import YAML from 'yaml';

export async function fileExists(path: string): Promise<boolean> {
  try {
    await stat(path);
    return true;
  } catch {
    return false;
  }
}

export async function readText(path: string): Promise<string> {
  return await readFile(path, 'utf8');
}

export async function writeText(path: string, content: string): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
}

/** Parsed YAML, unvalidated. Callers run it through a schema. */
export async function readYaml(path: string): Promise<unknown> {
  const raw = await readText(path);
  return YAML.parse(raw);
}

/** Like `readYaml`, but a missing file reads as `fallback`. */
export async function readYamlIfExists(path: string, fallback: unknown = null): Promise<unknown> {
  if (!(await fileExists(path))) return fallback;
  return await readYaml(path);
}

export async function writeYaml(path: string, value: unknown): Promise<void> {
  const raw = YAML.stringify(value);
  await writeText(path, raw);
}
