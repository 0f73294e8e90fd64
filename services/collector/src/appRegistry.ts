import { readFile, readdir } from 'node:fs/promises';
import path from 'node:path';

import { parse as parseToml } from 'smol-toml';
import { z } from 'zod';

const APP_FILE_PATTERN = /\.toml$/i;

export const appDescriptorSchema = z
  .object({
    Name: z.string().min(1),
    DefaultMinCores: z.number().int().nonnegative().default(0),
    MaxCores: z.number().int().nonnegative().default(0),
    DefaultVersion: z.coerce.string().nullable().default(null),
    Versions: z.array(z.coerce.string()).default([]),
    MPI: z.boolean().nullable().default(null),
    OpenMP: z.number().int().nonnegative().default(0),
    MaxGPU: z.number().int().nonnegative().default(0),
    DefaultGPU: z.number().int().nonnegative().default(0),
    DefaultCoreWithGPU: z.number().int().default(-1)
  })
  .strict();

export type AppDescriptor = z.infer<typeof appDescriptorSchema>;
export type AppRegistry = Record<string, AppDescriptor>;

export class AppRegistryError extends Error {
  readonly file: string;

  constructor(file: string, message: string) {
    super(`${file}: ${message}`);
    this.name = 'AppRegistryError';
    this.file = file;
  }
}

/** Registry key of a descriptor file: its name up to the first dot. */
export function appKeyFromFile(fileName: string): string {
  return fileName.split('.')[0] ?? fileName;
}

export function parseAppDescriptor(file: string, contents: string): AppDescriptor {
  let raw: unknown;
  try {
    raw = parseToml(contents);
  } catch (err) {
    throw new AppRegistryError(file, `invalid TOML (${err instanceof Error ? err.message : String(err)})`);
  }
  const result = appDescriptorSchema.safeParse(raw);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : '<root>'} ${issue.message}`)
      .join('; ');
    throw new AppRegistryError(file, details);
  }
  return result.data;
}

/** Reads every `*.toml` application descriptor in `directory`; rejects a directory without any. */
export async function loadAppRegistry(directory: string): Promise<AppRegistry> {
  const entries = await readdir(directory, { withFileTypes: true });
  const files = entries
    .filter((entry) => entry.isFile() && APP_FILE_PATTERN.test(entry.name))
    .map((entry) => entry.name)
    .sort();

  if (files.length === 0) {
    throw new AppRegistryError(directory, 'no *.toml application descriptors found');
  }

  const registry: AppRegistry = {};
  for (const file of files) {
    const contents = await readFile(path.join(directory, file), 'utf8');
    registry[appKeyFromFile(file)] = parseAppDescriptor(file, contents);
  }
  return registry;
}
