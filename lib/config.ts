// Configuration - defaults, YAML config file loading and validation

import { readFile } from 'fs/promises';
import { existsSync } from 'fs';
import { parse } from 'yaml';
import { z } from 'zod';
import { ConfigError, describeCause } from './errors';

const identifier = z.string().regex(/^[A-Za-z_]\w*$/, 'must be a plain identifier');

export const textPatchSchema = z.object({
  find: z.string().min(1),
  replace: z.string(),
  when: z.string().min(1).optional(),
  appendLine: z.string().optional(),
  once: z.boolean().optional(),
}).strict();

export const patchListSchema = z.array(textPatchSchema);

export const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);
export const reportFormatSchema = z.enum(['pretty', 'plain', 'json']);

export const configSchema = z.object({
  runtimeHeader: z.string().min(1).default('#include <omp.h>'),
  directive: z.string().min(1).default('#pragma omp parallel for'),
  returnTypes: z.array(identifier).min(1).default(['void', 'int', 'double', 'float', 'unsigned', 'char', 'long']),
  inductionTypes: z.array(identifier).min(1).default(['int']),
  ioKeywords: z.array(z.string().min(1)).default(['cout', 'cin', 'cerr', 'printf', 'scanf', 'iostream']),
  skipAnnotated: z.boolean().default(false),
  patches: patchListSchema.default([]),
  logging: z.object({
    level: logLevelSchema.default('info'),
    format: reportFormatSchema.default('pretty'),
  }).strict().default({}),
}).strict();

export type OmpliftConfig = z.infer<typeof configSchema>;
export type LogLevel = z.infer<typeof logLevelSchema>;
export type ReportFormat = z.infer<typeof reportFormatSchema>;

export const DEFAULT_CONFIG_FILE = '.omplift.yaml';

/**
 * Built-in configuration, used when no config file is present
 */
export function defaultConfig(): OmpliftConfig {
  return configSchema.parse({});
}

/**
 * Validate a raw config object (parsed YAML or programmatic input)
 */
export function resolveConfig(raw: unknown, source = '<inline>'): OmpliftConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new ConfigError(source, formatIssues(result.error));
  }
  return result.data;
}

/**
 * Load configuration from a YAML file.
 * A missing file yields the defaults unless `required` is set.
 */
export async function loadConfig(
  filePath: string = DEFAULT_CONFIG_FILE,
  options: { required?: boolean } = {}
): Promise<OmpliftConfig> {
  if (!existsSync(filePath)) {
    if (options.required) {
      throw new ConfigError(filePath, ['file not found']);
    }
    return defaultConfig();
  }

  return resolveConfig(await readYaml(filePath), filePath);
}

/**
 * Load a standalone patch list (YAML or JSON, JSON being valid YAML)
 */
export async function loadPatches(filePath: string): Promise<OmpliftConfig['patches']> {
  if (!existsSync(filePath)) {
    throw new ConfigError(filePath, ['file not found']);
  }

  const result = patchListSchema.safeParse(await readYaml(filePath));
  if (!result.success) {
    throw new ConfigError(filePath, formatIssues(result.error));
  }
  return result.data;
}

async function readYaml(filePath: string): Promise<unknown> {
  try {
    const content = await readFile(filePath, 'utf-8');
    return parse(content) ?? {};
  } catch (error) {
    throw new ConfigError(filePath, [describeCause(error)]);
  }
}

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => {
    const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${where}: ${issue.message}`;
  });
}
