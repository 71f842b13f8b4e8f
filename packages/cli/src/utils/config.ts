import fs from 'fs';
import path from 'path';
import yaml from 'js-yaml';
import { z } from 'zod';
import { FORMAT_KEYS } from '@lintlens/core';

export const CONFIG_DIR = '.lintlens';
const CONFIG_FILES = ['lintlens.config.json', 'lintlens.config.yml', 'lintlens.config.yaml'];

export const ProjectConfigSchema = z
  .object({
    format: z.enum(FORMAT_KEYS).optional(),
    root: z.string().min(1).optional(),
    output: z.enum(['table', 'json']).optional(),
    failOnViolations: z.boolean().optional(),
  })
  .strict();

export type ProjectConfig = z.infer<typeof ProjectConfigSchema>;

export interface LoadedConfig {
  config: ProjectConfig;
  /** Directory that contains `.lintlens/` */
  projectRoot: string;
  configPath: string;
}

function findConfigFile(directory: string): string | null {
  for (const name of CONFIG_FILES) {
    const candidate = path.join(directory, CONFIG_DIR, name);
    if (fs.existsSync(candidate)) {
      return candidate;
    }
  }
  return null;
}

function readConfigFile(configPath: string): unknown {
  const content = fs.readFileSync(configPath, 'utf-8');
  try {
    return configPath.endsWith('.json') ? JSON.parse(content) : yaml.load(content);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Failed to parse config file: ${configPath}: ${reason}`, { cause: error });
  }
}

/**
 * Searches up the directory tree for `.lintlens/lintlens.config.{json,yml,yaml}`.
 */
export async function loadProjectConfig(searchPath?: string): Promise<LoadedConfig | null> {
  let currentPath = path.resolve(searchPath || process.cwd());

  while (currentPath !== path.dirname(currentPath)) {
    const configPath = findConfigFile(currentPath);

    if (configPath) {
      // An empty YAML file loads as undefined
      const raw = readConfigFile(configPath) ?? {};
      const parsed = ProjectConfigSchema.safeParse(raw);
      if (!parsed.success) {
        const problems = parsed.error.issues
          .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
          .join('; ');
        throw new Error(`Invalid config file ${configPath}: ${problems}`);
      }
      return { config: parsed.data, projectRoot: currentPath, configPath };
    }

    currentPath = path.dirname(currentPath);
  }

  return null;
}

export function getProjectRoot(searchPath?: string): string | null {
  let currentPath = path.resolve(searchPath || process.cwd());

  while (currentPath !== path.dirname(currentPath)) {
    if (findConfigFile(currentPath)) {
      return currentPath;
    }
    currentPath = path.dirname(currentPath);
  }

  return null;
}

export interface CommandOptions {
  format?: string;
  root?: string;
  output?: string;
  failOnViolations?: boolean;
}

export interface ResolvedSettings {
  format: string;
  workingRoot: string;
  output: 'table' | 'json';
  failOnViolations: boolean;
  projectRoot: string | null;
}

/**
 * Merges command-line options over project config. Command-line values win;
 * a `root` from config is taken relative to the project root.
 */
export function resolveSettings(options: CommandOptions, loaded: LoadedConfig | null, cwd: string = process.cwd()): ResolvedSettings {
  const config = loaded?.config ?? {};

  const format = options.format ?? config.format;
  if (!format) {
    throw new Error('No format given. Pass --format <format> or set "format" in the project config.');
  }

  const output = options.output ?? config.output ?? 'table';
  if (output !== 'table' && output !== 'json') {
    throw new Error(`Unsupported output format: ${output} (expected table or json)`);
  }

  let workingRoot = cwd;
  if (options.root) {
    workingRoot = path.resolve(cwd, options.root);
  } else if (config.root && loaded) {
    workingRoot = path.resolve(loaded.projectRoot, config.root);
  }

  return {
    format,
    workingRoot,
    output,
    failOnViolations: options.failOnViolations ?? config.failOnViolations ?? false,
    projectRoot: loaded?.projectRoot ?? null,
  };
}
