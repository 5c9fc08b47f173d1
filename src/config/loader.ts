// Config loader: reads an optional YAML file and validates it against RunnerConfigSchema.
// A missing file means defaults; nothing is written to disk.
import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';
import { RunnerError, RunnerErrorCode, causeOf } from '../shared/errors.js';
import { LOG_LEVELS, resolveLogLevel } from '../shared/logger.js';

export const DEFAULT_CONFIG_PATH = path.join(os.homedir(), '.config', 'directive-runner', 'config.yaml');

const defaultLogLevel = () => resolveLogLevel(process.env['LOG_LEVEL']);

export const RunnerConfigSchema = z
  .object({
    delaySuffix: z.enum(['literal', 'strip']).default('literal'),
    waitForDetached: z.boolean().default(false),
    logLevel: z.enum(LOG_LEVELS).default(defaultLogLevel),
    trace: z.boolean().default(true),
  })
  .strict();

export type RunnerConfig = z.infer<typeof RunnerConfigSchema>;

export interface ConfigResult {
  config: RunnerConfig;
  configPath: string;
  /** False when no file existed and defaults were used. */
  fromFile: boolean;
}

export function resolveConfigPath(explicitPath?: string): string {
  return explicitPath ?? process.env['DIRECTIVE_RUNNER_CONFIG'] ?? DEFAULT_CONFIG_PATH;
}

export function parseConfig(yamlText: string, configPath: string): RunnerConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (err) {
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, `Invalid YAML in ${configPath}`, {
      path: configPath,
      cause: causeOf(err),
    });
  }

  const result = RunnerConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw new RunnerError(RunnerErrorCode.INVALID_CONFIG, `Invalid configuration in ${configPath}`, {
      path: configPath,
      issues: result.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`),
    });
  }
  return result.data;
}

export async function loadConfig(explicitPath?: string): Promise<ConfigResult> {
  const configPath = resolveConfigPath(explicitPath);
  let text: string;
  try {
    text = await fs.readFile(configPath, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return { config: RunnerConfigSchema.parse({}), configPath, fromFile: false };
    }
    throw err;
  }
  return { config: parseConfig(text, configPath), configPath, fromFile: true };
}
