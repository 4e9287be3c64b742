import { DEFAULT_CATALOG_PATH } from '@tfcanvas/catalog';
import { DEFAULT_WORKSPACE_FILE } from '@tfcanvas/workspace';
import { DEFAULT_REQUIRED_VERSION } from '@tfcanvas/writer';
import path from 'node:path';
import { z } from 'zod';

export const DEFAULT_OUTPUT_DIR = 'output';

const BooleanFlag = z.union([z.boolean(), z.enum(['true', 'false', '1', '0']).transform((flag) => flag === 'true' || flag === '1')]);

export const AppConfigSchema = z.object({
  catalogPath: z.string().min(1),
  outputDir: z.string().min(1),
  workspaceFile: z.string().min(1),
  terraformBin: z.string().min(1),
  requiredVersion: z.string().min(1),
  verbose: BooleanFlag,
});

export type AppConfig = z.output<typeof AppConfigSchema>;

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export interface ConfigOverrides {
  verbose?: boolean;
}

/**
 * Defaults overlaid with TFCANVAS_* environment variables.
 * Paths are resolved against `cwd`.
 */
export function loadConfig(cwd: string = process.cwd(), env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): AppConfig {
  const parsed = AppConfigSchema.safeParse({
    catalogPath: env.TFCANVAS_CATALOG ?? DEFAULT_CATALOG_PATH,
    outputDir: env.TFCANVAS_OUTPUT_DIR ?? DEFAULT_OUTPUT_DIR,
    workspaceFile: env.TFCANVAS_WORKSPACE_FILE ?? DEFAULT_WORKSPACE_FILE,
    terraformBin: env.TFCANVAS_TERRAFORM_BIN ?? 'terraform',
    requiredVersion: env.TFCANVAS_REQUIRED_VERSION ?? DEFAULT_REQUIRED_VERSION,
    verbose: overrides.verbose ?? env.TFCANVAS_VERBOSE ?? false,
  });

  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid configuration: ${issues.join('; ')}`);
  }

  const config = parsed.data;
  return {
    ...config,
    catalogPath: path.resolve(cwd, config.catalogPath),
    outputDir: path.resolve(cwd, config.outputDir),
    workspaceFile: path.resolve(cwd, config.workspaceFile),
  };
}
