import { ConfigValueError, type JsonCodecOptions, type JsonValue, mapFromJson, mapToJson } from '@tfcanvas/config-tree';
import { errorMessage, type HclMap, type Logger } from '@tfcanvas/contracts';
import * as fs from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';

import type { WorkspaceState } from './Canvas';

export const DEFAULT_WORKSPACE_FILE = 'tfcanvas.json';

const WORKSPACE_VERSION = 1;

// whole-number floats keep their kind in the file
const CODEC: JsonCodecOptions = { tagFloats: true };

const ConfigObject = z.record(z.unknown());

const WorkspaceFileSchema = z.object({
  version: z.literal(WORKSPACE_VERSION),
  resources: z.array(z.object({ type: z.string().min(1), name: z.string().min(1), config: ConfigObject })).default([]),
  providers: z.record(ConfigObject).default({}),
  backend: z.object({ type: z.string().min(1), settings: ConfigObject.default({}) }).optional(),
});

type WorkspaceFile = z.infer<typeof WorkspaceFileSchema>;

export class WorkspaceFileError extends Error {
  constructor(
    message: string,
    readonly filePath: string
  ) {
    super(`${filePath}: ${message}`);
    this.name = 'WorkspaceFileError';
  }
}

export function defaultWorkspace(): WorkspaceState {
  return {
    resources: [],
    providers: new Map([
      ['aws', mapFromJson({ region: 'us-west-2' })],
      ['azurerm', mapFromJson({ features: {} })],
    ]),
  };
}

function hasCode(error: unknown, code: string): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === code;
}

/** Persists the canvas between invocations as JSON, with a backup of the previous write and an exclusive lock file */
export class WorkspaceStore {
  readonly filePath: string;

  constructor(
    workingDir: string = process.cwd(),
    filename: string = DEFAULT_WORKSPACE_FILE,
    private readonly logger?: Logger
  ) {
    this.filePath = path.join(workingDir, filename);
  }

  get lockFilePath(): string {
    return `${this.filePath}.lock`;
  }

  async exists(): Promise<boolean> {
    try {
      await fs.access(this.filePath);
      return true;
    } catch {
      return false;
    }
  }

  async read(): Promise<WorkspaceState> {
    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf8');
    } catch (error) {
      if (hasCode(error, 'ENOENT')) return defaultWorkspace();
      throw error;
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      throw new WorkspaceFileError(errorMessage(error), this.filePath);
    }

    const parsed = WorkspaceFileSchema.safeParse(data);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ');
      throw new WorkspaceFileError(issues, this.filePath);
    }

    try {
      return this.decode(parsed.data);
    } catch (error) {
      if (error instanceof ConfigValueError) throw new WorkspaceFileError(error.message, this.filePath);
      throw error;
    }
  }

  async write(state: WorkspaceState): Promise<void> {
    if (await this.exists()) await fs.copyFile(this.filePath, `${this.filePath}.bak`);

    await fs.mkdir(path.dirname(this.filePath), { recursive: true });
    await fs.writeFile(this.filePath, `${JSON.stringify(this.encode(state), null, 2)}\n`, 'utf8');
    this.logger?.debug(`Saved ${state.resources.length} resources to ${this.filePath}`);
  }

  async lock(): Promise<void> {
    try {
      await fs.writeFile(this.lockFilePath, String(Date.now()), { flag: 'wx' });
    } catch (error) {
      if (hasCode(error, 'EEXIST')) throw new Error('Workspace is locked by another process.');
      throw error;
    }
  }

  async unlock(): Promise<void> {
    try {
      await fs.unlink(this.lockFilePath);
    } catch (error) {
      // already unlocked
      if (!hasCode(error, 'ENOENT')) throw error;
    }
  }

  /** Holds the lock while `update` runs and always releases it */
  async withLock<T>(update: () => Promise<T>): Promise<T> {
    await this.lock();
    try {
      return await update();
    } finally {
      await this.unlock();
    }
  }

  private decode(file: WorkspaceFile): WorkspaceState {
    const onNull = (where: string) => (field: string) => this.logger?.warn(`${where}: "${field}" is null and will be written as a raw expression`);

    const providers = new Map<string, HclMap>();
    for (const [providerName, settings] of Object.entries(file.providers)) providers.set(providerName, mapFromJson(settings, onNull(providerName), CODEC));

    return {
      resources: file.resources.map((entry) => ({
        resourceType: entry.type,
        resourceName: entry.name,
        config: mapFromJson(entry.config, onNull(entry.name), CODEC),
      })),
      providers,
      backend: file.backend && { backendType: file.backend.type, settings: mapFromJson(file.backend.settings, onNull('backend'), CODEC) },
    };
  }

  private encode(state: WorkspaceState): { [key: string]: JsonValue } {
    const providers: { [key: string]: JsonValue } = {};
    for (const [providerName, settings] of state.providers) providers[providerName] = mapToJson(settings, CODEC);

    const file: { [key: string]: JsonValue } = {
      version: WORKSPACE_VERSION,
      resources: state.resources.map((resource) => ({
        type: resource.resourceType,
        name: resource.resourceName,
        config: mapToJson(resource.config, CODEC),
      })),
      providers,
    };
    if (state.backend) file.backend = { type: state.backend.backendType, settings: mapToJson(state.backend.settings, CODEC) };

    return file;
  }
}
