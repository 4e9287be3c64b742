import { ResourceCatalog } from '@tfcanvas/catalog';
import type { ICommandRunner, Logger } from '@tfcanvas/contracts';
import { TerraformRunner } from '@tfcanvas/runner';
import { Canvas, WorkspaceStore } from '@tfcanvas/workspace';
import { DocumentWriter } from '@tfcanvas/writer';
import path from 'node:path';

import type { AppConfig } from './config';
import { createConsoleLogger } from './logger';

/** Everything a command needs, built once per invocation by the entry point */
export interface AppContext {
  config: AppConfig;
  logger: Logger;
  catalog: ResourceCatalog;
  store: WorkspaceStore;
  writer: DocumentWriter;
  runner: ICommandRunner;
}

export type ContextFactory = () => Promise<AppContext>;

export async function createContext(config: AppConfig, logger: Logger = createConsoleLogger({ verbose: config.verbose })): Promise<AppContext> {
  const catalog = await ResourceCatalog.load(config.catalogPath, logger);

  return {
    config,
    logger,
    catalog,
    store: new WorkspaceStore(path.dirname(config.workspaceFile), path.basename(config.workspaceFile), logger),
    writer: new DocumentWriter(config.outputDir, logger),
    runner: new TerraformRunner({ workingDir: config.outputDir, logger, terraformBin: config.terraformBin }),
  };
}

export async function loadCanvas(context: AppContext): Promise<Canvas> {
  return new Canvas(context.catalog, await context.store.read());
}

/** Read, change and save the workspace while holding its lock */
export async function updateCanvas<T>(context: AppContext, change: (canvas: Canvas) => T): Promise<T> {
  return context.store.withLock(async () => {
    const canvas = await loadCanvas(context);
    const result = change(canvas);
    await context.store.write(canvas.toState());
    return result;
  });
}

/** Logs a warning for every resource that still leaves required fields empty */
export function warnMissingFields(context: AppContext, canvas: Canvas): void {
  for (const resource of canvas.list()) {
    const missing = canvas.missingFields(resource.resourceName);
    if (missing.length > 0) context.logger.warn(`${resource.resourceType}.${resource.resourceName} is missing required fields: ${missing.join(', ')}`);
  }
}

/** Renders the canvas into the output directory and returns the file path */
export async function writeDocument(context: AppContext, canvas: Canvas): Promise<string> {
  warnMissingFields(context, canvas);

  const result = await context.writer.write(canvas.render({ requiredVersion: context.config.requiredVersion }));
  if (!result.ok) throw new Error(result.message);
  return result.path;
}
