import { ResourceCatalog } from '@tfcanvas/catalog';
import type { ICommandRunner, Logger, ResourceConfig } from '@tfcanvas/contracts';
import { WorkspaceStore } from '@tfcanvas/workspace';
import { DocumentWriter } from '@tfcanvas/writer';
import path from 'node:path';
import { vi } from 'vitest';

import type { AppConfig } from '../src/config';
import type { AppContext, ContextFactory } from '../src/context';

export const catalogData = {
  aws_s3_bucket: {
    provider: 'aws',
    defaults: { bucket: 'test-bucket', force_destroy: false, tags: { Environment: 'Dev' } },
    required_fields: ['bucket'],
    popular: true,
    description: 'S3 bucket',
  },
  aws_instance: {
    provider: 'aws',
    defaults: { ami: 'ami-test', instance_type: 't2.micro', count: 1 },
    required_fields: ['ami'],
    popular: false,
    description: 'EC2 instance',
  },
  azurerm_resource_group: {
    provider: 'azurerm',
    defaults: { name: 'test-rg', location: 'East US' },
    required_fields: ['name'],
    popular: true,
  },
};

export function createTestLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

export function createFakeRunner(): ICommandRunner {
  return {
    run: vi.fn(),
    init: vi.fn().mockResolvedValue({ success: true, message: 'initialized' }),
    plan: vi.fn().mockResolvedValue({ success: true, message: 'Plan: 1 to add, 0 to change, 0 to destroy.' }),
    apply: vi.fn().mockResolvedValue({ success: true, message: 'Apply complete! Resources: 1 added.' }),
    destroy: vi.fn().mockResolvedValue({ success: true, message: 'Destroy complete! Resources: 1 destroyed.' }),
  };
}

export function createTestContext(tmpDir: string, runner: ICommandRunner = createFakeRunner()): AppContext {
  const logger = createTestLogger();
  const config: AppConfig = {
    catalogPath: path.join(tmpDir, 'resources.json'),
    outputDir: path.join(tmpDir, 'output'),
    workspaceFile: path.join(tmpDir, 'tfcanvas.json'),
    terraformBin: 'terraform',
    requiredVersion: '>= 1.0.0',
    verbose: false,
  };

  return {
    config,
    logger,
    catalog: ResourceCatalog.fromData(catalogData, logger),
    store: new WorkspaceStore(tmpDir, 'tfcanvas.json', logger),
    writer: new DocumentWriter(config.outputDir, logger),
    runner,
  };
}

export function contextFactory(context: AppContext): ContextFactory {
  return () => Promise.resolve(context);
}

export async function findResource(context: AppContext, name: string): Promise<ResourceConfig | undefined> {
  const state = await context.store.read();
  return state.resources.find((resource) => resource.resourceName === name);
}
