import { map, str } from '@tfcanvas/config-tree';
import fs from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { afterEach, beforeEach, describe, expect, it, type MockInstance, vi } from 'vitest';

import { createBackendCommand } from '../src/commands/backend';
import { createInitCommand } from '../src/commands/init';
import { createProviderCommand } from '../src/commands/provider';
import type { AppContext } from '../src/context';
import { contextFactory, createTestContext } from './helpers';

vi.mock('chalk', () => ({
  default: {
    green: vi.fn((msg) => msg),
    yellow: vi.fn((msg) => msg),
    red: vi.fn((msg) => msg),
  },
}));

describe('CLI: provider and backend commands', () => {
  let tmpDir: string;
  let context: AppContext;
  let logSpy: MockInstance<typeof console.log>;
  let errorSpy: MockInstance<typeof console.error>;
  let exitSpy: MockInstance<typeof process.exit>;

  const run = (command: { parseAsync(argv: string[]): Promise<unknown> }, ...args: string[]) => command.parseAsync(['node', 'tfcanvas', ...args]);

  beforeEach(async () => {
    vi.clearAllMocks();
    tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), 'cli-settings-test-'));
    context = createTestContext(tmpDir);
    logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    exitSpy = vi.spyOn(process, 'exit').mockImplementation((() => {}) as never);
    await run(createInitCommand(contextFactory(context)));
  });

  afterEach(async () => {
    logSpy.mockRestore();
    errorSpy.mockRestore();
    exitSpy.mockRestore();
    await fs.rm(tmpDir, { recursive: true, force: true });
  });

  describe('provider', () => {
    it('should update provider settings', async () => {
      await run(createProviderCommand(contextFactory(context)), 'aws', 'region=eu-west-1', 'profile=test');

      expect((await context.store.read()).providers.get('aws')).toEqual(map({ region: str('eu-west-1'), profile: str('test') }).value);
      expect(logSpy).toHaveBeenCalledWith('✓ Updated provider aws');
    });

    it('should add a new provider after the existing ones', async () => {
      await run(createProviderCommand(contextFactory(context)), 'google', 'project=test-project');

      const { providers } = await context.store.read();
      expect([...providers.keys()]).toEqual(['aws', 'azurerm', 'google']);
      expect(providers.get('google')).toEqual(map({ project: str('test-project') }).value);
    });

    it('should remove a provider', async () => {
      await run(createProviderCommand(contextFactory(context)), 'azurerm', '--remove');

      expect([...(await context.store.read()).providers.keys()]).toEqual(['aws']);
      expect(logSpy).toHaveBeenCalledWith('✓ Removed provider azurerm');
    });

    it('should fail to remove an unknown provider', async () => {
      await run(createProviderCommand(contextFactory(context)), 'google', '--remove');

      expect(errorSpy).toHaveBeenCalledWith('Provider failed:', 'No provider named "google"');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });

  describe('backend', () => {
    it('should set the backend', async () => {
      await run(createBackendCommand(contextFactory(context)), 's3', 'bucket=state', 'key=main.tfstate');

      expect((await context.store.read()).backend).toEqual({ backendType: 's3', settings: map({ bucket: str('state'), key: str('main.tfstate') }).value });
      expect(logSpy).toHaveBeenCalledWith('✓ Updated backend s3');
    });

    it('should merge settings of the same backend type', async () => {
      await run(createBackendCommand(contextFactory(context)), 's3', 'bucket=state');
      await run(createBackendCommand(contextFactory(context)), 's3', 'key=main.tfstate');

      expect((await context.store.read()).backend?.settings).toEqual(map({ bucket: str('state'), key: str('main.tfstate') }).value);
    });

    it('should start over when the type changes', async () => {
      await run(createBackendCommand(contextFactory(context)), 's3', 'bucket=state');
      await run(createBackendCommand(contextFactory(context)), 'azurerm', 'container_name=tfstate');

      expect((await context.store.read()).backend).toEqual({ backendType: 'azurerm', settings: map({ container_name: str('tfstate') }).value });
    });

    it('should clear the backend', async () => {
      await run(createBackendCommand(contextFactory(context)), 's3', 'bucket=state');
      await run(createBackendCommand(contextFactory(context)), '--clear');

      expect((await context.store.read()).backend).toBeUndefined();
      expect(logSpy).toHaveBeenCalledWith('✓ Removed backend');
    });

    it('should require a type', async () => {
      await run(createBackendCommand(contextFactory(context)));

      expect(errorSpy).toHaveBeenCalledWith('Backend failed:', 'A backend type is required');
      expect(exitSpy).toHaveBeenCalledWith(1);
    });
  });
});
