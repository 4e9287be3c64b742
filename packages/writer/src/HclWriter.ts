import type { BackendConfig, HclMap, ProviderConfig, ResourceConfig } from '@tfcanvas/contracts';

import { formatAttribute, formatBody, type FormatOptions } from './format';
import { sanitizeName } from './sanitize';

export const DEFAULT_REQUIRED_VERSION = '>= 1.0.0';

export interface HclWriterOptions {
  /** Value of `required_version` in the terraform block */
  requiredVersion?: string;
  /** Escape quotes, backslashes and control characters inside quoted strings (default true) */
  escapeStrings?: boolean;
}

export interface HclDocument {
  resources: ResourceConfig[];
  /** Provider name -> settings, rendered in iteration order */
  providers: ReadonlyMap<string, HclMap>;
  /** When present, a terraform block is emitted first */
  backend?: BackendConfig;
}

export class HclWriter {
  private readonly requiredVersion: string;
  private readonly formatOptions: FormatOptions;

  constructor(options: HclWriterOptions = {}) {
    this.requiredVersion = options.requiredVersion ?? DEFAULT_REQUIRED_VERSION;
    this.formatOptions = { escapeStrings: options.escapeStrings ?? true };
  }

  renderTerraformBlock(backend?: BackendConfig): string {
    let block = `terraform {\n${formatAttribute('required_version', { type: 'String', value: this.requiredVersion }, 2, this.formatOptions)}`;

    if (backend && backend.backendType && backend.settings.size > 0) {
      block += `  backend "${backend.backendType}" {\n`;
      block += formatBody(backend.settings, 4, this.formatOptions);
      block += '  }\n';
    }

    return `${block}}\n`;
  }

  renderProviderBlock(provider: ProviderConfig): string {
    return `provider "${provider.providerName}" {\n${formatBody(provider.settings, 2, this.formatOptions)}}\n`;
  }

  renderResourceBlock(resource: ResourceConfig): string {
    const safeName = sanitizeName(resource.resourceName);
    return `resource "${resource.resourceType}" "${safeName}" {\n${formatBody(resource.config, 2, this.formatOptions)}}\n`;
  }

  /** Whole document: terraform block, providers, resources, separated by one blank line */
  render(document: HclDocument): string {
    const blocks: string[] = [];

    if (document.backend) blocks.push(this.renderTerraformBlock(document.backend));
    for (const [providerName, settings] of document.providers) blocks.push(this.renderProviderBlock({ providerName, settings }));
    for (const resource of document.resources) blocks.push(this.renderResourceBlock(resource));

    return blocks.join('\n');
  }
}

export function render(resources: ResourceConfig[], providers: ReadonlyMap<string, HclMap>, backend?: BackendConfig, options?: HclWriterOptions): string {
  return new HclWriter(options).render({ resources, providers, backend });
}
