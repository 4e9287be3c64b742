import { cloneMap, mapFromJson } from '@tfcanvas/config-tree';
import { errorMessage, type Failure, failure, type IResourceCatalog, type Logger, type ResourceConfig, type ResourceTemplate } from '@tfcanvas/contracts';
import fs from 'node:fs/promises';
import { fileURLToPath } from 'node:url';

import { CatalogSchema, describeIssues } from './schema';

export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL('../data/resources.json', import.meta.url));

export const DEFAULT_POPULAR_LIMIT = 10;

/**
 * Read-only lookup of resource templates keyed by resource type.
 * Types keep the order in which the catalog file lists them.
 */
export class ResourceCatalog implements IResourceCatalog {
  private readonly templates: Map<string, ResourceTemplate>;
  /** CatalogLoadError for a file that fell back to empty, SerializationAmbiguity per null default */
  readonly issues: readonly Failure[];

  constructor(templates: Map<string, ResourceTemplate> = new Map(), issues: readonly Failure[] = []) {
    this.templates = templates;
    this.issues = issues;
  }

  private static unavailable(source: string, detail: string, logger: Logger): ResourceCatalog {
    const message = `Error loading resources from ${source}: ${detail}`;
    logger.error(message);
    return new ResourceCatalog(new Map(), [failure('CatalogLoadError', message)]);
  }

  /** Never throws: an unreadable or malformed file yields an empty catalog */
  static async load(filePath: string, logger: Logger): Promise<ResourceCatalog> {
    let content: string;
    try {
      content = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      return ResourceCatalog.unavailable(filePath, errorMessage(error), logger);
    }

    let data: unknown;
    try {
      data = JSON.parse(content);
    } catch (error) {
      return ResourceCatalog.unavailable(filePath, errorMessage(error), logger);
    }

    return ResourceCatalog.fromData(data, logger, filePath);
  }

  static fromData(data: unknown, logger: Logger, source: string = 'catalog'): ResourceCatalog {
    const parsed = CatalogSchema.safeParse(data);
    if (!parsed.success) return ResourceCatalog.unavailable(source, describeIssues(parsed.error), logger);

    const templates = new Map<string, ResourceTemplate>();
    const ambiguities: Failure[] = [];
    try {
      for (const [resourceType, entry] of Object.entries(parsed.data)) {
        const defaults = mapFromJson(entry.defaults, (path) => {
          const message = `${resourceType}: "${path}" is null and will be written as a raw expression`;
          logger.warn(message);
          ambiguities.push(failure('SerializationAmbiguity', message));
        });
        templates.set(resourceType, {
          provider: entry.provider,
          defaults,
          requiredFields: entry.required_fields,
          popular: entry.popular,
          description: entry.description,
        });
      }
    } catch (error) {
      return ResourceCatalog.unavailable(source, errorMessage(error), logger);
    }

    logger.debug(`Loaded ${templates.size} resource types`);
    return new ResourceCatalog(templates, ambiguities);
  }

  get size(): number {
    return this.templates.size;
  }

  types(): string[] {
    return [...this.templates.keys()];
  }

  getTemplate(resourceType: string): ResourceTemplate | undefined {
    return this.templates.get(resourceType);
  }

  listByProvider(provider: string): Record<string, ResourceTemplate> {
    const wanted = provider.toLowerCase();
    const result: Record<string, ResourceTemplate> = {};
    for (const [resourceType, template] of this.templates) if (template.provider.toLowerCase() === wanted) result[resourceType] = template;
    return result;
  }

  /** Distinct providers in order of first appearance */
  listGroups(): string[] {
    return [...new Set([...this.templates.values()].map((template) => template.provider))];
  }

  /** Popular types in catalog order. There is no ranking, only the flag. */
  listPopular(limit: number = DEFAULT_POPULAR_LIMIT): string[] {
    const popular = [...this.templates.entries()].filter(([, template]) => template.popular).map(([resourceType]) => resourceType);
    return popular.slice(0, Math.max(0, limit));
  }

  /** New resource seeded with a deep copy of the template defaults */
  instantiate(resourceType: string, resourceName: string): ResourceConfig | undefined {
    const template = this.templates.get(resourceType);
    if (!template) return undefined;

    return { resourceType, resourceName, config: cloneMap(template.defaults) };
  }

  /** Required fields that are absent or empty strings in the resource's config */
  missingRequiredFields(resource: ResourceConfig): string[] {
    const template = this.templates.get(resource.resourceType);
    if (!template) return [];

    return template.requiredFields.filter((field) => {
      const value = resource.config.get(field);
      return value === undefined || (value.type === 'String' && value.value.trim() === '');
    });
  }
}
