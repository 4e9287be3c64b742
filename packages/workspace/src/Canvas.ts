import type { ResourceCatalog } from '@tfcanvas/catalog';
import { cloneMap } from '@tfcanvas/config-tree';
import { type BackendConfig, failure, type FlatFieldSet, type HclMap, type Outcome, type ResourceConfig } from '@tfcanvas/contracts';
import { type FlattenOptions, reconcile } from '@tfcanvas/reconciler';
import { type HclDocument, HclWriter, type HclWriterOptions, sanitizeName } from '@tfcanvas/writer';

export interface WorkspaceState {
  resources: ResourceConfig[];
  /** Provider name -> settings, in block order */
  providers: Map<string, HclMap>;
  backend?: BackendConfig;
}

export type ResourceOutcome = Outcome<{ resource: ResourceConfig }>;

/** Last underscore-separated segment of the type plus a counter, e.g. aws_s3_bucket -> bucket_0 */
export function defaultResourceName(resourceType: string, index: number): string {
  const suffix = resourceType.split('_').at(-1) ?? resourceType;
  return `${suffix}_${index}`;
}

/**
 * The resources placed on the canvas together with their providers and backend.
 * Names are matched on their sanitized form since that is the label written to HCL.
 */
export class Canvas {
  private readonly resources: ResourceConfig[];
  private readonly providers: Map<string, HclMap>;
  private backend?: BackendConfig;

  constructor(
    private readonly catalog: ResourceCatalog,
    state: WorkspaceState = { resources: [], providers: new Map() }
  ) {
    this.resources = [...state.resources];
    this.providers = new Map(state.providers);
    this.backend = state.backend;
  }

  list(): readonly ResourceConfig[] {
    return this.resources;
  }

  get(name: string): ResourceConfig | undefined {
    const label = sanitizeName(name);
    return this.resources.find((resource) => sanitizeName(resource.resourceName) === label);
  }

  add(resourceType: string, name?: string): ResourceOutcome {
    const resourceName = name ?? this.nextName(resourceType);
    if (this.get(resourceName)) return failure('WorkspaceError', `A resource named "${sanitizeName(resourceName)}" already exists`);

    const resource = this.catalog.instantiate(resourceType, resourceName);
    if (!resource) return failure('WorkspaceError', `Unknown resource type "${resourceType}"`);

    this.resources.push(resource);
    return { ok: true, resource };
  }

  remove(name: string): boolean {
    const resource = this.get(name);
    if (!resource) return false;

    this.resources.splice(this.resources.indexOf(resource), 1);
    return true;
  }

  applyEdits(name: string, fields: FlatFieldSet, options?: FlattenOptions): ResourceOutcome {
    const resource = this.get(name);
    if (!resource) return failure('WorkspaceError', `No resource named "${name}"`);

    resource.config = reconcile(resource.config, fields, options);
    return { ok: true, resource };
  }

  /** Required catalog fields the resource still leaves empty */
  missingFields(name: string): string[] {
    const resource = this.get(name);
    return resource ? this.catalog.missingRequiredFields(resource) : [];
  }

  setProvider(providerName: string, settings: HclMap): void {
    this.providers.set(providerName, cloneMap(settings));
  }

  removeProvider(providerName: string): boolean {
    return this.providers.delete(providerName);
  }

  setBackend(backend: BackendConfig | undefined): void {
    this.backend = backend && { backendType: backend.backendType, settings: cloneMap(backend.settings) };
  }

  toState(): WorkspaceState {
    return { resources: [...this.resources], providers: new Map(this.providers), backend: this.backend };
  }

  toDocument(): HclDocument {
    return { resources: [...this.resources], providers: this.providers, backend: this.backend };
  }

  render(options?: HclWriterOptions): string {
    return new HclWriter(options).render(this.toDocument());
  }

  private nextName(resourceType: string): string {
    let index = this.resources.length;
    while (this.get(defaultResourceName(resourceType, index))) index++;
    return defaultResourceName(resourceType, index);
  }
}
