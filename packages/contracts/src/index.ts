/** A single node of a resource configuration tree */
export type HclValue =
  | { type: 'String'; value: string }
  | { type: 'Boolean'; value: boolean }
  | { type: 'Integer'; value: number }
  | { type: 'Float'; value: number }
  | { type: 'List'; value: HclValue[] }
  | { type: 'Map'; value: Map<string, HclValue> }
  | { type: 'Raw'; value: string }; // emitted verbatim, e.g. null

export type HclValueType = HclValue['type'];

export type HclMap = Map<string, HclValue>;

export type ScalarValue = Extract<HclValue, { type: 'String' | 'Boolean' | 'Integer' | 'Float' | 'Raw' }>;

/** Editable leaves keyed by dotted path, e.g. "tags.Environment" */
export type FlatFieldSet = Map<string, ScalarValue>;

export interface ResourceConfig {
  resourceType: string; // e.g. "aws_s3_bucket"
  resourceName: string; // user-assigned, sanitized when rendered
  config: HclMap;
}

export interface ProviderConfig {
  providerName: string;
  settings: HclMap;
}

export interface BackendConfig {
  backendType: string; // e.g. "s3", "azurerm"
  settings: HclMap;
}

/** Catalog entry. Only `defaults` seeds a new resource. */
export interface ResourceTemplate {
  provider: string;
  defaults: HclMap;
  requiredFields: string[];
  popular: boolean;
  description: string;
}

export interface IResourceCatalog {
  getTemplate(resourceType: string): ResourceTemplate | undefined;
  listByProvider(provider: string): Record<string, ResourceTemplate>;
  listGroups(): string[];
  listPopular(limit?: number): string[];
}

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  /** Present when the binary could not be started (ProcessExecutionError) */
  failure?: Failure;
}

/** Outcome of one Terraform step: stdout on success, stderr otherwise */
export interface StepResult {
  success: boolean;
  message: string;
}

/** Contract for anything that can run `terraform <subcommand>` */
export interface ICommandRunner {
  run(subcommand: string, args: string[], cwd?: string): Promise<CommandResult>;
  init(): Promise<StepResult>;
  plan(): Promise<StepResult>;
  apply(autoApprove?: boolean): Promise<StepResult>;
  destroy(autoApprove?: boolean): Promise<StepResult>;
}

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type ErrorKind =
  | 'CatalogLoadError'
  | 'SerializationAmbiguity'
  | 'ProcessExecutionError'
  | 'WriteError'
  | 'FieldInputError'
  | 'WorkspaceError';

export interface Failure {
  ok: false;
  kind: ErrorKind;
  message: string;
}

export type Outcome<T> = ({ ok: true } & T) | Failure;

export function failure(kind: ErrorKind, message: string): Failure {
  return { ok: false, kind, message };
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
