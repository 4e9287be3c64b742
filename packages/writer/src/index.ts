export { DEFAULT_DOCUMENT_NAME, DocumentWriter } from './DocumentWriter';
export type { WriteResult } from './DocumentWriter';
export { escapeString, formatFloat, HclRenderError, isReference, REFERENCE_PREFIXES } from './format';
export { DEFAULT_REQUIRED_VERSION, HclWriter, render } from './HclWriter';
export type { HclDocument, HclWriterOptions } from './HclWriter';
export { sanitizeName } from './sanitize';
