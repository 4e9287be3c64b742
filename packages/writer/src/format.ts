import type { HclMap, HclValue } from '@tfcanvas/contracts';
import { listShape } from '@tfcanvas/config-tree';

export const REFERENCE_PREFIXES = ['var.', 'local.', 'module.', 'data.'] as const;

export class HclRenderError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'HclRenderError';
  }
}

export interface FormatOptions {
  escapeStrings: boolean;
}

export function isReference(value: string): boolean {
  return REFERENCE_PREFIXES.some((prefix) => value.startsWith(prefix));
}

export function escapeString(value: string): string {
  return value.replaceAll('\\', '\\\\').replaceAll('"', '\\"').replaceAll('\n', '\\n').replaceAll('\r', '\\r').replaceAll('\t', '\\t');
}

export function formatFloat(value: number): string {
  return Number.isInteger(value) ? value.toFixed(1) : String(value);
}

function formatString(value: string, options: FormatOptions): string {
  if (isReference(value)) return value;
  return `"${options.escapeStrings ? escapeString(value) : value}"`;
}

/** Right-hand side of an attribute. Maps have no inline form here; they are rendered as blocks. */
export function formatInline(value: HclValue, options: FormatOptions): string {
  switch (value.type) {
    case 'String': {
      return formatString(value.value, options);
    }
    case 'Boolean': {
      return value.value ? 'true' : 'false';
    }
    case 'Integer': {
      return String(value.value);
    }
    case 'Float': {
      return formatFloat(value.value);
    }
    case 'Raw': {
      return value.value;
    }
    case 'List': {
      const shape = listShape(value.value);
      if (shape === 'blocks' || shape === 'mixed') throw new HclRenderError('Nested blocks cannot appear inside a list value');
      return `[${value.value.map((item) => formatInline(item, options)).join(', ')}]`;
    }
    case 'Map': {
      throw new HclRenderError('A map cannot appear inside a list value');
    }
  }
}

function formatBlock(key: string, entries: HclMap, indent: number, options: FormatOptions): string {
  const spaces = ' '.repeat(indent);
  return `${spaces}${key} {\n${formatBody(entries, indent + 2, options)}${spaces}}\n`;
}

export function formatAttribute(key: string, value: HclValue, indent: number, options: FormatOptions): string {
  const spaces = ' '.repeat(indent);

  if (value.type === 'Map') return formatBlock(key, value.value, indent, options);

  if (value.type === 'List') {
    const shape = listShape(value.value);
    if (shape === 'empty') return `${spaces}${key} = []\n`;
    if (shape === 'mixed') throw new HclRenderError(`List "${key}" mixes blocks with plain values`);
    if (shape === 'blocks') {
      // One repeated block per element, e.g. several `ingress { ... }`
      let result = '';
      for (const item of value.value) if (item.type === 'Map') result += formatBlock(key, item.value, indent, options);
      return result;
    }
  }

  return `${spaces}${key} = ${formatInline(value, options)}\n`;
}

export function formatBody(entries: HclMap, indent: number, options: FormatOptions): string {
  let result = '';
  for (const [key, value] of entries) result += formatAttribute(key, value, indent, options);
  return result;
}
