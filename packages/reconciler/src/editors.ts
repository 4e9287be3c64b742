import { failure, type HclMap, type Outcome, type ScalarValue } from '@tfcanvas/contracts';

import fieldChoices from '../data/field-choices.json';
import { type FlattenOptions, resolveDepth, visitLeaves } from './paths';

export const INT_MIN = -2_147_483_648;
export const INT_MAX = 2_147_483_647;

export type FieldEditor =
  | { kind: 'toggle' }
  | { kind: 'integer'; min: number; max: number }
  | { kind: 'real'; min: number; max: number }
  | { kind: 'text' }
  | { kind: 'choice'; options: string[] };

export interface FieldDescriptor {
  path: string;
  key: string;
  label: string;
  group?: string;
  value: ScalarValue;
  editor: FieldEditor;
}

const KNOWN_CHOICES = new Map<string, string[]>(Object.entries(fieldChoices));
const GENERIC_CHOICE_KEYS = new Set(['tier', 'size', 'type']);

export function isEnumeratedKey(key: string): boolean {
  return KNOWN_CHOICES.has(key) || GENERIC_CHOICE_KEYS.has(key) || key.endsWith('_type');
}

/** Known options for the key; a current value outside them is offered first */
export function choiceOptions(key: string, current: string): string[] {
  const known = KNOWN_CHOICES.get(key);
  if (!known) return [current];
  return known.includes(current) ? [...known] : [current, ...known];
}

export function describeField(key: string, value: ScalarValue): FieldEditor {
  switch (value.type) {
    case 'Boolean': {
      return { kind: 'toggle' };
    }
    case 'Integer': {
      return { kind: 'integer', min: INT_MIN, max: INT_MAX };
    }
    case 'Float': {
      return { kind: 'real', min: INT_MIN, max: INT_MAX };
    }
    case 'String': {
      return isEnumeratedKey(key) ? { kind: 'choice', options: choiceOptions(key, value.value) } : { kind: 'text' };
    }
    case 'Raw': {
      return { kind: 'text' };
    }
  }
}

export function fieldLabel(key: string): string {
  return key
    .split('_')
    .filter((word) => word.length > 0)
    .map((word) => word[0].toUpperCase() + word.slice(1))
    .join(' ');
}

export function describeFields(config: HclMap, options?: FlattenOptions): FieldDescriptor[] {
  const fields: FieldDescriptor[] = [];
  visitLeaves(config, resolveDepth(options), ({ path, key, group, value }) => {
    fields.push({ path, key, label: fieldLabel(key), group, value, editor: describeField(key, value) });
  });
  return fields;
}

const TRUE_WORDS = new Set(['true', 'yes', 'y', 'on', '1']);
const FALSE_WORDS = new Set(['false', 'no', 'n', 'off', '0']);

export type FieldInputResult = Outcome<{ value: ScalarValue }>;

function inRange(value: number, editor: { min: number; max: number }): boolean {
  return value >= editor.min && value <= editor.max;
}

/** Converts text typed by a user into a value the editor accepts */
export function parseFieldInput(editor: FieldEditor, input: string): FieldInputResult {
  const text = input.trim();

  switch (editor.kind) {
    case 'toggle': {
      const word = text.toLowerCase();
      if (TRUE_WORDS.has(word)) return { ok: true, value: { type: 'Boolean', value: true } };
      if (FALSE_WORDS.has(word)) return { ok: true, value: { type: 'Boolean', value: false } };
      return failure('FieldInputError', `Expected true or false, got "${input}"`);
    }
    case 'integer': {
      if (!/^[+-]?\d+$/.test(text)) return failure('FieldInputError', `Expected a whole number, got "${input}"`);
      const value = Number(text);
      if (!inRange(value, editor)) return failure('FieldInputError', `${text} is outside ${editor.min}..${editor.max}`);
      return { ok: true, value: { type: 'Integer', value } };
    }
    case 'real': {
      const value = Number(text);
      if (text === '' || !Number.isFinite(value)) return failure('FieldInputError', `Expected a number, got "${input}"`);
      if (!inRange(value, editor)) return failure('FieldInputError', `${text} is outside ${editor.min}..${editor.max}`);
      return { ok: true, value: { type: 'Float', value } };
    }
    case 'choice':
    case 'text': {
      return { ok: true, value: { type: 'String', value: input } };
    }
  }
}
