import type { FlatFieldSet, HclMap } from '@tfcanvas/contracts';
import { describeFields, type FieldEditor, parseFieldInput, reconcile } from '@tfcanvas/reconciler';

const TEXT_EDITOR: FieldEditor = { kind: 'text' };

/**
 * Parses `path=value` pairs against the fields already present in `config`.
 * A value is converted with the editor of the existing field; new paths are text.
 */
export function parseAssignments(config: HclMap, assignments: string[]): FlatFieldSet {
  const editors = new Map(describeFields(config).map((field) => [field.path, field.editor]));
  const fields: FlatFieldSet = new Map();

  for (const assignment of assignments) {
    const separator = assignment.indexOf('=');
    if (separator <= 0) throw new Error(`Expected <field>=<value>, got "${assignment}"`);

    const fieldPath = assignment.slice(0, separator).trim();
    const result = parseFieldInput(editors.get(fieldPath) ?? TEXT_EDITOR, assignment.slice(separator + 1));
    if (!result.ok) throw new Error(`${fieldPath}: ${result.message}`);

    fields.set(fieldPath, result.value);
  }

  return fields;
}

/** `config` with the assignments merged in; the input map is left untouched */
export function applyAssignments(config: HclMap, assignments: string[]): HclMap {
  return reconcile(config, parseAssignments(config, assignments));
}
