export { choiceOptions, describeField, describeFields, fieldLabel, INT_MAX, INT_MIN, isEnumeratedKey, parseFieldInput } from './editors';
export type { FieldDescriptor, FieldEditor, FieldInputResult } from './editors';
export { DEFAULT_MAX_DEPTH, splitPath } from './paths';
export type { FlattenOptions } from './paths';
export { flatten, listGroups, reassemble, reconcile } from './reconcile';
