import { errorMessage, type FlatFieldSet, type ScalarValue } from '@tfcanvas/contracts';
import { describeFields, type FieldDescriptor, parseFieldInput } from '@tfcanvas/reconciler';
import chalk from 'chalk';
import { Command } from 'commander';
import inquirer from 'inquirer';

import { type ContextFactory, loadCanvas, updateCanvas } from '../context';

async function promptField(field: FieldDescriptor): Promise<ScalarValue> {
  const message = field.group ? `${field.group} › ${field.label}` : field.label;
  const editor = field.editor;

  if (editor.kind === 'toggle') {
    const { value } = await inquirer.prompt<{ value: boolean }>([{ type: 'confirm', name: 'value', message, default: field.value.value === true }]);
    return { type: 'Boolean', value };
  }

  if (editor.kind === 'choice') {
    const { value } = await inquirer.prompt<{ value: string }>([{ type: 'list', name: 'value', message, choices: editor.options, default: String(field.value.value) }]);
    return { type: 'String', value };
  }

  const { value } = await inquirer.prompt<{ value: string }>([
    {
      type: 'input',
      name: 'value',
      message,
      default: String(field.value.value),
      validate: (input: string) => {
        const result = parseFieldInput(editor, input);
        return result.ok || result.message;
      },
    },
  ]);

  // an untouched raw expression stays raw
  if (field.value.type === 'Raw' && value === field.value.value) return field.value;

  const result = parseFieldInput(editor, value);
  if (!result.ok) throw new Error(`${field.path}: ${result.message}`);
  return result.value;
}

export function createEditCommand(getContext: ContextFactory) {
  return new Command('edit')
    .description('Edit the fields of a resource in a form')
    .argument('<name>', 'Resource name')
    .action(async (name: string) => {
      try {
        const context = await getContext();
        const resource = (await loadCanvas(context)).get(name);
        if (!resource) throw new Error(`No resource named "${name}"`);

        const descriptors = describeFields(resource.config);
        if (descriptors.length === 0) {
          console.log(chalk.yellow(`${name} has no editable fields`));
          return;
        }

        console.log(chalk.bold(`${resource.resourceType}.${resource.resourceName}`));
        const fields: FlatFieldSet = new Map();
        for (const field of descriptors) fields.set(field.path, await promptField(field));

        await updateCanvas(context, (canvas) => {
          const result = canvas.applyEdits(name, fields);
          if (!result.ok) throw new Error(result.message);
        });

        console.log(chalk.green(`✓ Saved ${name}`));
      } catch (error: unknown) {
        console.error(chalk.red('Edit failed:'), errorMessage(error));
        process.exit(1);
      }
    });
}
