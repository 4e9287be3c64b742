import inquirer from 'inquirer';

const CONFIRM_MESSAGES = {
  apply: 'Do you want to perform these actions?',
  destroy: 'Do you really want to destroy all resources?',
} as const;

/** Shows the plan output, then asks unless `autoConfirm` is set */
export async function confirmAction(action: 'apply' | 'destroy', details: string, autoConfirm: boolean): Promise<boolean> {
  if (details) console.log(details);
  if (autoConfirm) return true;

  const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
    {
      type: 'confirm',
      name: 'confirm',
      message: CONFIRM_MESSAGES[action],
      default: false,
    },
  ]);

  return confirm;
}
