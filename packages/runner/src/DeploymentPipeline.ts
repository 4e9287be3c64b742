import type { ICommandRunner, Logger, StepResult } from '@tfcanvas/contracts';

export type PipelineStepName = 'init' | 'plan' | 'confirm' | 'apply' | 'destroy';

export interface PipelineStep extends StepResult {
  name: PipelineStepName;
}

export type PipelineOutcome = 'applied' | 'destroyed' | 'declined' | 'failed';

export interface PipelineResult {
  outcome: PipelineOutcome;
  steps: PipelineStep[];
  /** Message of the last step that ran */
  message: string;
}

/**
 * Decides whether a destructive step may go ahead.
 * `details` holds the plan output before an apply.
 */
export type ConfirmFn = (action: 'apply' | 'destroy', details: string) => boolean | Promise<boolean>;

export interface PipelineOptions {
  confirm: ConfirmFn;
}

/** init -> plan -> confirm -> apply, stopping at the first step that does not succeed */
export class DeploymentPipeline {
  constructor(
    private readonly runner: ICommandRunner,
    private readonly logger: Logger
  ) {}

  async deploy(options: PipelineOptions): Promise<PipelineResult> {
    const steps: PipelineStep[] = [];

    const init = await this.record(steps, 'init', () => this.runner.init());
    if (!init.success) return this.finish('failed', steps);

    const plan = await this.record(steps, 'plan', () => this.runner.plan());
    if (!plan.success) return this.finish('failed', steps);

    if (!(await this.confirm(steps, 'apply', plan.message, options.confirm))) return this.finish('declined', steps);

    const apply = await this.record(steps, 'apply', () => this.runner.apply(true));
    return this.finish(apply.success ? 'applied' : 'failed', steps);
  }

  async destroy(options: PipelineOptions): Promise<PipelineResult> {
    const steps: PipelineStep[] = [];

    if (!(await this.confirm(steps, 'destroy', '', options.confirm))) return this.finish('declined', steps);

    const destroy = await this.record(steps, 'destroy', () => this.runner.destroy(true));
    return this.finish(destroy.success ? 'destroyed' : 'failed', steps);
  }

  private async record(steps: PipelineStep[], name: PipelineStepName, execute: () => Promise<StepResult>): Promise<PipelineStep> {
    const result = await execute();
    const step = { name, ...result };
    steps.push(step);

    if (result.success) this.logger.info(`terraform ${name} succeeded`);
    else this.logger.error(`terraform ${name} failed`);

    return step;
  }

  private async confirm(steps: PipelineStep[], action: 'apply' | 'destroy', details: string, confirm: ConfirmFn): Promise<boolean> {
    const approved = await confirm(action, details);
    steps.push({ name: 'confirm', success: approved, message: approved ? `${action} approved` : `${action} declined` });
    return approved;
  }

  private finish(outcome: PipelineOutcome, steps: PipelineStep[]): PipelineResult {
    return { outcome, steps, message: steps.at(-1)?.message ?? '' };
  }
}
