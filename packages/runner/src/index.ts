export { DeploymentPipeline } from './DeploymentPipeline';
export type { ConfirmFn, PipelineOptions, PipelineOutcome, PipelineResult, PipelineStep, PipelineStepName } from './DeploymentPipeline';
export { execFileExecutor, TerraformRunner } from './TerraformRunner';
export type { ProcessExecutor, ProcessOutput, TerraformRunnerOptions } from './TerraformRunner';
