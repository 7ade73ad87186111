export { SetupRunner, DEFAULT_PROJECT_NAME, type SetupRunnerOptions, type StepDescription } from './runner.js';
export { SetupStep, STEP_KINDS, type StepKind, type StepOptions } from './step.js';
export {
  selectProfile,
  createStep,
  buildSteps,
  DEFAULT_PROFILE,
  OMNIBUS_PROFILE,
  WR_CLI_PROFILE,
} from './profiles.js';
export * from './steps/index.js';
