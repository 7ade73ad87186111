import type { StepKind } from './step.js';
import {
  CheckNodeStep,
  CheckPythonStep,
  InstallGhstackStep,
  InstallLocalPackagesStep,
  InstallUvStep,
  LockPythonVersionStep,
  SetupGhstackStep,
  SyncDependenciesStep,
  type AnySetupStep,
} from './steps/index.js';
import type { LocalPackagesOptions } from './steps/dependencies.js';

// ── Profiles ──

export const DEFAULT_PROFILE: readonly StepKind[] = [
  'check-node',
  'check-python',
  'install-uv',
  'lock-python-version',
];

export const OMNIBUS_PROFILE: readonly StepKind[] = [
  'check-node',
  'check-python',
  'install-uv',
  'lock-python-version',
  'sync-dependencies',
  'install-local-packages',
];

export const WR_CLI_PROFILE: readonly StepKind[] = [
  'check-node',
  'check-python',
  'install-uv',
  'install-ghstack',
  'setup-ghstack',
  'lock-python-version',
];

/** Ordered step kinds for a project. Unknown names get the default profile. */
export function selectProfile(projectName: string): readonly StepKind[] {
  switch (projectName) {
    case 'omnibus': return OMNIBUS_PROFILE;
    case 'wr-cli': return WR_CLI_PROFILE;
    default: return DEFAULT_PROFILE;
  }
}

// ── Step construction ──

export function createStep(kind: StepKind, options: LocalPackagesOptions): AnySetupStep {
  switch (kind) {
    case 'check-node': return new CheckNodeStep(options);
    case 'check-python': return new CheckPythonStep(options);
    case 'install-uv': return new InstallUvStep(options);
    case 'install-ghstack': return new InstallGhstackStep(options);
    case 'setup-ghstack': return new SetupGhstackStep(options);
    case 'lock-python-version': return new LockPythonVersionStep(options);
    case 'sync-dependencies': return new SyncDependenciesStep(options);
    case 'install-local-packages': return new InstallLocalPackagesStep(options);
  }
}

/** Instantiate the profile selected for `projectName` */
export function buildSteps(projectName: string, options: LocalPackagesOptions): AnySetupStep[] {
  return selectProfile(projectName).map((kind) => createStep(kind, options));
}
