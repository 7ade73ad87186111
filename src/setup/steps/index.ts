import type { CheckNodeStep, CheckPythonStep } from './runtimes.js';
import type { InstallUvStep } from './uv.js';
import type { InstallGhstackStep, SetupGhstackStep } from './ghstack.js';
import type { LockPythonVersionStep } from './python-version.js';
import type { InstallLocalPackagesStep, SyncDependenciesStep } from './dependencies.js';

export { CheckNodeStep, CheckPythonStep } from './runtimes.js';
export { InstallUvStep } from './uv.js';
export { InstallGhstackStep, SetupGhstackStep } from './ghstack.js';
export { LockPythonVersionStep } from './python-version.js';
export { InstallLocalPackagesStep, SyncDependenciesStep } from './dependencies.js';

/** Every concrete setup step */
export type AnySetupStep =
  | CheckNodeStep
  | CheckPythonStep
  | InstallUvStep
  | InstallGhstackStep
  | SetupGhstackStep
  | LockPythonVersionStep
  | SyncDependenciesStep
  | InstallLocalPackagesStep;
