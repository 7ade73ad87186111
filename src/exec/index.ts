export {
  runCommand,
  runCommandInteractive,
  shellQuote,
  formatCommand,
  type ExecutionResult,
  type RunOptions,
  type InteractiveOptions,
} from './process.js';
export {
  commandExists,
  getNodeVersion,
  getPythonExecutable,
  getSystemInfo,
  PYTHON_CANDIDATES,
  type ProbeHost,
  type SystemInfo,
} from './probes.js';
export { createSystemHost, type Host, type SystemHostOptions } from './host.js';
