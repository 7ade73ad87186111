import { getNodeVersion, getPythonExecutable } from '../../exec/probes.js';
import { SetupStep } from '../step.js';

interface InstallHints {
  darwin: string;
  linux: string;
  windows: string;
  fallback: string;
}

const NODE_HINTS: InstallHints = {
  darwin: 'Node.js not found. Install with: brew install node',
  linux: 'Node.js not found. Install with: sudo apt-get install nodejs npm',
  windows: 'Node.js not found. Download from https://nodejs.org/',
  fallback: 'Node.js not found. Please install Node.js from https://nodejs.org/',
};

const PYTHON_HINTS: InstallHints = {
  darwin: 'Python 3.11+ not found. Install with: brew install python@3.11',
  linux: 'Python 3.11+ not found. Install with: sudo apt-get install python3.11',
  windows: 'Python 3.11+ not found. Download from https://python.org/',
  fallback: 'Python 3.11+ not found. Please install Python 3.11+',
};

export function installHint(hints: InstallHints, platform: string): string {
  switch (platform) {
    case 'darwin': return hints.darwin;
    case 'linux': return hints.linux;
    case 'windows': return hints.windows;
    default: return hints.fallback;
  }
}

/** Ensure Node.js is installed */
export class CheckNodeStep extends SetupStep {
  readonly kind = 'check-node' as const;
  readonly name = 'Check Node.js';
  readonly description = 'Verify Node.js is installed';

  override isCompleted(): boolean {
    return this.host.commandExists('node');
  }

  async execute(): Promise<boolean> {
    if (this.isCompleted()) {
      if (this.verbose) {
        this.console.print(`  Found Node.js ${getNodeVersion(this.host) ?? 'unknown version'}`);
      }
      return true;
    }

    this.console.print(`[yellow]${installHint(NODE_HINTS, this.platform())}[/yellow]`);
    return false;
  }
}

/** Ensure a Python 3.11+ interpreter is on the path */
export class CheckPythonStep extends SetupStep {
  readonly kind = 'check-python' as const;
  readonly name = 'Check Python';
  readonly description = 'Verify Python 3.11+ is installed';

  override isCompleted(): boolean {
    return getPythonExecutable(this.host) !== undefined;
  }

  async execute(): Promise<boolean> {
    const python = getPythonExecutable(this.host);
    if (python) {
      const { succeeded, stdout } = this.host.run([python, '--version']);
      if (succeeded && this.verbose) {
        this.console.print(`  Found ${stdout}`);
      }
      return true;
    }

    this.console.print(`[yellow]${installHint(PYTHON_HINTS, this.platform())}[/yellow]`);
    return false;
  }
}
