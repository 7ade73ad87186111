import { SetupStep } from '../step.js';

const UNIX_INSTALL = ['sh', '-c', 'curl -LsSf https://astral.sh/uv/install.sh | sh'];
const WINDOWS_INSTALL = ['powershell', '-c', 'irm https://astral.sh/uv/install.ps1 | iex'];

/** Install the uv package manager with its official install script */
export class InstallUvStep extends SetupStep {
  readonly kind = 'install-uv' as const;
  readonly name = 'Install uv';
  readonly description = 'Install uv package manager';

  override isCompleted(): boolean {
    return this.host.commandExists('uv');
  }

  async execute(): Promise<boolean> {
    if (this.isCompleted()) return true;

    const script = this.platform() === 'windows' ? WINDOWS_INSTALL : UNIX_INSTALL;
    const { succeeded, stderr } = await this.host.runInteractive(script);

    if (!succeeded) {
      this.console.print('[red]Failed to install uv[/red]');
      if (stderr && this.verbose) {
        this.console.print(`  Error: ${stderr}`);
      }
      return false;
    }

    // The installer may put uv somewhere the current PATH does not cover
    return this.host.commandExists('uv');
  }
}
