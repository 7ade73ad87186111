import { chmodSync, existsSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { errorMessage } from '../../lib/errors.js';
import { SetupStep } from '../step.js';

export const GHSTACK_CONFIG_FILE = '.ghstackrc';

/** Render the ghstack config file body */
export function renderGhstackConfig(token: string, username: string): string {
  return [
    '[ghstack]',
    'github_url = github.com',
    `github_oauth = ${token}`,
    `github_username = ${username}`,
    '',
  ].join('\n');
}

/** Install ghstack as a uv tool */
export class InstallGhstackStep extends SetupStep {
  readonly kind = 'install-ghstack' as const;
  readonly name = 'Install ghstack';
  readonly description = 'Install ghstack for GitHub workflow';

  override isCompleted(): boolean {
    return this.host.commandExists('ghstack');
  }

  async execute(): Promise<boolean> {
    if (this.isCompleted()) return true;
    if (!this.requireCommand('uv', ', cannot install ghstack')) return false;

    const { succeeded, stderr } = await this.host.runInteractive(['uv', 'tool', 'install', 'ghstack']);
    if (succeeded) return true;

    this.console.print(`[red]Failed to install ghstack: ${stderr}[/red]`);
    return false;
  }
}

/** Write ~/.ghstackrc, letting ghstack configure itself first */
export class SetupGhstackStep extends SetupStep {
  readonly kind = 'setup-ghstack' as const;
  readonly name = 'Setup ghstack';
  readonly description = 'Configure ghstack with GitHub authentication';

  get configPath(): string {
    return join(this.host.homeDir, GHSTACK_CONFIG_FILE);
  }

  override isCompleted(): boolean {
    return existsSync(this.configPath);
  }

  async execute(): Promise<boolean> {
    if (!this.requireCommand('ghstack')) return false;

    // ghstack prompts for its own credentials on first run; its exit status is irrelevant here
    await this.host.runInteractive(['ghstack']);
    if (existsSync(this.configPath)) return true;

    this.console.print('[yellow]GitHub Personal Access Token required for ghstack[/yellow]');
    this.console.print('[yellow]Please create a token at: https://github.com/settings/tokens[/yellow]');
    this.console.print('[yellow]Required permissions: repo (full control)[/yellow]');

    const token = (await this.host.promptSecret('Enter your GitHub Personal Access Token:')).trim();
    if (!token) {
      this.console.print('[red]No token provided, skipping ghstack setup[/red]');
      return false;
    }

    const username = (await this.host.promptText('Enter your GitHub username:')).trim();
    if (!username) {
      this.console.print('[red]No username provided, skipping ghstack setup[/red]');
      return false;
    }

    try {
      writeFileSync(this.configPath, renderGhstackConfig(token, username), { mode: 0o600 });
      chmodSync(this.configPath, 0o600);
    } catch (err) {
      this.console.print(`[red]Failed to create ${GHSTACK_CONFIG_FILE}: ${errorMessage(err)}[/red]`);
      return false;
    }

    if (this.verbose) {
      this.console.print(`  Created ${this.configPath}`);
    }
    return true;
  }
}
