import { existsSync, statSync } from 'node:fs';
import { join, relative, resolve } from 'node:path';
import { SetupStep, type StepOptions } from '../step.js';

export const LOCKFILE = 'uv.lock';
export const MANIFEST = 'pyproject.toml';
export const DEFAULT_LOCAL_PACKAGES = ['omnibus', 'parsley'];

/** True when the lockfile exists and is at least as new as the manifest */
export function isLockfileFresh(cwd: string): boolean {
  const lockfile = join(cwd, LOCKFILE);
  const manifest = join(cwd, MANIFEST);
  if (!existsSync(lockfile) || !existsSync(manifest)) return false;
  return statSync(lockfile).mtimeMs >= statSync(manifest).mtimeMs;
}

/** Run `uv sync` when the lockfile is missing or older than pyproject.toml */
export class SyncDependenciesStep extends SetupStep {
  readonly kind = 'sync-dependencies' as const;
  readonly name = 'Sync dependencies';
  readonly description = 'Install and sync project dependencies';

  override isCompleted(): boolean {
    return isLockfileFresh(this.host.cwd);
  }

  async execute(): Promise<boolean> {
    if (!this.requireCommand('uv')) return false;

    const { succeeded, stderr } = await this.host.runInteractive(['uv', 'sync'], { showCommand: false });
    if (succeeded) return true;

    this.console.print(`[red]Failed to sync dependencies: ${stderr}[/red]`);
    return false;
  }
}

export interface LocalPackagesOptions extends StepOptions {
  packages?: string[];
}

/**
 * Add sibling package directories as editable dependencies.
 *
 * Always re-runs. Missing directories and directories without a pyproject.toml
 * are skipped; the step fails only if nothing was added while at least one
 * directory existed.
 */
export class InstallLocalPackagesStep extends SetupStep {
  readonly kind = 'install-local-packages' as const;
  readonly name = 'Install local packages';
  readonly packages: readonly string[];

  constructor(options: LocalPackagesOptions) {
    super(options);
    this.packages = options.packages && options.packages.length > 0
      ? [...options.packages]
      : DEFAULT_LOCAL_PACKAGES;
  }

  get description(): string {
    return `Install ${this.packages.join(', ')} from local directories`;
  }

  async execute(): Promise<boolean> {
    if (!this.requireCommand('uv')) return false;

    let added = 0;
    for (const pkg of this.packages) {
      const dir = resolve(this.host.cwd, pkg);
      if (!existsSync(dir)) {
        if (this.verbose) this.console.print(`  ${pkg}/ directory not found, skipping`);
        continue;
      }
      if (!existsSync(join(dir, MANIFEST))) {
        if (this.verbose) this.console.print(`  ${pkg}/ has no ${MANIFEST}, skipping`);
        continue;
      }

      const { succeeded, stderr } = await this.host.runInteractive(
        ['uv', 'add', '--editable', `./${relative(this.host.cwd, dir)}`],
        { showCommand: false },
      );
      if (succeeded) {
        added++;
        if (this.verbose) this.console.print(`  Added ${pkg} as editable dependency`);
      } else {
        this.console.print(`[red]Failed to add ${pkg}: ${stderr}[/red]`);
      }
    }

    return added > 0 || this.packages.every((pkg) => !existsSync(resolve(this.host.cwd, pkg)));
  }
}
