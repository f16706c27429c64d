/**
 * Toolchain provisioner.
 *
 * Makes sure a cross toolchain is present in the user-scoped cache,
 * downloading and unpacking it on first use. Installs persist across runs;
 * an installed toolchain is recognised by its compiler executable, so a
 * repeat call does no network I/O.
 *
 * There is no retry and no locking: a failed provision is reported to the
 * caller, who may call ensure() again, and two runs sharing one cache must
 * not overlap.
 */

import { constants, promises as fs } from 'fs';
import os from 'os';
import path from 'path';
import { v4 as uuid } from 'uuid';
import {
  Result,
  ToolNotFoundError,
  describeError,
  err,
  ok,
  provisionDownloadError,
  provisionExtractError,
  provisionInstallDirError,
  provisionVerifyError,
  toolMissingError,
} from '../domain/errors';
import { TargetPlatform } from '../domain/matrix';
import { ToolchainFamily, ToolchainSpec, toolchainLabel } from '../domain/toolchain';
import { ReleaseConfig } from '../config';
import { Logger } from '../logger';
import { ToolRunner, tailOutput } from '../tools/tool-runner';
import { CatalogConfig, resolveToolchain } from './catalog';
import { Downloader } from './downloader';

/** The cell a provision is performed for, used in error messages. */
export interface ProvisionContext {
  platform?: TargetPlatform;
  arch?: string;
}

export interface ProvisionerOptions {
  /** Where bundles are downloaded before extraction. */
  tempDir?: string;
}

export class ToolchainProvisioner {
  private readonly tempDir: string;

  constructor(
    private readonly config: Pick<ReleaseConfig, 'tools'> & CatalogConfig,
    private readonly runner: ToolRunner,
    private readonly downloader: Downloader,
    private readonly log: Logger,
    options: ProvisionerOptions = {},
  ) {
    this.tempDir = options.tempDir ?? os.tmpdir();
  }

  /** Spec of a toolchain, without touching the network or disk. */
  resolve(family: ToolchainFamily, arch?: string): Result<ToolchainSpec> {
    return resolveToolchain(this.config, family, arch);
  }

  /** Whether the toolchain's compiler is already installed. */
  async isInstalled(spec: ToolchainSpec): Promise<boolean> {
    try {
      await fs.access(spec.compilerPath, constants.X_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Ensure the toolchain is installed. Resolves to the compiler path.
   * Install-directory, download and extraction failures are returned, not
   * retried; a missing extraction tool is fatal.
   */
  async ensure(spec: ToolchainSpec, context: ProvisionContext = {}): Promise<Result<string>> {
    const label = toolchainLabel(spec);

    if (await this.isInstalled(spec)) {
      this.log.debug('Toolchain already installed', { toolchain: label, compiler: spec.compilerPath });
      return ok(spec.compilerPath);
    }

    try {
      await fs.mkdir(spec.installDir, { recursive: true });
    } catch (error) {
      return err(provisionInstallDirError(label, spec.installDir, describeError(error), context.platform, context.arch));
    }
    const bundle = path.join(
      this.tempDir,
      `crossforge-${label.replace(/\//g, '-')}-${uuid()}.${spec.archiveFormat === 'zip' ? 'zip' : 'tgz'}`,
    );

    try {
      this.log.info('Downloading toolchain', { toolchain: label, url: spec.sourceUrl, ...context });
      try {
        await this.downloader.download(spec.sourceUrl, bundle);
      } catch (error) {
        return err(provisionDownloadError(label, spec.sourceUrl, describeError(error), context.platform, context.arch));
      }

      this.log.info('Extracting toolchain', { toolchain: label, installDir: spec.installDir, ...context });
      const extracted = await this.extract(spec, bundle, context);
      if (!extracted.success) return extracted;
    } finally {
      await fs.rm(bundle, { force: true });
    }

    if (!(await this.isInstalled(spec))) {
      return err(provisionVerifyError(label, spec.compilerPath, context.platform, context.arch));
    }

    this.log.info('Toolchain ready', { toolchain: label, compiler: spec.compilerPath, ...context });
    return ok(spec.compilerPath);
  }

  private async extract(spec: ToolchainSpec, bundle: string, context: ProvisionContext): Promise<Result<void>> {
    const label = toolchainLabel(spec);
    const invocation =
      spec.archiveFormat === 'zip'
        ? { command: this.config.tools.unzip, args: ['-q', '-o', bundle, '-d', spec.installDir] }
        : {
            command: this.config.tools.tar,
            args: ['xf', bundle, '--strip-components', String(spec.stripComponents), '-C', spec.installDir],
          };

    try {
      const result = await this.runner.run(invocation);
      if (result.exitCode !== 0) {
        return err(
          provisionExtractError(
            label,
            spec.installDir,
            `${invocation.command} exited with code ${result.exitCode}: ${tailOutput(result)}`,
            context.platform,
            context.arch,
          ),
        );
      }
      return ok(undefined);
    } catch (error) {
      if (error instanceof ToolNotFoundError) {
        return err(toolMissingError(error.tool, context.platform, context.arch));
      }
      return err(provisionExtractError(label, spec.installDir, describeError(error), context.platform, context.arch));
    }
  }
}
