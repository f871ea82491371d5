import 'reflect-metadata';
import { Command, Flags } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import untildify from 'untildify';
import { loadStackConfig } from './common/config/loader';
import { StackConfig } from './common/config/stack-config';
import { DockerImageBuilder, DockerRuntime } from './common/runtime/docker-runtime';
import { ContainerRuntime, ImageBuilder } from './common/runtime/runtime';
import { ValidationErrors } from './common/utils/errors';
import { Logger } from './common/utils/logger';
import LocalPaths from './paths';

type CommandError = Error & {
  stderr?: string;
  oclif?: { exit?: number };
};

export default abstract class BaseCommand extends Command {
  static flags = {
    config: Flags.string({
      char: 'c',
      description: 'Path to the stack file',
      env: 'STACKCTL_CONFIG',
      default: LocalPaths.STACK_CONFIG_FILENAME,
    }),
    verbose: Flags.boolean({
      char: 'v',
      description: 'Print every runtime call',
      default: false,
    }),
  };

  // Overridden in tests to swap docker for an in-memory runtime
  runtime(): ContainerRuntime {
    return new DockerRuntime();
  }

  imageBuilder(): ImageBuilder {
    return new DockerImageBuilder();
  }

  configPath(config_flag: string): string {
    return path.resolve(untildify(config_flag));
  }

  /**
   * Directory holding the deployment lock, beside the stack file
   */
  lockDir(config_flag: string): string {
    return path.join(path.dirname(this.configPath(config_flag)), LocalPaths.LOCK_DIRNAME);
  }

  async loadConfig(config_flag: string): Promise<StackConfig> {
    const config_path = this.configPath(config_flag);
    this.debug(`Loading stack file ${config_path}`);
    return loadStackConfig(config_path);
  }

  createLogger(verbose: boolean): Logger {
    return {
      info: (message: string) => this.log(message),
      warn: (message: string) => {
        this.warn(message);
      },
      debug: (message: string) => {
        if (verbose) {
          this.log(chalk.gray(message));
        } else {
          this.debug(message);
        }
      },
    };
  }

  async catch(error: CommandError): Promise<unknown> {
    if (error.oclif && error.oclif.exit === 0) return;
    // this.exit() already carries its code and needs no message
    if (error.oclif && error.oclif.exit !== undefined) {
      return super.catch(error);
    }

    try {
      if (error instanceof ValidationErrors) {
        console.error(chalk.red(error.name));
        for (const validation_error of error.errors) {
          console.error(chalk.red(`  - ${validation_error}`));
        }
        return super.catch({ ...error, message: '' });
      }

      if (error.stderr) {
        error.message += `\nstderr:\n${error.stderr}\n`;
      }

      console.error(chalk.red(error.message));
    } catch {
      this.debug('Unable to add more context to error message');
    }
    // Oclif supers go as the return
    return super.catch(error);
  }
}
