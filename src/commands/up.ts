import { CliUx, Flags } from '@oclif/core';
import chalk from 'chalk';
import path from 'path';
import BaseCommand from '../base-command';
import { StackConfig } from '../common/config/stack-config';
import { LifecycleOrchestrator, ReconcileResult, ServiceOutcome } from '../common/lifecycle/orchestrator';
import { Topology } from '../common/lifecycle/topology';
import { ImageBuilder } from '../common/runtime/runtime';

const OUTCOME_COLORS: Record<ServiceOutcome, chalk.Chalk> = {
  unchanged: chalk.gray,
  created: chalk.green,
  started: chalk.green,
  restarted: chalk.yellow,
  recreated: chalk.yellow,
  removed: chalk.green,
  planned: chalk.cyan,
  failed: chalk.red,
  blocked: chalk.red,
};

export const formatResult = (result: ReconcileResult): string[] => {
  const lines: string[] = [];
  for (const service of result.services) {
    let line = `${service.service}: ${OUTCOME_COLORS[service.outcome](service.outcome)} (${service.before} -> ${service.after})`;
    if (service.blocked_by) {
      line += ` waiting on ${service.blocked_by}`;
    }
    if (service.error) {
      line += `\n    ${chalk.red(service.error)}`;
    }
    lines.push(line);
  }
  lines.push(`network ${result.network.name}: ${result.network.outcome}`);
  return lines;
};

export const entrypoints = (config: StackConfig): string[] => {
  const lines: string[] = [];
  if (config.proxy) {
    const proxy_host = `http://localhost:${config.proxy.port}`;
    for (const route of config.proxy.routes) {
      if (route.match === 'regex') {
        continue;
      }
      const route_path = route.path.endsWith('*') ? route.path.slice(0, -1) : route.path;
      lines.push(`${route_path.padEnd(20)} ${proxy_host}${route_path}`);
    }
  }
  for (const service of config.services) {
    if (service.port !== undefined) {
      lines.push(`${service.name.padEnd(20)} http://localhost:${service.port}`);
    }
  }
  return lines;
};

export default class Up extends BaseCommand {
  static description = 'Create, start or repair every service of the stack in dependency order';

  static examples = [
    'stackctl up',
    'stackctl up --config=./deploy/stack.yml --no-build',
    'stackctl up --dry-run --verbose',
  ];

  static flags = {
    ...BaseCommand.flags,
    build: Flags.boolean({
      description: 'Build the images of services with a build context before starting them',
      default: true,
      allowNo: true,
    }),
    'dry-run': Flags.boolean({
      description: 'Print the actions that would run without touching the runtime',
      default: false,
    }),
  };

  async buildImages(config: StackConfig, builder: ImageBuilder, context_dir: string): Promise<void> {
    for (const service of config.services) {
      if (!service.build) {
        continue;
      }
      CliUx.ux.action.start(chalk.blue(`Building ${service.image}`));
      await builder.build(service.image, path.resolve(context_dir, service.build));
      CliUx.ux.action.stop();
    }
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Up);
    const config = await this.loadConfig(flags.config);
    const topology = Topology.fromConfig(config);
    const runtime = this.runtime();
    const dry_run = flags['dry-run'];

    if (flags.build && !dry_run) {
      await runtime.ping();
      await this.buildImages(config, this.imageBuilder(), path.dirname(this.configPath(flags.config)));
    }

    const orchestrator = new LifecycleOrchestrator(runtime, {
      logger: this.createLogger(flags.verbose),
      lock_dir: this.lockDir(flags.config),
    });
    const result = await orchestrator.reconcile(topology, dry_run ? 'dry-run' : 'apply');

    for (const line of formatResult(result)) {
      this.log(line);
    }

    if (!result.ok) {
      this.log(chalk.red(`\n${config.name} is not fully up`));
      this.exit(1);
    }

    if (dry_run) {
      this.log(chalk.cyan(`\n[dry run] ${result.actions.length} action(s) planned, nothing was changed`));
      return;
    }

    this.log(chalk.green(`\n${config.name} is up`));
    const lines = entrypoints(config);
    if (lines.length > 0) {
      this.log('\nEntrypoints:');
      for (const line of lines) {
        this.log(`  ${line}`);
      }
    }
  }
}
