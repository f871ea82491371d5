import { Flags } from '@oclif/core';
import chalk from 'chalk';
import inquirer from 'inquirer';
import BaseCommand from '../base-command';
import { DESTROY_CONFIRMATION_PHRASE, LifecycleOrchestrator } from '../common/lifecycle/orchestrator';
import { Topology } from '../common/lifecycle/topology';
import PromptUtils from '../common/utils/prompt-utils';
import { formatResult } from './up';

export const DESTROY_CANCELLED_EXIT_CODE = 3;

export default class Destroy extends BaseCommand {
  static description = 'Stop and remove every service of the stack, then its network';

  static examples = [
    'stackctl destroy',
    'stackctl destroy --auto-approve',
    'stackctl destroy --dry-run',
  ];

  static flags = {
    ...BaseCommand.flags,
    'auto-approve': Flags.boolean({
      description: `Skip typing '${DESTROY_CONFIRMATION_PHRASE}' to confirm`,
      default: false,
    }),
    'dry-run': Flags.boolean({
      description: 'Print what would be removed without touching the runtime',
      default: false,
    }),
  };

  async confirm(topology: Topology): Promise<string> {
    this.log(chalk.yellow('This will stop and remove the following containers:'));
    for (const service of topology.reversed()) {
      this.log(`  - ${service.name}`);
    }
    this.log(chalk.yellow('and the network:'));
    this.log(`  - ${topology.network}`);

    if (!PromptUtils.promptsAvailable()) {
      throw new Error('--auto-approve flag is required when prompts are unavailable');
    }
    const answers: { confirmation: string } = await inquirer.prompt([{
      type: 'input',
      name: 'confirmation',
      message: `Type '${DESTROY_CONFIRMATION_PHRASE}' to confirm:`,
    }]);
    return answers.confirmation.trim();
  }

  async run(): Promise<void> {
    const { flags } = await this.parse(Destroy);
    const config = await this.loadConfig(flags.config);
    const topology = Topology.fromConfig(config);
    const dry_run = flags['dry-run'];

    let confirmation: string | undefined;
    if (flags['auto-approve']) {
      confirmation = DESTROY_CONFIRMATION_PHRASE;
    } else if (!dry_run) {
      confirmation = await this.confirm(topology);
      if (confirmation !== DESTROY_CONFIRMATION_PHRASE) {
        this.log('Destruction cancelled');
        this.exit(DESTROY_CANCELLED_EXIT_CODE);
      }
    }

    const orchestrator = new LifecycleOrchestrator(this.runtime(), {
      logger: this.createLogger(flags.verbose),
      lock_dir: this.lockDir(flags.config),
    });
    const result = await orchestrator.reconcile(topology, 'destroy', { dry_run, confirmation });

    for (const line of formatResult(result)) {
      this.log(line);
    }

    if (!result.ok) {
      this.exit(1);
    }
    if (dry_run) {
      this.log(chalk.cyan(`\n[dry run] ${result.actions.length} action(s) planned, nothing was removed`));
    } else {
      this.log(chalk.green(`\n${config.name} destroyed`));
    }
  }
}
