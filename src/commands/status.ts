import chalk from 'chalk';
import Table from 'cli-table3';
import BaseCommand from '../base-command';
import { ServiceState } from '../common/lifecycle/service-state';
import { StateInspector } from '../common/lifecycle/state-inspector';
import { Topology } from '../common/lifecycle/topology';

const STATE_COLORS: Record<ServiceState, chalk.Chalk> = {
  [ServiceState.ABSENT]: chalk.gray,
  [ServiceState.STOPPED]: chalk.yellow,
  [ServiceState.RUNNING]: chalk.green,
  [ServiceState.UNHEALTHY]: chalk.red,
};

export default class Status extends BaseCommand {
  static description = 'Show the state of every service of the stack';

  static examples = [
    'stackctl status',
    'stackctl status --config=./deploy/stack.yml',
  ];

  static flags = {
    ...BaseCommand.flags,
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(Status);
    const config = await this.loadConfig(flags.config);
    const topology = Topology.fromConfig(config);
    const runtime = this.runtime();
    await runtime.ping();
    const inspector = new StateInspector(runtime);

    const table = new Table({ head: ['Service', 'State', 'Health', 'Configuration'], style: { head: ['green'] } });
    for (const service of topology.services) {
      const status = await inspector.status(service.name);
      let configuration = '';
      if (status.state !== ServiceState.ABSENT) {
        const desired_hash = topology.configHash(service, await inspector.imageId(service));
        configuration = status.config_hash === desired_hash ? 'current' : 'outdated';
      }
      table.push([service.name, STATE_COLORS[status.state](status.state), status.health, configuration]);
    }
    this.log(table.toString());

    const network = await inspector.network(topology.network);
    if (network) {
      this.log(`network ${topology.network}: ${network.containers.length} container(s) attached`);
    } else {
      this.log(`network ${topology.network}: ${chalk.gray('absent')}`);
    }
  }
}
