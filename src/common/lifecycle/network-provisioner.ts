import { ContainerRuntime } from '../runtime/runtime';
import { StateInspector } from './state-inspector';

export type NetworkOutcome = 'unchanged' | 'created' | 'removed' | 'absent' | 'in-use' | 'planned';

export interface NetworkResult {
  name: string;
  outcome: NetworkOutcome;
  containers?: string[];
}

export class NetworkProvisioner {
  constructor(private readonly runtime: ContainerRuntime, private readonly inspector: StateInspector) { }

  async ensureNetwork(name: string, options: { dry_run?: boolean } = {}): Promise<NetworkResult> {
    if (await this.inspector.network(name)) {
      return { name, outcome: 'unchanged' };
    }
    if (options.dry_run) {
      return { name, outcome: 'planned' };
    }
    await this.runtime.createNetwork(name);
    return { name, outcome: 'created' };
  }

  /**
   * Removes the network unless a container outside of `released` is still attached to it.
   */
  async removeNetwork(name: string, options: { dry_run?: boolean, released?: string[] } = {}): Promise<NetworkResult> {
    const network = await this.inspector.network(name);
    if (!network) {
      return { name, outcome: 'absent' };
    }

    const released = new Set(options.released || []);
    const remaining = network.containers.filter(container => !released.has(container));
    if (remaining.length > 0) {
      return { name, outcome: 'in-use', containers: remaining };
    }
    if (options.dry_run) {
      return { name, outcome: 'planned' };
    }
    await this.runtime.removeNetwork(name);
    return { name, outcome: 'removed' };
  }
}
