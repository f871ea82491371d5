import { ServiceConfig } from '../config/stack-config';
import { ContainerHealth, ContainerRuntime, NetworkInspection } from '../runtime/runtime';
import { ServiceState, stateFromInspection } from './service-state';
import { CONFIG_HASH_LABEL } from './topology';

export interface ServiceStatus {
  state: ServiceState;
  health: ContainerHealth;
  config_hash?: string;
}

/**
 * Read-only view of the runtime. Each reconciliation step asks once and acts on the answer.
 */
export class StateInspector {
  constructor(private readonly runtime: ContainerRuntime) { }

  async status(service: string): Promise<ServiceStatus> {
    const inspection = await this.runtime.inspect(service);
    return {
      state: stateFromInspection(inspection),
      health: inspection?.health || 'none',
      config_hash: inspection?.labels[CONFIG_HASH_LABEL],
    };
  }

  /**
   * Id of the image a built service runs. Services that pull their image are judged by the tag alone.
   */
  async imageId(service: ServiceConfig): Promise<string | undefined> {
    return service.build ? this.runtime.imageId(service.image) : undefined;
  }

  async network(name: string): Promise<NetworkInspection | undefined> {
    return this.runtime.inspectNetwork(name);
  }
}
