import hash from 'object-hash';
import { ServiceConfig, StackConfig } from '../config/stack-config';
import { DependencyCycleError } from '../errors/lifecycle-errors';
import { ContainerSpec } from '../runtime/runtime';

export const STACK_LABEL = 'stackctl.stack';
export const CONFIG_HASH_LABEL = 'stackctl.config-hash';

/**
 * The services of one deployment, ordered so that every service comes after the services it depends on.
 * Among independent services the declaration order is kept.
 */
export class Topology {
  readonly name: string;
  readonly network: string;
  readonly services: readonly ServiceConfig[];
  private readonly services_map: Map<string, ServiceConfig>;

  static fromConfig(config: StackConfig): Topology {
    return new Topology(config.name, config.network, config.services);
  }

  constructor(name: string, network: string, services: readonly ServiceConfig[]) {
    this.name = name;
    this.network = network;
    this.services_map = new Map(services.map(service => [service.name, service]));
    this.services = this.sortByDependencies(services);
  }

  private sortByDependencies(services: readonly ServiceConfig[]): ServiceConfig[] {
    const sorted: ServiceConfig[] = [];
    const visited = new Set<string>();
    const path: string[] = [];

    const visit = (service: ServiceConfig) => {
      if (visited.has(service.name)) {
        return;
      }
      const cycle_start = path.indexOf(service.name);
      if (cycle_start >= 0) {
        throw new DependencyCycleError([...path.slice(cycle_start), service.name]);
      }

      path.push(service.name);
      for (const dependency of service.depends_on) {
        visit(this.get(dependency));
      }
      path.pop();

      visited.add(service.name);
      sorted.push(service);
    };

    for (const service of services) {
      visit(service);
    }
    return sorted;
  }

  get(name: string): ServiceConfig {
    const service = this.services_map.get(name);
    if (!service) {
      throw new Error(`Service not found in topology: ${name}`);
    }
    return service;
  }

  dependents(name: string): ServiceConfig[] {
    return this.services.filter(service => service.depends_on.includes(name));
  }

  reversed(): ServiceConfig[] {
    return [...this.services].reverse();
  }

  /**
   * Hash of everything that shapes the container. A stopped container whose label differs is out of date.
   * `image_id` is the local id of a built image, so a rebuild under the same tag changes the hash.
   */
  configHash(service: ServiceConfig, image_id?: string): string {
    return hash({
      image: service.image,
      image_id: image_id ?? null,
      network: service.network,
      port: service.port ?? null,
      target_port: service.target_port ?? null,
      environment: service.environment,
      healthcheck: service.healthcheck ?? null,
    });
  }

  containerSpec(service: ServiceConfig, image_id?: string): ContainerSpec {
    return {
      name: service.name,
      image: service.image,
      network: service.network,
      environment: { ...service.environment },
      ports: service.port !== undefined ? [{ published: service.port, target: service.target_port ?? service.port }] : [],
      labels: {
        [STACK_LABEL]: this.name,
        [CONFIG_HASH_LABEL]: this.configHash(service, image_id),
      },
      healthcheck: service.healthcheck ? { ...service.healthcheck, test: [...service.healthcheck.test] } : undefined,
    };
  }
}
