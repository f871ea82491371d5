import { Dictionary } from '../utils/dictionary';

/**
 * Everything the runtime needs to create a service container.
 */
export interface ContainerSpec {
  name: string;
  image: string;
  network: string;
  environment: Dictionary<string>;
  ports: { published: number, target: number }[];
  labels: Dictionary<string>;
  healthcheck?: {
    test: string[];
    interval: string;
    timeout: string;
    retries: number;
    start_period: string;
  };
}

export type ContainerStatus = 'created' | 'running' | 'paused' | 'restarting' | 'removing' | 'exited' | 'dead';

export type ContainerHealth = 'starting' | 'healthy' | 'unhealthy' | 'none';

export interface ContainerInspection {
  name: string;
  status: ContainerStatus;
  health: ContainerHealth;
  labels: Dictionary<string>;
  networks: string[];
}

export interface NetworkInspection {
  name: string;
  containers: string[];
}

/**
 * The narrow set of operations the orchestrator needs from a container runtime. `inspect*` resolve to `undefined`
 * when the object does not exist.
 */
export interface ContainerRuntime {
  ping(): Promise<void>;
  create(spec: ContainerSpec): Promise<void>;
  start(name: string): Promise<void>;
  stop(name: string): Promise<void>;
  remove(name: string): Promise<void>;
  inspect(name: string): Promise<ContainerInspection | undefined>;
  /** Id of the local image a tag points at */
  imageId(image: string): Promise<string | undefined>;
  createNetwork(name: string): Promise<void>;
  removeNetwork(name: string): Promise<void>;
  inspectNetwork(name: string): Promise<NetworkInspection | undefined>;
}

export const MUTATING_OPERATIONS = ['create', 'start', 'stop', 'remove', 'createNetwork', 'removeNetwork'] as const;

export type MutatingOperation = typeof MUTATING_OPERATIONS[number];

export interface ImageBuilder {
  build(image: string, context: string): Promise<void>;
}
