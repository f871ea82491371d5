import { ServiceConfig } from '../config/stack-config';
import { ConfirmationRequiredError } from '../errors/lifecycle-errors';
import { RuntimeUnavailableError } from '../errors/runtime-errors';
import { ContainerRuntime } from '../runtime/runtime';
import { StackError } from '../utils/errors';
import { Logger, silentLogger } from '../utils/logger';
import { DeploymentLock } from './deployment-lock';
import { NetworkProvisioner, NetworkResult } from './network-provisioner';
import { ServiceState, assertTransition } from './service-state';
import { StateInspector } from './state-inspector';
import { Topology } from './topology';

export const DESTROY_CONFIRMATION_PHRASE = 'destroy-app';

export type ReconcileMode = 'apply' | 'destroy' | 'dry-run';

export type RuntimeAction = 'create' | 'start' | 'stop' | 'remove' | 'create-network' | 'remove-network';

export type ActionStatus = 'planned' | 'applied' | 'failed';

export type ServiceOutcome = 'unchanged' | 'created' | 'started' | 'restarted' | 'recreated' | 'removed' | 'failed' | 'blocked' | 'planned';

export interface Action {
  target: string;
  action: RuntimeAction;
  status: ActionStatus;
}

export interface ServiceResult {
  service: string;
  before: ServiceState;
  after: ServiceState;
  outcome: ServiceOutcome;
  /** Desired configuration differs from the running container's. Running services are left alone. */
  drift?: boolean;
  blocked_by?: string;
  error?: string;
}

export interface ReconcileResult {
  mode: 'apply' | 'destroy';
  dry_run: boolean;
  network: NetworkResult;
  actions: Action[];
  services: ServiceResult[];
  ok: boolean;
}

export interface ReconcileOptions {
  dry_run?: boolean;
  /** Required by `destroy` unless dry running */
  confirmation?: string;
}

export interface OrchestratorOptions {
  logger?: Logger;
  /** Directory for the cross-process lock file */
  lock_dir?: string;
  /** How long a started service with a health check may take to report healthy */
  health_timeout?: number;
  health_interval?: number;
  sleep?: (ms: number) => Promise<void>;
}

type ServiceDecision = 'none' | 'create' | 'start' | 'restart' | 'recreate';

class ServiceActionError extends StackError {
  constructor(service: string, action: RuntimeAction, cause: unknown) {
    super();
    this.name = 'service_action_failed';
    this.message = `${action} ${service} failed: ${cause instanceof Error ? cause.message : cause}`;
  }
}

/**
 * Moves the runtime to the state a topology describes. One sequential pass per call, guarded by a per-deployment lock.
 *
 * apply:   dependencies first. running: left alone. stopped: started, or recreated when its configuration changed
 *          or the start fails. unhealthy: restarted, or recreated when that fails. absent: created and started.
 * destroy: dependents first, stop and remove, then the network once nothing else uses it.
 */
export class LifecycleOrchestrator {
  private readonly inspector: StateInspector;
  private readonly provisioner: NetworkProvisioner;
  private readonly logger: Logger;
  private readonly lock_dir?: string;
  private readonly health_timeout: number;
  private readonly health_interval: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(private readonly runtime: ContainerRuntime, options: OrchestratorOptions = {}) {
    this.inspector = new StateInspector(runtime);
    this.provisioner = new NetworkProvisioner(runtime, this.inspector);
    this.logger = options.logger || silentLogger;
    this.lock_dir = options.lock_dir;
    this.health_timeout = options.health_timeout ?? 60 * 1000;
    this.health_interval = options.health_interval ?? 1000;
    this.sleep = options.sleep || ((ms: number) => new Promise(resolve => setTimeout(resolve, ms)));
  }

  async reconcile(topology: Topology, mode: ReconcileMode, options: ReconcileOptions = {}): Promise<ReconcileResult> {
    const dry_run = mode === 'dry-run' || !!options.dry_run;

    if (mode === 'destroy' && !dry_run && options.confirmation !== DESTROY_CONFIRMATION_PHRASE) {
      throw new ConfirmationRequiredError(DESTROY_CONFIRMATION_PHRASE);
    }

    try {
      await this.runtime.ping();
    } catch (err) {
      if (err instanceof StackError) {
        throw err;
      }
      throw new RuntimeUnavailableError(err instanceof Error ? err.message : `${err}`, err);
    }

    const lock = new DeploymentLock(topology.network, this.lock_dir);
    return lock.run(() => mode === 'destroy' ? this.destroy(topology, dry_run) : this.apply(topology, dry_run));
  }

  private async step(result: ReconcileResult, target: string, action: RuntimeAction, fn: () => Promise<void>): Promise<void> {
    if (result.dry_run) {
      this.logger.info(`[dry run] ${action} ${target}`);
      result.actions.push({ target, action, status: 'planned' });
      return;
    }

    this.logger.debug(`${action} ${target}`);
    try {
      await fn();
    } catch (err) {
      result.actions.push({ target, action, status: 'failed' });
      throw new ServiceActionError(target, action, err);
    }
    result.actions.push({ target, action, status: 'applied' });
  }

  private decide(before: ServiceState, drift: boolean): ServiceDecision {
    switch (before) {
      case ServiceState.RUNNING:
        return 'none';
      case ServiceState.STOPPED:
        return drift ? 'recreate' : 'start';
      case ServiceState.UNHEALTHY:
        return drift ? 'recreate' : 'restart';
      case ServiceState.ABSENT:
        return 'create';
    }
  }

  private async apply(topology: Topology, dry_run: boolean): Promise<ReconcileResult> {
    const network = await this.provisioner.ensureNetwork(topology.network, { dry_run });
    const result: ReconcileResult = { mode: 'apply', dry_run, network, actions: [], services: [], ok: true };
    if (network.outcome !== 'unchanged') {
      result.actions.push({ target: topology.network, action: 'create-network', status: dry_run ? 'planned' : 'applied' });
    }

    const outcomes = new Map<string, ServiceResult>();
    for (const service of topology.services) {
      const service_result = await this.applyService(topology, service, outcomes, result);
      outcomes.set(service.name, service_result);
      result.services.push(service_result);
    }

    result.ok = result.services.every(service => service.outcome !== 'failed' && service.outcome !== 'blocked');
    return result;
  }

  private async applyService(topology: Topology, service: ServiceConfig, outcomes: Map<string, ServiceResult>, result: ReconcileResult): Promise<ServiceResult> {
    const blocked_by = service.depends_on.find(dependency => {
      const outcome = outcomes.get(dependency)?.outcome;
      return outcome === 'failed' || outcome === 'blocked';
    });

    const status = await this.inspector.status(service.name);
    const before = status.state;

    if (blocked_by) {
      this.logger.warn(`Skipping ${service.name}: dependency ${blocked_by} is not running`);
      return { service: service.name, before, after: before, outcome: 'blocked', blocked_by };
    }

    const image_id = await this.inspector.imageId(service);
    const desired_hash = topology.configHash(service, image_id);
    const drift = before !== ServiceState.ABSENT && status.config_hash !== desired_hash;
    const decision = this.decide(before, drift);

    if (decision === 'none') {
      if (drift) {
        this.logger.warn(`${service.name} is running with an outdated configuration; stop it to have it recreated`);
      }
      return { service: service.name, before, after: before, outcome: 'unchanged', drift: drift || undefined };
    }

    const service_result: ServiceResult = { service: service.name, before, after: before, outcome: 'planned', drift: drift || undefined };
    try {
      service_result.outcome = await this.converge(topology, service, image_id, decision, service_result, result);
    } catch (err) {
      this.logger.warn(`${service.name}: ${err instanceof Error ? err.message : err}`);
      service_result.outcome = 'failed';
      service_result.error = err instanceof Error ? err.message : `${err}`;
      return service_result;
    }

    if (!result.dry_run) {
      try {
        await this.waitForRunning(service);
      } catch (err) {
        service_result.outcome = 'failed';
        service_result.error = err instanceof Error ? err.message : `${err}`;
      }
    }
    return service_result;
  }

  /**
   * Applies a decision, falling back to recreating the container when a plain start or restart fails.
   */
  private async converge(topology: Topology, service: ServiceConfig, image_id: string | undefined, decision: ServiceDecision, service_result: ServiceResult, result: ReconcileResult): Promise<ServiceOutcome> {
    const transition = (to: ServiceState) => {
      assertTransition(service.name, service_result.after, to);
      service_result.after = to;
    };

    const create = async () => {
      transition(ServiceState.RUNNING);
      await this.step(result, service.name, 'create', () => this.runtime.create(topology.containerSpec(service, image_id)));
      await this.step(result, service.name, 'start', () => this.runtime.start(service.name));
    };

    const recreate = async () => {
      if (service_result.after === ServiceState.RUNNING || service_result.after === ServiceState.UNHEALTHY) {
        transition(ServiceState.STOPPED);
        await this.step(result, service.name, 'stop', () => this.runtime.stop(service.name));
      }
      if (service_result.after !== ServiceState.ABSENT) {
        transition(ServiceState.ABSENT);
        await this.step(result, service.name, 'remove', () => this.runtime.remove(service.name));
      }
      await create();
    };

    switch (decision) {
      case 'create':
        await create();
        return result.dry_run ? 'planned' : 'created';
      case 'recreate':
        await recreate();
        return result.dry_run ? 'planned' : 'recreated';
      case 'start':
      case 'restart':
        try {
          if (decision === 'restart') {
            transition(ServiceState.STOPPED);
            await this.step(result, service.name, 'stop', () => this.runtime.stop(service.name));
          }
          transition(ServiceState.RUNNING);
          await this.step(result, service.name, 'start', () => this.runtime.start(service.name));
          return result.dry_run ? 'planned' : decision === 'start' ? 'started' : 'restarted';
        } catch (err) {
          this.logger.warn(`${err instanceof Error ? err.message : err}; recreating ${service.name}`);
          service_result.after = (await this.inspector.status(service.name)).state;
          await recreate();
          return 'recreated';
        }
      case 'none':
        return 'unchanged';
    }
  }

  /**
   * Dependents are only started once this returns, so a dependency is always observed running first.
   */
  private async waitForRunning(service: ServiceConfig): Promise<void> {
    const deadline = Date.now() + this.health_timeout;
    for (;;) {
      const status = await this.inspector.status(service.name);
      if (status.state === ServiceState.ABSENT || status.state === ServiceState.STOPPED) {
        throw new StackError(`${service.name} exited after starting`);
      }
      if (status.state === ServiceState.UNHEALTHY) {
        throw new StackError(`${service.name} reported unhealthy after starting`);
      }
      if (!service.healthcheck || status.health === 'healthy' || status.health === 'none') {
        return;
      }
      if (Date.now() >= deadline) {
        throw new StackError(`${service.name} did not become healthy within ${this.health_timeout}ms`);
      }
      await this.sleep(this.health_interval);
    }
  }

  private async destroy(topology: Topology, dry_run: boolean): Promise<ReconcileResult> {
    const result: ReconcileResult = { mode: 'destroy', dry_run, network: { name: topology.network, outcome: 'unchanged' }, actions: [], services: [], ok: true };

    const released: string[] = [];
    for (const service of topology.reversed()) {
      const { state: before } = await this.inspector.status(service.name);
      const service_result: ServiceResult = { service: service.name, before, after: before, outcome: 'unchanged' };
      result.services.push(service_result);
      if (before === ServiceState.ABSENT) {
        released.push(service.name);
        continue;
      }

      try {
        if (before === ServiceState.RUNNING || before === ServiceState.UNHEALTHY) {
          assertTransition(service.name, service_result.after, ServiceState.STOPPED);
          await this.step(result, service.name, 'stop', () => this.runtime.stop(service.name));
          service_result.after = ServiceState.STOPPED;
        }
        assertTransition(service.name, service_result.after, ServiceState.ABSENT);
        await this.step(result, service.name, 'remove', () => this.runtime.remove(service.name));
        service_result.after = ServiceState.ABSENT;
        service_result.outcome = dry_run ? 'planned' : 'removed';
        released.push(service.name);
      } catch (err) {
        this.logger.warn(`${service.name}: ${err instanceof Error ? err.message : err}`);
        service_result.outcome = 'failed';
        service_result.error = err instanceof Error ? err.message : `${err}`;
      }
    }

    result.network = await this.provisioner.removeNetwork(topology.network, { dry_run, released });
    if (result.network.outcome === 'removed' || result.network.outcome === 'planned') {
      result.actions.push({ target: topology.network, action: 'remove-network', status: dry_run ? 'planned' : 'applied' });
    } else if (result.network.outcome === 'in-use') {
      this.logger.warn(`Network ${topology.network} is still used by ${result.network.containers?.join(', ')}`);
    }

    result.ok = result.services.every(service => service.outcome !== 'failed');
    return result;
  }
}
