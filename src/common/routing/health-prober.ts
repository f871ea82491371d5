import axios, { AxiosInstance } from 'axios';
import type { ProbeConfig, UpstreamGroupConfig } from '../config/stack-config';
import { Logger, silentLogger } from '../utils/logger';
import { HealthSignal, UpstreamPoolManager } from './upstream-pool';

export interface HealthProberOptions {
  client?: AxiosInstance;
  logger?: Logger;
}

/**
 * Probes every upstream member on its own timer and feeds the result to the pool. A probe that errors or runs past
 * its timeout counts as a failed check.
 */
export class HealthProber {
  private readonly probes = new Map<string, ProbeConfig>();
  private readonly timers = new Map<string, NodeJS.Timeout>();
  private readonly pending = new Set<string>();
  private readonly client: AxiosInstance;
  private readonly logger: Logger;

  constructor(private readonly pool: UpstreamPoolManager, groups: readonly UpstreamGroupConfig[], options: HealthProberOptions = {}) {
    for (const group of groups) {
      for (const member of group.members) {
        if (!this.probes.has(member)) {
          this.probes.set(member, group.probe);
        }
      }
    }
    this.client = options.client || axios.create();
    this.logger = options.logger || silentLogger;
  }

  async probe(member: string, probe: ProbeConfig): Promise<HealthSignal> {
    try {
      await this.client.get(`http://${member}${probe.path}`, {
        timeout: probe.timeout,
        validateStatus: (status) => status < 400,
      });
      return 'healthy';
    } catch (err) {
      this.logger.debug(`Health probe for ${member} failed: ${err instanceof Error ? err.message : err}`);
      return 'unhealthy';
    }
  }

  async check(member: string): Promise<HealthSignal> {
    const probe = this.probes.get(member);
    if (!probe) {
      throw new Error(`No health probe configured for ${member}`);
    }
    const was_healthy = this.pool.isHealthy(member);
    const signal = await this.probe(member, probe);
    this.pool.markHealth(member, signal);

    const is_healthy = this.pool.isHealthy(member);
    if (was_healthy && !is_healthy) {
      this.logger.warn(`Upstream ${member} is unhealthy and left rotation`);
    } else if (!was_healthy && is_healthy) {
      this.logger.info(`Upstream ${member} is healthy and rejoined rotation`);
    }
    return signal;
  }

  /**
   * Runs one scheduled check. A member whose previous check is still in flight skips the tick.
   */
  tick(member: string): void {
    if (this.pending.has(member)) {
      this.logger.debug(`Health check for ${member} is still running, skipping`);
      return;
    }
    this.pending.add(member);
    this.check(member)
      .catch((err) => this.logger.warn(`Health check for ${member} crashed: ${err}`))
      .finally(() => this.pending.delete(member));
  }

  start(): void {
    this.stop();
    for (const [member, probe] of this.probes) {
      const timer = setInterval(() => this.tick(member), probe.interval);
      timer.unref();
      this.timers.set(member, timer);
    }
  }

  stop(): void {
    for (const timer of this.timers.values()) {
      clearInterval(timer);
    }
    this.timers.clear();
  }
}
