import { Flags } from '@oclif/core';
import chalk from 'chalk';
import BaseCommand from '../base-command';
import { ProxyConfig } from '../common/config/stack-config';
import { HealthProber } from '../common/routing/health-prober';
import { ProxyServer } from '../common/routing/proxy-server';
import { RateLimiter } from '../common/routing/rate-limiter';
import { RoutingTable, RoutingTableHolder } from '../common/routing/routing-table';
import { UpstreamPoolManager } from '../common/routing/upstream-pool';
import { StackError } from '../common/utils/errors';
import { Logger } from '../common/utils/logger';

const SWEEP_INTERVAL = 30 * 1000;

/**
 * The routing, admission and pooling pieces wired together for one proxy process.
 */
export class ProxyRuntime {
  readonly routes: RoutingTableHolder;
  readonly limiter: RateLimiter;
  readonly pool: UpstreamPoolManager;
  readonly prober: HealthProber;
  readonly server: ProxyServer;
  private readonly zone_names: Set<string>;
  private readonly upstream_names: Set<string>;

  constructor(config: ProxyConfig, logger: Logger) {
    this.zone_names = new Set(config.zones.map(zone => zone.name));
    this.upstream_names = new Set(config.upstreams.map(upstream => upstream.name));
    this.routes = new RoutingTableHolder(new RoutingTable(config.routes));
    this.limiter = new RateLimiter(config.zones);
    this.pool = new UpstreamPoolManager(config.upstreams);
    this.prober = new HealthProber(this.pool, config.upstreams, { logger });
    this.server = new ProxyServer(config, this.routes, this.limiter, this.pool, { logger });
  }

  /**
   * Swaps in the routes of a reloaded proxy section. Zones and upstreams live as long as the process, so routes
   * naming ones it does not know are refused and the current table stays in place.
   */
  reload(config: ProxyConfig): RoutingTable {
    for (const route of config.routes) {
      if (route.upstream && !this.upstream_names.has(route.upstream)) {
        throw new StackError(`Route ${route.path} uses upstream '${route.upstream}', which takes a restart to add`);
      }
      if (route.zone && !this.zone_names.has(route.zone)) {
        throw new StackError(`Route ${route.path} uses zone '${route.zone}', which takes a restart to add`);
      }
    }
    return this.routes.swap(config.routes);
  }

  async start(port: number, host?: string): Promise<number> {
    const bound_port = await this.server.listen(port, host);
    this.prober.start();
    this.limiter.startSweeper(SWEEP_INTERVAL);
    return bound_port;
  }

  async stop(): Promise<void> {
    this.prober.stop();
    this.limiter.stopSweeper();
    await this.server.close();
    this.pool.close();
  }
}

export default class ProxyCommand extends BaseCommand {
  static description = 'Run the reverse proxy in front of the stack. SIGHUP reloads the routes of the stack file';

  static examples = [
    'stackctl proxy',
    'stackctl proxy --port=8081',
  ];

  static flags = {
    ...BaseCommand.flags,
    port: Flags.integer({
      char: 'p',
      description: 'Port to listen on, overriding proxy.port of the stack file',
    }),
    host: Flags.string({
      description: 'Address to bind',
      default: '0.0.0.0',
    }),
  };

  async run(): Promise<void> {
    const { flags } = await this.parse(ProxyCommand);
    const config = await this.loadConfig(flags.config);
    if (!config.proxy) {
      throw new StackError(`The stack file of ${config.name} has no proxy section`);
    }

    const proxy = new ProxyRuntime(config.proxy, this.createLogger(flags.verbose));
    const port = await proxy.start(flags.port ?? config.proxy.port, flags.host);
    this.log(chalk.green(`Proxy for ${config.name} listening on ${flags.host}:${port}`));

    const reload = () => {
      this.reload(proxy, flags.config).catch((err) => {
        this.warn(`Reload failed, keeping the current routes: ${err instanceof Error ? err.message : err}`);
      });
    };
    process.on('SIGHUP', reload);
    try {
      await this.waitForShutdown();
    } finally {
      process.off('SIGHUP', reload);
    }

    this.log('Shutting down proxy');
    await proxy.stop();
  }

  async reload(proxy: ProxyRuntime, config_flag: string): Promise<void> {
    const config = await this.loadConfig(config_flag);
    if (!config.proxy) {
      throw new StackError(`The stack file of ${config.name} has no proxy section`);
    }
    const table = proxy.reload(config.proxy);
    this.log(`Reloaded ${config.proxy.routes.length} route(s), generation ${table.generation}`);
  }

  waitForShutdown(): Promise<void> {
    return new Promise<void>((resolve) => {
      const shutdown = () => {
        process.off('SIGINT', shutdown);
        process.off('SIGTERM', shutdown);
        resolve();
      };
      process.on('SIGINT', shutdown);
      process.on('SIGTERM', shutdown);
    });
  }
}
