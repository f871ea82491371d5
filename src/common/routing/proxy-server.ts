import http from 'http';
import { CLIENT_ADDRESS_KEY, ProxyConfig, RateLimitZoneConfig } from '../config/stack-config';
import { GroupUnavailableError } from '../errors/routing-errors';
import { Logger, silentLogger } from '../utils/logger';
import { RateLimiter } from './rate-limiter';
import { RoutingTableHolder } from './routing-table';
import { UpstreamConnection, UpstreamPoolManager } from './upstream-pool';

const HOP_BY_HOP_HEADERS = new Set([
  'connection',
  'keep-alive',
  'proxy-authenticate',
  'proxy-authorization',
  'te',
  'trailer',
  'transfer-encoding',
  'upgrade',
  'host',
]);

const stripHopByHop = (headers: http.IncomingHttpHeaders): http.OutgoingHttpHeaders => {
  const output: http.OutgoingHttpHeaders = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined || HOP_BY_HOP_HEADERS.has(key.toLowerCase())) {
      continue;
    }
    output[key] = value;
  }
  return output;
};

const mergeForwardedFor = (existing: string | string[] | undefined, address?: string): string => {
  const forwarded = Array.isArray(existing) ? existing.join(', ') : existing || '';
  if (!address) {
    return forwarded;
  }
  return forwarded ? `${forwarded}, ${address}` : address;
};

export interface ProxyServerOptions {
  logger?: Logger;
}

/**
 * Request path: routing table, then the route's rate limit zone, then an upstream connection. Static routes answer
 * before either of the last two.
 */
export class ProxyServer {
  private readonly zones = new Map<string, RateLimitZoneConfig>();
  private readonly logger: Logger;
  private server?: http.Server;

  constructor(
    private readonly config: ProxyConfig,
    private readonly routes: RoutingTableHolder,
    private readonly limiter: RateLimiter,
    private readonly pool: UpstreamPoolManager,
    options: ProxyServerOptions = {},
  ) {
    for (const zone of config.zones) {
      this.zones.set(zone.name, zone);
    }
    this.logger = options.logger || silentLogger;
  }

  clientKey(zone: RateLimitZoneConfig, req: http.IncomingMessage): string {
    const address = req.socket.remoteAddress || 'unknown';
    if (zone.key === CLIENT_ADDRESS_KEY) {
      return address;
    }
    const header = req.headers[zone.key.toLowerCase()];
    const value = Array.isArray(header) ? header[0] : header;
    return value || address;
  }

  private reply(res: http.ServerResponse, status: number, body: string, headers: http.OutgoingHttpHeaders = {}): void {
    if (res.headersSent) {
      res.end();
      return;
    }
    res.writeHead(status, { 'content-type': 'text/plain; charset=utf-8', ...headers });
    res.end(body);
  }

  handle(req: http.IncomingMessage, res: http.ServerResponse): void {
    const route = this.routes.match(req.url || '/');

    if (route.static) {
      this.reply(res, route.static.status, route.static.body);
      return;
    }

    if (route.zone) {
      const zone = this.zones.get(route.zone);
      if (zone && this.limiter.admit(zone.name, this.clientKey(zone, req)) === 'reject') {
        this.reply(res, 429, 'Too Many Requests\n', { 'retry-after': '1' });
        return;
      }
    }

    if (!route.upstream) {
      this.reply(res, 404, 'Not Found\n');
      return;
    }

    let connection: UpstreamConnection;
    try {
      connection = this.pool.acquire(route.upstream);
    } catch (err) {
      if (err instanceof GroupUnavailableError) {
        this.reply(res, 503, 'Service Unavailable\n');
        return;
      }
      throw err;
    }

    this.forward(req, res, connection);
  }

  private forward(req: http.IncomingMessage, res: http.ServerResponse, connection: UpstreamConnection): void {
    const headers = stripHopByHop(req.headers);
    headers['x-forwarded-for'] = mergeForwardedFor(req.headers['x-forwarded-for'], req.socket.remoteAddress);
    const forwarded_host = req.headers['x-forwarded-host'] || req.headers.host;
    if (forwarded_host) {
      headers['x-forwarded-host'] = forwarded_host;
    }

    let settled = false;
    let timed_out = false;
    let timer: NodeJS.Timeout | undefined;
    const settle = (reusable: boolean) => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      if (reusable) {
        this.pool.release(connection);
      } else {
        this.pool.discard(connection);
      }
    };

    const upstream_req = http.request({
      host: connection.host,
      port: connection.port,
      method: req.method,
      path: req.url,
      headers,
      agent: connection.agent,
    }, (upstream_res) => {
      res.writeHead(upstream_res.statusCode || 502, stripHopByHop(upstream_res.headers));
      upstream_res.pipe(res);
      upstream_res.on('end', () => settle(true));
      upstream_res.on('error', () => {
        settle(false);
        // Headers are out, so a truncated body can only be signalled by dropping the connection
        res.destroy();
      });
    });

    timer = setTimeout(() => {
      timed_out = true;
      upstream_req.destroy();
      if (res.headersSent) {
        res.destroy();
      }
    }, this.config.request_timeout);

    upstream_req.on('error', (err) => {
      settle(false);
      this.logger.debug(`Proxy to ${connection.member} failed: ${err.message}`);
      if (timed_out) {
        this.reply(res, 504, 'Gateway Timeout\n');
      } else {
        this.reply(res, 502, 'Bad Gateway\n');
      }
    });

    res.on('close', () => {
      if (!settled) {
        upstream_req.destroy();
        settle(false);
      }
    });

    req.pipe(upstream_req);
  }

  async listen(port: number, host?: string): Promise<number> {
    const server = http.createServer((req, res) => {
      try {
        this.handle(req, res);
      } catch (err) {
        this.logger.warn(`Request ${req.method} ${req.url} failed: ${err instanceof Error ? err.message : err}`);
        this.reply(res, 500, 'Internal Server Error\n');
      }
    });
    this.server = server;

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject);
      server.listen(port, host, () => {
        server.off('error', reject);
        resolve();
      });
    });
    const address = server.address();
    return address && typeof address === 'object' ? address.port : port;
  }

  async close(): Promise<void> {
    const server = this.server;
    if (!server) {
      return;
    }
    this.server = undefined;
    await new Promise<void>((resolve, reject) => {
      server.close((err) => err ? reject(err) : resolve());
      server.closeAllConnections();
    });
  }
}
