import axios, { AxiosResponse } from 'axios';
import { expect } from 'chai';
import http from 'http';
import net from 'net';
import { ProxyConfig } from '../../../src/common/config/stack-config';
import { ProxyServer } from '../../../src/common/routing/proxy-server';
import { RateLimiter } from '../../../src/common/routing/rate-limiter';
import { RoutingTable, RoutingTableHolder } from '../../../src/common/routing/routing-table';
import { UpstreamPoolManager } from '../../../src/common/routing/upstream-pool';

const listen = async (server: http.Server): Promise<number> => {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (!address || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
};

const closeServer = async (server: http.Server): Promise<void> => {
  server.closeAllConnections();
  await new Promise<void>(resolve => server.close(() => resolve()));
};

describe('proxy server', () => {
  let upstream: http.Server;
  let upstream_port: number;
  let upstream_sockets: number[];
  let stalled: http.ServerResponse[];

  let config: ProxyConfig;
  let pool: UpstreamPoolManager;
  let proxy: ProxyServer;
  let proxy_url: string;

  const get = (path: string, headers: Record<string, string> = {}): Promise<AxiosResponse<string>> =>
    axios.get<string>(`${proxy_url}${path}`, { headers, responseType: 'text', validateStatus: () => true });

  beforeEach(async () => {
    upstream_sockets = [];
    stalled = [];
    upstream = http.createServer((req, res) => {
      upstream_sockets.push(req.socket.remotePort || 0);
      if (req.url === '/slow') {
        stalled.push(res);
        return;
      }
      if (req.url === '/partial') {
        res.writeHead(200, { 'content-type': 'text/plain' });
        res.write('partial');
        stalled.push(res);
        return;
      }
      res.writeHead(200, { 'content-type': 'text/plain' });
      res.end(`${req.url} ${req.headers['x-forwarded-for']}`);
    });
    upstream_port = await listen(upstream);

    config = {
      port: 0,
      request_timeout: 200,
      zones: [{ name: 'api', key: 'client_address', rate: 1, burst: 2, idle_timeout: 60 * 1000 }],
      upstreams: [
        { name: 'backend', members: [`127.0.0.1:${upstream_port}`], keepalive: 2, rise: 1, probe: { path: '/health', interval: 5000, timeout: 2000 } },
        { name: 'dead', members: ['127.0.0.1:1'], keepalive: 2, rise: 1, probe: { path: '/health', interval: 5000, timeout: 2000 } },
      ],
      routes: [
        { path: '/nginx-health', match: 'exact', static: { status: 200, body: 'healthy\n' } },
        { path: '/api/*', match: 'prefix', upstream: 'backend', zone: 'api' },
        { path: '/slow', match: 'exact', upstream: 'backend' },
        { path: '/dead', match: 'exact', upstream: 'dead' },
        { path: '/', match: 'prefix', upstream: 'backend' },
      ],
    };

    pool = new UpstreamPoolManager(config.upstreams);
    // A frozen clock keeps the bucket from refilling between requests
    const limiter = new RateLimiter(config.zones, { now: () => 0 });
    proxy = new ProxyServer(config, new RoutingTableHolder(new RoutingTable(config.routes)), limiter, pool);
    const port = await proxy.listen(0, '127.0.0.1');
    proxy_url = `http://127.0.0.1:${port}`;
  });

  afterEach(async () => {
    for (const res of stalled) {
      res.destroy();
    }
    await proxy.close();
    pool.close();
    await closeServer(upstream);
  });

  it('should answer static routes without contacting an upstream', async () => {
    const res = await get('/nginx-health');
    expect(res.status).to.eq(200);
    expect(res.data).to.eq('healthy\n');
    expect(upstream_sockets).to.have.lengthOf(0);
  });

  it('should forward to the upstream with forwarding headers', async () => {
    const res = await get('/api/notes?page=2');
    expect(res.status).to.eq(200);
    expect(res.data).to.eq('/api/notes?page=2 127.0.0.1');
  });

  it('should append the client address to an existing x-forwarded-for', async () => {
    const res = await get('/home', { 'x-forwarded-for': '203.0.113.7' });
    expect(res.data).to.eq('/home 203.0.113.7, 127.0.0.1');
  });

  it('should reject requests over the zone budget with 429', async () => {
    expect((await get('/api/a')).status).to.eq(200);
    expect((await get('/api/b')).status).to.eq(200);

    const rejected = await get('/api/c');
    expect(rejected.status).to.eq(429);
    expect(rejected.headers['retry-after']).to.eq('1');
    expect(upstream_sockets).to.have.lengthOf(2);
  });

  it('should not spend zone tokens on static routes', async () => {
    for (let i = 0; i < 3; i++) {
      expect((await get('/nginx-health')).status).to.eq(200);
    }
    expect((await get('/api/a')).status).to.eq(200);
    expect((await get('/api/b')).status).to.eq(200);
  });

  it('should answer 503 when every member is unhealthy', async () => {
    pool.markHealth(`127.0.0.1:${upstream_port}`, 'unhealthy');
    const res = await get('/home');
    expect(res.status).to.eq(503);
    expect(res.data).to.eq('Service Unavailable\n');
  });

  it('should answer 504 and discard the connection when the upstream is too slow', async () => {
    const res = await get('/slow');
    expect(res.status).to.eq(504);
    expect(res.data).to.eq('Gateway Timeout\n');
    expect(pool.status('backend')).to.deep.eq([{ member: `127.0.0.1:${upstream_port}`, healthy: true, idle: 0, active: 0 }]);
  });

  it('should drop the client connection when the upstream stalls after sending headers', async () => {
    const started = Date.now();
    const outcome = await new Promise<{ status?: number, body: string, complete: boolean }>((resolve, reject) => {
      const client_req = http.get(`${proxy_url}/partial`, (res) => {
        let body = '';
        res.setEncoding('utf-8');
        res.on('data', (chunk: string) => {
          body += chunk;
        });
        res.on('error', () => resolve({ status: res.statusCode, body, complete: res.complete }));
        res.on('close', () => resolve({ status: res.statusCode, body, complete: res.complete }));
      });
      client_req.on('error', reject);
    });

    expect(Date.now() - started).to.be.lessThan(2000);
    expect(outcome).to.deep.eq({ status: 200, body: 'partial', complete: false });
    expect(pool.status('backend')).to.deep.eq([{ member: `127.0.0.1:${upstream_port}`, healthy: true, idle: 0, active: 0 }]);
  });

  it('should answer 502 when the upstream refuses the connection', async () => {
    const res = await get('/dead');
    expect(res.status).to.eq(502);
    expect(res.data).to.eq('Bad Gateway\n');
    expect(pool.status('dead')).to.deep.eq([{ member: '127.0.0.1:1', healthy: true, idle: 0, active: 0 }]);
  });

  it('should reuse the upstream connection between requests', async () => {
    await get('/first');
    await get('/second');
    expect(upstream_sockets).to.have.lengthOf(2);
    expect(upstream_sockets[1]).to.eq(upstream_sockets[0]);
    expect(pool.status('backend')[0].idle).to.eq(1);
  });

  describe('client keys', () => {
    const request = (headers: http.IncomingHttpHeaders): http.IncomingMessage => {
      const req = new http.IncomingMessage(new net.Socket());
      req.headers = headers;
      return req;
    };

    it('should key by a configured header', () => {
      const zone = { name: 'tenant', key: 'X-Api-Key', rate: 1, burst: 1, idle_timeout: 1000 };
      expect(proxy.clientKey(zone, request({ 'x-api-key': 'tenant-a' }))).to.eq('tenant-a');
    });

    it('should fall back to the client address without the header', () => {
      const zone = { name: 'tenant', key: 'X-Api-Key', rate: 1, burst: 1, idle_timeout: 1000 };
      expect(proxy.clientKey(zone, request({}))).to.eq('unknown');
    });
  });
});
