import { expect } from 'chai';
import { loadStackConfig, normalizeStackYaml, parseStackConfig } from '../../../src/common/config/loader';
import { parseDuration } from '../../../src/common/config/slugs';
import { ValidationErrors } from '../../../src/common/utils/errors';
import { getMockStackPath } from '../../utils/mocks';

const parseErrors = async (contents: string): Promise<string[]> => {
  try {
    await parseStackConfig(contents);
  } catch (err) {
    if (err instanceof ValidationErrors) {
      return err.errors.map(error => error.toString());
    }
    throw err;
  }
  throw new Error('Expected the stack file to be rejected');
};

describe('stack config loader', () => {
  it('should load the notes stack', async () => {
    const config = await loadStackConfig(getMockStackPath('notes'));

    expect(config.name).to.eq('notes');
    expect(config.network).to.eq('notes-net');
    expect(config.services.map(service => service.name)).to.deep.eq(['postgres-db', 'backend', 'frontend', 'nginx-proxy']);

    const [postgres, backend, frontend] = config.services;
    expect(postgres.healthcheck).to.deep.eq({
      test: ['CMD-SHELL', 'pg_isready -U postgres'],
      interval: '5s',
      timeout: '3s',
      retries: 5,
      start_period: '10s',
    });
    expect(backend.build).to.eq('./backend');
    expect(backend.depends_on).to.deep.eq(['postgres-db']);
    expect(backend.network).to.eq('notes-net');
    expect(backend.environment).to.deep.eq({
      DB_HOST: 'postgres-db',
      DB_PORT: '5432',
      DB_NAME: 'notes_db',
      DB_USERNAME: 'postgres',
      DB_PASSWORD: 'change-me',
      PORT: '3001',
      NODE_ENV: 'production',
    });
    expect(frontend.environment.NEXT_PUBLIC_API_URL).to.eq('http://nginx-proxy:8080/api');
  });

  it('should resolve the proxy section', async () => {
    const config = await loadStackConfig(getMockStackPath('notes'));
    const proxy = config.proxy;
    if (!proxy) {
      throw new Error('Expected a proxy section');
    }

    expect(proxy.port).to.eq(8081);
    expect(proxy.request_timeout).to.eq(30 * 1000);
    expect(proxy.zones).to.deep.eq([
      { name: 'api', key: 'client_address', rate: 10, burst: 20, idle_timeout: 60 * 1000 },
      { name: 'general', key: 'client_address', rate: 30, burst: 50, idle_timeout: 60 * 1000 },
    ]);
    expect(proxy.upstreams).to.deep.eq([
      { name: 'backend', members: ['localhost:3001'], keepalive: 16, rise: 2, probe: { path: '/health', interval: 5000, timeout: 2000 } },
      { name: 'frontend', members: ['localhost:3000'], keepalive: 16, rise: 2, probe: { path: '/', interval: 5000, timeout: 2000 } },
    ]);
    expect(proxy.routes.map(route => `${route.match} ${route.path} ${route.upstream || '-'} ${route.zone || '-'}`)).to.deep.eq([
      'exact /nginx-health - -',
      'prefix /api/* backend api',
      'exact /health backend -',
      'prefix / frontend general',
    ]);
    expect(proxy.routes[0].static).to.deep.eq({ status: 200, body: 'healthy\n' });
  });

  it('should apply defaults', async () => {
    const config = await loadStackConfig(getMockStackPath('minimal'));

    expect(config.network).to.eq('shop-net');
    expect(config.proxy).to.be.undefined;
    const [db, api] = config.services;
    expect(db.depends_on).to.deep.eq([]);
    expect(db.port).to.be.undefined;
    expect(db.healthcheck).to.deep.eq({
      test: ['CMD-SHELL', 'pg_isready'],
      interval: '10s',
      timeout: '5s',
      retries: 3,
      start_period: '0s',
    });
    expect(api.environment).to.deep.eq({ DATABASE_HOST: 'db' });
  });

  it('should return a frozen configuration', async () => {
    const config = await loadStackConfig(getMockStackPath('minimal'));
    expect(Object.isFrozen(config)).to.be.true;
    expect(Object.isFrozen(config.services[1].environment)).to.be.true;
    expect(Object.isFrozen(config.services[0].healthcheck?.test)).to.be.true;
  });

  it('should apply proxy defaults', async () => {
    const config = await parseStackConfig(`
name: shop
services:
  api:
    image: shop-api
proxy:
  zones:
    general:
      rate: 5
      burst: 10
  upstreams:
    api:
      members: [api:4000]
  routes:
    - path: /
      match: prefix
      upstream: api
      zone: general
`);
    expect(config.proxy?.port).to.eq(8080);
    expect(config.proxy?.request_timeout).to.eq(30 * 1000);
    expect(config.proxy?.zones[0].idle_timeout).to.eq(60 * 1000);
    expect(config.proxy?.upstreams[0]).to.deep.eq({
      name: 'api',
      members: ['api:4000'],
      keepalive: 8,
      rise: 2,
      probe: { path: '/health', interval: 5000, timeout: 2000 },
    });
  });

  it('should reject a dependency on an undeclared service', async () => {
    expect(await parseErrors(`
name: shop
services:
  api:
    image: shop-api
    depends_on: [db]
`)).to.deep.eq([`services.api.depends_on: Depends on undeclared service 'db'`]);
  });

  it('should reject unknown fields', async () => {
    expect(await parseErrors(`
name: shop
services:
  api:
    image: shop-api
    replicas: 3
`)).to.deep.eq(['services.api.replicas: property replicas should not exist']);
  });

  it('should reject malformed durations', async () => {
    expect(await parseErrors(`
name: shop
services:
  db:
    image: postgres
    healthcheck:
      test: [CMD, pg_isready]
      interval: 10 seconds
`)).to.deep.eq(['services.db.healthcheck.interval: interval must be a duration such as 500ms, 10s or 1m']);
  });

  it('should reject references to undeclared services', async () => {
    expect(await parseErrors(`
name: shop
services:
  api:
    image: shop-api
    environment:
      CACHE_HOST: \${{ services.cache.host }}
`)).to.deep.eq([`services.api.environment.CACHE_HOST: References undeclared service 'cache'`]);
  });

  it('should reject a port published twice', async () => {
    expect(await parseErrors(`
name: shop
services:
  api:
    image: shop-api
    port: 4000
  admin:
    image: shop-admin
    port: 4000
`)).to.deep.eq([`services.admin.port: Port 4000 is already published by 'api'`]);
  });

  it('should reject broken routes', async () => {
    expect(await parseErrors(`
name: shop
services:
  api:
    image: shop-api
proxy:
  upstreams:
    api:
      members: [api:4000]
  routes:
    - path: /health
      match: exact
      upstream: api
      static:
        body: ok
    - path: /api/
      match: prefix
      upstream: missing
`)).to.deep.eq([
      'proxy.routes.0: A route cannot be both static and proxied',
      `proxy.routes.1.upstream: No upstream group named 'missing'`,
      `proxy.routes: A catch-all prefix route '/' is required`,
    ]);
  });

  it('should reject invalid YAML', async () => {
    const errors = await parseErrors('name: [unclosed');
    expect(errors).to.have.lengthOf(1);
    expect(errors[0].startsWith('<root>: Invalid YAML: ')).to.be.true;
  });

  it('should reject a stack file that is not an object', async () => {
    expect(await parseErrors('just a string')).to.deep.eq(['<root>: The stack file must be a YAML object']);
  });

  it('should name the missing file', async () => {
    let error: unknown;
    try {
      await loadStackConfig('/nonexistent/stack.yml');
    } catch (err) {
      error = err;
    }
    expect(error).to.be.instanceOf(ValidationErrors);
    expect(error).to.have.property('message', '<root>: No stack file found at /nonexistent/stack.yml');
    expect(error).to.have.property('file', '/nonexistent/stack.yml');
  });

  it('should move dictionary keys into names', () => {
    expect(normalizeStackYaml({ name: 'shop', services: { api: { image: 'shop-api' }, worker: null } })).to.deep.eq({
      name: 'shop',
      services: [{ image: 'shop-api', name: 'api' }, { name: 'worker' }],
    });
  });

  it('should parse durations', () => {
    expect(parseDuration('500ms')).to.eq(500);
    expect(parseDuration('10s')).to.eq(10 * 1000);
    expect(parseDuration('2m')).to.eq(2 * 60 * 1000);
    expect(parseDuration('1h')).to.eq(60 * 60 * 1000);
    expect(() => parseDuration('soon')).to.throw('Invalid duration: soon');
  });
});
