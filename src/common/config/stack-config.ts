import { RoutingTable } from '../routing/routing-table';
import { Dictionary, deepFreeze } from '../utils/dictionary';
import { ValidationError, ValidationErrors } from '../utils/errors';
import { parseDuration } from './slugs';
import { StackSpec } from './stack-spec';

export type MatchKind = 'exact' | 'prefix' | 'regex';

export interface HealthCheckConfig {
  readonly test: readonly string[];
  readonly interval: string;
  readonly timeout: string;
  readonly retries: number;
  readonly start_period: string;
}

export interface ServiceConfig {
  readonly name: string;
  readonly image: string;
  readonly build?: string;
  readonly depends_on: readonly string[];
  readonly network: string;
  readonly port?: number;
  readonly target_port?: number;
  readonly environment: Readonly<Dictionary<string>>;
  readonly healthcheck?: HealthCheckConfig;
}

export interface StaticResponseConfig {
  readonly status: number;
  readonly body: string;
}

export interface RouteConfig {
  readonly path: string;
  readonly match: MatchKind;
  readonly upstream?: string;
  readonly zone?: string;
  readonly static?: StaticResponseConfig;
}

export interface RateLimitZoneConfig {
  readonly name: string;
  /** `client_address`, or the name of a request header holding the key */
  readonly key: string;
  readonly rate: number;
  readonly burst: number;
  readonly idle_timeout: number;
}

export interface ProbeConfig {
  readonly path: string;
  readonly interval: number;
  readonly timeout: number;
}

export interface UpstreamGroupConfig {
  readonly name: string;
  readonly members: readonly string[];
  readonly keepalive: number;
  readonly rise: number;
  readonly probe: ProbeConfig;
}

export interface ProxyConfig {
  readonly port: number;
  readonly request_timeout: number;
  readonly zones: readonly RateLimitZoneConfig[];
  readonly upstreams: readonly UpstreamGroupConfig[];
  readonly routes: readonly RouteConfig[];
}

export interface StackConfig {
  readonly name: string;
  readonly network: string;
  readonly services: readonly ServiceConfig[];
  readonly proxy?: ProxyConfig;
}

export const CLIENT_ADDRESS_KEY = 'client_address';

const SERVICE_REF_REGEX = /\${{\s*services\.([\w-]+)\.(host|port)\s*}}/g;

const interpolateEnvironment = (service_name: string, environment: Dictionary<string | number | boolean>, services: Map<string, { target_port?: number }>, errors: ValidationError[]): Dictionary<string> => {
  const output: Dictionary<string> = {};
  for (const [key, raw_value] of Object.entries(environment)) {
    const path = `services.${service_name}.environment.${key}`;
    output[key] = `${raw_value}`.replace(SERVICE_REF_REGEX, (match: string, ref: string, field: string) => {
      const peer = services.get(ref);
      if (!peer) {
        errors.push(new ValidationError({ path, message: `References undeclared service '${ref}'`, value: raw_value }));
        return match;
      }
      if (field === 'host') {
        return ref;
      }
      if (peer.target_port === undefined) {
        errors.push(new ValidationError({ path, message: `Service '${ref}' does not declare a target_port`, value: raw_value }));
        return match;
      }
      return `${peer.target_port}`;
    });
  }
  return output;
};

const buildProxyConfig = (spec: StackSpec, errors: ValidationError[]): ProxyConfig | undefined => {
  if (!spec.proxy) {
    return undefined;
  }

  const zones: RateLimitZoneConfig[] = spec.proxy.zones.map(zone => ({
    name: zone.name,
    key: zone.key || CLIENT_ADDRESS_KEY,
    rate: zone.rate,
    burst: zone.burst,
    idle_timeout: parseDuration(zone.idle_timeout || '60s'),
  }));

  const upstreams: UpstreamGroupConfig[] = spec.proxy.upstreams.map(group => ({
    name: group.name,
    members: group.members,
    keepalive: group.keepalive ?? 8,
    rise: group.rise ?? 2,
    probe: {
      path: group.probe?.path || '/health',
      interval: parseDuration(group.probe?.interval || '5s'),
      timeout: parseDuration(group.probe?.timeout || '2s'),
    },
  }));

  const zone_names = new Set(zones.map(zone => zone.name));
  const group_names = new Set(upstreams.map(group => group.name));
  const routes: RouteConfig[] = [];
  for (const [index, route] of spec.proxy.routes.entries()) {
    const path = `proxy.routes.${index}`;
    if (route.static && route.upstream) {
      errors.push(new ValidationError({ path, message: 'A route cannot be both static and proxied', value: route.path }));
    } else if (!route.static && !route.upstream) {
      errors.push(new ValidationError({ path, message: 'A route needs an upstream or a static response', value: route.path }));
    }
    if (route.upstream && !group_names.has(route.upstream)) {
      errors.push(new ValidationError({ path: `${path}.upstream`, message: `No upstream group named '${route.upstream}'`, value: route.upstream }));
    }
    if (route.zone && !zone_names.has(route.zone)) {
      errors.push(new ValidationError({ path: `${path}.zone`, message: `No rate limit zone named '${route.zone}'`, value: route.zone }));
    }

    routes.push({
      path: route.path,
      match: route.match === 'exact' || route.match === 'regex' ? route.match : 'prefix',
      upstream: route.upstream,
      zone: route.static ? undefined : route.zone,
      static: route.static ? { status: route.static.status ?? 200, body: route.static.body ?? 'healthy\n' } : undefined,
    });
  }
  errors.push(...RoutingTable.validateRoutes(routes));

  return {
    port: spec.proxy.port ?? 8080,
    request_timeout: parseDuration(spec.proxy.request_timeout || '30s'),
    zones,
    upstreams,
    routes,
  };
};

/**
 * Resolves defaults and cross references of a validated stack spec and returns the frozen configuration every
 * component receives.
 */
export const buildStackConfig = (spec: StackSpec, file?: string): StackConfig => {
  const errors: ValidationError[] = [];
  const network = spec.network || `${spec.name}-net`;

  const services_map = new Map<string, { target_port?: number }>();
  for (const service of spec.services) {
    if (services_map.has(service.name)) {
      errors.push(new ValidationError({ path: `services.${service.name}`, message: 'Duplicate service name', value: service.name }));
    }
    services_map.set(service.name, service);
  }

  const published_ports = new Map<number, string>();
  const services: ServiceConfig[] = [];
  for (const service of spec.services) {
    for (const dependency of service.depends_on || []) {
      if (!services_map.has(dependency)) {
        errors.push(new ValidationError({ path: `services.${service.name}.depends_on`, message: `Depends on undeclared service '${dependency}'`, value: dependency }));
      }
    }

    if (service.port !== undefined) {
      const owner = published_ports.get(service.port);
      if (owner) {
        errors.push(new ValidationError({ path: `services.${service.name}.port`, message: `Port ${service.port} is already published by '${owner}'`, value: service.port }));
      }
      published_ports.set(service.port, service.name);
    }

    services.push({
      name: service.name,
      image: service.image,
      build: service.build,
      depends_on: service.depends_on || [],
      network,
      port: service.port,
      target_port: service.target_port,
      environment: interpolateEnvironment(service.name, service.environment || {}, services_map, errors),
      healthcheck: service.healthcheck ? {
        test: service.healthcheck.test,
        interval: service.healthcheck.interval || '10s',
        timeout: service.healthcheck.timeout || '5s',
        retries: service.healthcheck.retries ?? 3,
        start_period: service.healthcheck.start_period || '0s',
      } : undefined,
    });
  }

  const proxy = buildProxyConfig(spec, errors);

  if (errors.length > 0) {
    throw new ValidationErrors(errors, file);
  }

  return deepFreeze({
    name: spec.name,
    network,
    services,
    proxy,
  });
};
