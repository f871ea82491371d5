import type { RouteConfig } from '../config/stack-config';
import { ValidationError, ValidationErrors } from '../utils/errors';

interface PrefixEntry {
  prefix: string;
  route: RouteConfig;
}

interface RegexEntry {
  regex: RegExp;
  route: RouteConfig;
}

const CATCH_ALL_PREFIX = '/';

/**
 * Routing rules are matched in a fixed order, first hit wins:
 *   1. exact paths
 *   2. prefixes, longest first; prefixes of equal length keep their declaration order
 *   3. regular expressions in declaration order
 *   4. the catch-all prefix `/`
 *
 * The catch-all is held back until last, otherwise it would shadow every regular expression.
 * A table is immutable once built. Reloading builds a new table and swaps it in through a `RoutingTableHolder`.
 */
export class RoutingTable {
  readonly generation: number;
  private readonly exact = new Map<string, RouteConfig>();
  private readonly prefixes: PrefixEntry[];
  private readonly regexes: RegexEntry[] = [];
  private readonly catch_all: RouteConfig;

  /**
   * `/api/*` and `/api/` are the same prefix
   */
  static normalizePrefix(path: string): string {
    return path.endsWith('*') ? path.slice(0, -1) : path;
  }

  static validateRoutes(routes: readonly RouteConfig[]): ValidationError[] {
    const errors: ValidationError[] = [];
    let has_catch_all = false;
    for (const [index, route] of routes.entries()) {
      const path = `proxy.routes.${index}.path`;
      if (route.match === 'regex') {
        try {
          new RegExp(route.path);
        } catch {
          errors.push(new ValidationError({ path, message: 'Invalid regular expression', value: route.path }));
        }
        continue;
      }

      if (!route.path.startsWith('/')) {
        errors.push(new ValidationError({ path, message: 'Path must start with /', value: route.path }));
      }
      if (route.match === 'prefix' && RoutingTable.normalizePrefix(route.path) === CATCH_ALL_PREFIX) {
        has_catch_all = true;
      }
    }

    if (!has_catch_all) {
      errors.push(new ValidationError({ path: 'proxy.routes', message: `A catch-all prefix route '${CATCH_ALL_PREFIX}' is required` }));
    }
    return errors;
  }

  constructor(routes: readonly RouteConfig[], generation = 1) {
    const errors = RoutingTable.validateRoutes(routes);
    if (errors.length > 0) {
      throw new ValidationErrors(errors);
    }
    this.generation = generation;

    const prefixes: PrefixEntry[] = [];
    let catch_all: RouteConfig | undefined;
    for (const route of routes) {
      if (route.match === 'exact') {
        if (!this.exact.has(route.path)) {
          this.exact.set(route.path, route);
        }
      } else if (route.match === 'prefix') {
        const prefix = RoutingTable.normalizePrefix(route.path);
        if (prefix !== CATCH_ALL_PREFIX) {
          prefixes.push({ prefix, route });
        } else if (!catch_all) {
          catch_all = route;
        }
      } else {
        this.regexes.push({ regex: new RegExp(route.path), route });
      }
    }

    // Array.prototype.sort is stable, so equal lengths stay in declaration order
    this.prefixes = prefixes.sort((a, b) => b.prefix.length - a.prefix.length);

    if (!catch_all) {
      throw new ValidationErrors([new ValidationError({ path: 'proxy.routes', message: `A catch-all prefix route '${CATCH_ALL_PREFIX}' is required` })]);
    }
    this.catch_all = catch_all;
  }

  match(request_path: string): RouteConfig {
    const path = request_path.split(/[?#]/, 1)[0];

    const exact = this.exact.get(path);
    if (exact) {
      return exact;
    }

    for (const entry of this.prefixes) {
      if (path.startsWith(entry.prefix)) {
        return entry.route;
      }
    }

    for (const entry of this.regexes) {
      if (entry.regex.test(path)) {
        return entry.route;
      }
    }

    return this.catch_all;
  }
}

/**
 * Holds the live routing table. Lookups read a single reference, so a reload never exposes a half-built table.
 */
export class RoutingTableHolder {
  private current: RoutingTable;

  constructor(table: RoutingTable) {
    this.current = table;
  }

  get table(): RoutingTable {
    return this.current;
  }

  swap(routes: readonly RouteConfig[]): RoutingTable {
    this.current = new RoutingTable(routes, this.current.generation + 1);
    return this.current;
  }

  match(request_path: string): RouteConfig {
    return this.current.match(request_path);
  }
}
