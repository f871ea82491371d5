import http from 'http';
import type { UpstreamGroupConfig } from '../config/stack-config';
import { GroupUnavailableError, UnknownGroupError } from '../errors/routing-errors';

export type HealthSignal = 'healthy' | 'unhealthy';

export interface UpstreamConnection {
  readonly id: number;
  readonly group: string;
  readonly member: string;
  readonly host: string;
  readonly port: number;
  readonly agent: http.Agent;
}

export interface ConnectionFactory {
  open(id: number, group: string, member: string): UpstreamConnection;
  close(connection: UpstreamConnection): void;
}

export interface MemberStatus {
  member: string;
  healthy: boolean;
  idle: number;
  active: number;
}

interface MemberState {
  endpoint: string;
  healthy: boolean;
  successes: number;
  rise: number;
  idle: UpstreamConnection[];
  active: number;
}

interface GroupState {
  config: UpstreamGroupConfig;
  members: MemberState[];
  cursor: number;
}

export const splitEndpoint = (endpoint: string): { host: string, port: number } => {
  const index = endpoint.lastIndexOf(':');
  return { host: endpoint.slice(0, index), port: Number.parseInt(endpoint.slice(index + 1)) };
};

/**
 * Each connection owns a keep-alive agent limited to one socket, so reusing the connection reuses the socket.
 */
export const httpConnectionFactory: ConnectionFactory = {
  open(id: number, group: string, member: string): UpstreamConnection {
    const { host, port } = splitEndpoint(member);
    return {
      id,
      group,
      member,
      host,
      port,
      agent: new http.Agent({ keepAlive: true, maxSockets: 1 }),
    };
  },

  close(connection: UpstreamConnection): void {
    connection.agent.destroy();
  },
};

export interface UpstreamPoolOptions {
  factory?: ConnectionFactory;
}

export class UpstreamPoolManager {
  private readonly groups = new Map<string, GroupState>();
  private readonly members = new Map<string, MemberState>();
  // Ids of connections handed out and not yet returned
  private readonly leased = new Set<number>();
  private readonly factory: ConnectionFactory;
  private next_id = 1;

  constructor(groups: readonly UpstreamGroupConfig[], options: UpstreamPoolOptions = {}) {
    this.factory = options.factory || httpConnectionFactory;

    for (const config of groups) {
      const members: MemberState[] = [];
      for (const endpoint of config.members) {
        // An endpoint listed by several groups shares one health record
        let member = this.members.get(endpoint);
        if (!member) {
          member = { endpoint, healthy: true, successes: 0, rise: config.rise, idle: [], active: 0 };
          this.members.set(endpoint, member);
        }
        member.rise = Math.max(member.rise, config.rise);
        members.push(member);
      }
      this.groups.set(config.name, { config, members, cursor: 0 });
    }
  }

  private getGroup(name: string): GroupState {
    const group = this.groups.get(name);
    if (!group) {
      throw new UnknownGroupError(name);
    }
    return group;
  }

  /**
   * Picks the next healthy member round-robin and hands out one of its idle connections, or a new one.
   */
  acquire(group_name: string): UpstreamConnection {
    const group = this.getGroup(group_name);
    const count = group.members.length;
    for (let offset = 0; offset < count; offset++) {
      const index = (group.cursor + offset) % count;
      const member = group.members[index];
      if (!member.healthy) {
        continue;
      }
      group.cursor = (index + 1) % count;
      member.active++;
      const connection = member.idle.pop() || this.factory.open(this.next_id++, group_name, member.endpoint);
      this.leased.add(connection.id);
      return connection;
    }
    throw new GroupUnavailableError(group_name);
  }

  /**
   * Returns a connection for reuse. Idle connections beyond the group's keepalive bound are closed. A connection that
   * is not currently leased, because it was already released or discarded, is ignored.
   */
  release(connection: UpstreamConnection): void {
    if (!this.leased.delete(connection.id)) {
      return;
    }
    const member = this.members.get(connection.member);
    if (!member) {
      this.factory.close(connection);
      return;
    }
    member.active = Math.max(member.active - 1, 0);

    const keepalive = this.groups.get(connection.group)?.config.keepalive ?? 0;
    if (member.idle.length < keepalive) {
      member.idle.push(connection);
    } else {
      this.factory.close(connection);
    }
  }

  /**
   * Closes a connection that must not be reused, such as one whose request timed out.
   */
  discard(connection: UpstreamConnection): void {
    if (!this.leased.delete(connection.id)) {
      return;
    }
    const member = this.members.get(connection.member);
    if (member) {
      member.active = Math.max(member.active - 1, 0);
    }
    this.factory.close(connection);
  }

  /**
   * An unhealthy signal ejects the member at once. A member rejoins after `rise` consecutive healthy signals.
   */
  markHealth(endpoint: string, signal: HealthSignal): void {
    const member = this.members.get(endpoint);
    if (!member) {
      return;
    }

    if (signal === 'unhealthy') {
      member.healthy = false;
      member.successes = 0;
      return;
    }

    if (member.healthy) {
      return;
    }
    member.successes++;
    if (member.successes >= member.rise) {
      member.healthy = true;
      member.successes = 0;
    }
  }

  isHealthy(endpoint: string): boolean {
    return this.members.get(endpoint)?.healthy ?? false;
  }

  endpoints(): string[] {
    return [...this.members.keys()];
  }

  groupConfig(group_name: string): UpstreamGroupConfig {
    return this.getGroup(group_name).config;
  }

  status(group_name: string): MemberStatus[] {
    return this.getGroup(group_name).members.map(member => ({
      member: member.endpoint,
      healthy: member.healthy,
      idle: member.idle.length,
      active: member.active,
    }));
  }

  close(): void {
    for (const member of this.members.values()) {
      for (const connection of member.idle) {
        this.factory.close(connection);
      }
      member.idle = [];
    }
  }
}
