import { ExecaReturnValue, Options } from 'execa';
import { quote } from 'shell-quote';
import { docker } from '../docker/cmd';
import { DockerHelper } from '../docker/helper';
import { Dictionary } from '../utils/dictionary';
import { ContainerHealth, ContainerInspection, ContainerRuntime, ContainerSpec, ContainerStatus, ImageBuilder, NetworkInspection } from './runtime';

interface DockerContainerInspectJSON {
  Name: string;
  State: {
    Status: ContainerStatus;
    Health?: { Status: ContainerHealth };
  };
  Config: {
    Labels: Dictionary<string> | null;
  };
  NetworkSettings: {
    Networks: Dictionary<unknown> | null;
  };
}

interface DockerNetworkInspectJSON {
  Name: string;
  Containers: Dictionary<{ Name: string }> | null;
}

export type DockerExec = (args: string[], opts?: { stdout: boolean }, execa_opts?: Options) => Promise<Pick<ExecaReturnValue, 'exitCode' | 'stdout' | 'stderr'>>;

const isNotFound = (stderr: string): boolean => /no such (container|network|object|image)|not found/i.test(stderr);

/**
 * Translates a compose style health check test (`["CMD-SHELL", "pg_isready"]`) into `docker create` flags.
 */
export const healthCheckArgs = (healthcheck: ContainerSpec['healthcheck']): string[] => {
  if (!healthcheck) {
    return [];
  }
  const [kind, ...command] = healthcheck.test;
  if (kind === 'NONE') {
    return ['--no-healthcheck'];
  }

  let health_cmd: string;
  if (kind === 'CMD-SHELL') {
    health_cmd = command.join(' ');
  } else if (kind === 'CMD') {
    health_cmd = quote(command);
  } else {
    health_cmd = healthcheck.test.join(' ');
  }

  return [
    '--health-cmd', health_cmd,
    '--health-interval', healthcheck.interval,
    '--health-timeout', healthcheck.timeout,
    '--health-retries', `${healthcheck.retries}`,
    '--health-start-period', healthcheck.start_period,
  ];
};

export const createArgs = (spec: ContainerSpec): string[] => {
  const args = ['create', '--name', spec.name, '--network', spec.network];
  for (const [key, value] of Object.entries(spec.labels)) {
    args.push('--label', `${key}=${value}`);
  }
  for (const [key, value] of Object.entries(spec.environment)) {
    args.push('--env', `${key}=${value}`);
  }
  for (const port of spec.ports) {
    args.push('--publish', `${port.published}:${port.target}`);
  }
  args.push(...healthCheckArgs(spec.healthcheck), spec.image);
  return args;
};

export class DockerRuntime implements ContainerRuntime {
  constructor(private readonly exec: DockerExec = docker) { }

  async ping(): Promise<void> {
    await DockerHelper.verifyDaemon();
  }

  async create(spec: ContainerSpec): Promise<void> {
    await this.exec(createArgs(spec), { stdout: false });
  }

  async start(name: string): Promise<void> {
    await this.exec(['start', name], { stdout: false });
  }

  async stop(name: string): Promise<void> {
    await this.exec(['stop', name], { stdout: false });
  }

  async remove(name: string): Promise<void> {
    await this.exec(['rm', '--force', name], { stdout: false });
  }

  async inspect(name: string): Promise<ContainerInspection | undefined> {
    const { exitCode, stdout, stderr } = await this.exec(['container', 'inspect', '--format', '{{json .}}', name], { stdout: false }, { reject: false });
    if (exitCode !== 0) {
      if (isNotFound(stderr)) {
        return undefined;
      }
      throw new Error(`Unable to inspect container ${name}: ${stderr}`);
    }

    const container: DockerContainerInspectJSON = JSON.parse(stdout);
    return {
      name: container.Name.replace(/^\//, ''),
      status: container.State.Status,
      health: container.State.Health?.Status || 'none',
      labels: container.Config.Labels || {},
      networks: Object.keys(container.NetworkSettings.Networks || {}),
    };
  }

  async imageId(image: string): Promise<string | undefined> {
    const { exitCode, stdout, stderr } = await this.exec(['image', 'inspect', '--format', '{{.Id}}', image], { stdout: false }, { reject: false });
    if (exitCode !== 0) {
      if (isNotFound(stderr)) {
        return undefined;
      }
      throw new Error(`Unable to inspect image ${image}: ${stderr}`);
    }
    return stdout.trim() || undefined;
  }

  async createNetwork(name: string): Promise<void> {
    await this.exec(['network', 'create', name], { stdout: false });
  }

  async removeNetwork(name: string): Promise<void> {
    await this.exec(['network', 'rm', name], { stdout: false });
  }

  async inspectNetwork(name: string): Promise<NetworkInspection | undefined> {
    const { exitCode, stdout, stderr } = await this.exec(['network', 'inspect', '--format', '{{json .}}', name], { stdout: false }, { reject: false });
    if (exitCode !== 0) {
      if (isNotFound(stderr)) {
        return undefined;
      }
      throw new Error(`Unable to inspect network ${name}: ${stderr}`);
    }

    const network: DockerNetworkInspectJSON = JSON.parse(stdout);
    return {
      name: network.Name,
      containers: Object.values(network.Containers || {}).map(container => container.Name),
    };
  }
}

export class DockerImageBuilder implements ImageBuilder {
  async build(image: string, context: string): Promise<void> {
    await docker(['build', '--tag', image, context]);
  }
}
