import execa from 'execa';
import which from 'which';
import DockerNotInstalledError from '../errors/docker-not-installed';
import { RuntimeUnavailableError } from '../errors/runtime-errors';

class _DockerHelper {
  private docker_path?: string;

  async checkDockerInstalled(): Promise<boolean> {
    if (this.docker_path) {
      return true;
    }
    try {
      this.docker_path = await which('docker');
      return true;
    } catch {
      return false;
    }
  }

  async verifyDocker(): Promise<void> {
    if (!await this.checkDockerInstalled()) {
      throw new DockerNotInstalledError();
    }
  }

  /**
   * `docker info` only succeeds when the CLI can reach the daemon.
   */
  async verifyDaemon(): Promise<void> {
    await this.verifyDocker();
    try {
      await execa('docker', ['info', '--format', '{{json .ServerVersion}}']);
    } catch (err) {
      throw new RuntimeUnavailableError('Docker daemon is not running. Please start it and try again.', err);
    }
  }
}

export const DockerHelper = new _DockerHelper();
