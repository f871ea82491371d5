import { PrerequisiteError } from './runtime-errors';

export default class DockerNotInstalledError extends PrerequisiteError {
  constructor() {
    super('stackctl requires Docker to be installed. Please install it and try again.');
    this.name = 'docker_not_installed';
  }
}
