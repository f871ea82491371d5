import { InvalidTransitionError } from '../errors/lifecycle-errors';
import { ContainerInspection } from '../runtime/runtime';

export enum ServiceState {
  ABSENT = 'absent',
  STOPPED = 'stopped',
  RUNNING = 'running',
  UNHEALTHY = 'unhealthy',
}

const TRANSITIONS: Record<ServiceState, ServiceState[]> = {
  [ServiceState.ABSENT]: [ServiceState.RUNNING],
  [ServiceState.STOPPED]: [ServiceState.RUNNING, ServiceState.ABSENT],
  [ServiceState.RUNNING]: [ServiceState.STOPPED, ServiceState.UNHEALTHY],
  [ServiceState.UNHEALTHY]: [ServiceState.STOPPED, ServiceState.RUNNING],
};

export const canTransition = (from: ServiceState, to: ServiceState): boolean => {
  return TRANSITIONS[from].includes(to);
};

export const assertTransition = (service: string, from: ServiceState, to: ServiceState): void => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(service, from, to);
  }
};

export const stateFromInspection = (inspection?: ContainerInspection): ServiceState => {
  if (!inspection) {
    return ServiceState.ABSENT;
  }
  switch (inspection.status) {
    case 'running':
      return inspection.health === 'unhealthy' ? ServiceState.UNHEALTHY : ServiceState.RUNNING;
    // A container stuck restarting is crash looping
    case 'restarting':
      return ServiceState.UNHEALTHY;
    default:
      return ServiceState.STOPPED;
  }
};
