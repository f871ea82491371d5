import { StackError } from '../utils/errors';

export class ConfirmationRequiredError extends StackError {
  constructor(phrase: string) {
    super();
    this.name = 'confirmation_required';
    this.message = `Destroying the deployment requires the confirmation phrase '${phrase}'`;
  }
}

export class ReconcileInProgressError extends StackError {
  constructor(deployment: string, owner?: number) {
    super();
    this.name = 'reconcile_in_progress';
    this.message = `Another reconciliation of '${deployment}' is in progress${owner ? ` (pid ${owner})` : ''}`;
  }
}

export class InvalidTransitionError extends StackError {
  constructor(service: string, from: string, to: string) {
    super();
    this.name = 'invalid_transition';
    this.message = `Service '${service}' cannot move from ${from} to ${to}`;
  }
}

export class DependencyCycleError extends StackError {
  constructor(cycle: string[]) {
    super();
    this.name = 'dependency_cycle';
    this.message = `Circular dependency detected: ${cycle.join(' -> ')}`;
  }
}
