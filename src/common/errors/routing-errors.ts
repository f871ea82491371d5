import { StackError } from '../utils/errors';

export class UnknownZoneError extends StackError {
  constructor(zone: string) {
    super();
    this.name = 'unknown_zone';
    this.message = `No rate limit zone named '${zone}'`;
  }
}

export class UnknownGroupError extends StackError {
  constructor(group: string) {
    super();
    this.name = 'unknown_group';
    this.message = `No upstream group named '${group}'`;
  }
}

export class GroupUnavailableError extends StackError {
  group: string;

  constructor(group: string) {
    super();
    this.name = 'group_unavailable';
    this.group = group;
    this.message = `Every member of upstream group '${group}' is unhealthy`;
  }
}
