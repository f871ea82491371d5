import { test } from '@oclif/test';
import { expect } from 'chai';
import fs from 'fs-extra';
import inquirer from 'inquirer';
import BaseCommand from '../../src/base-command';
import { DESTROY_CANCELLED_EXIT_CODE } from '../../src/commands/destroy';
import PromptUtils from '../../src/common/utils/prompt-utils';
import { FakeRuntime, output, seedStack, stackDir } from '../utils/mocks';

const CONFIRMATION_LISTING = [
  'This will stop and remove the following containers:',
  '  - api',
  '  - db',
  'and the network:',
  '  - shop-net',
];

describe('destroy', () => {
  const { dir, config_path } = stackDir('minimal');

  after(() => {
    fs.removeSync(dir);
  });

  const mockStack = (runtime: FakeRuntime) =>
    test
      .stub(BaseCommand.prototype, 'runtime', () => runtime)
      .do(() => seedStack(runtime, config_path));

  const approved = new FakeRuntime();
  mockStack(approved)
    .stdout()
    .command(['destroy', '--config', config_path, '--auto-approve'])
    .it('should tear the stack down with --auto-approve', ctx => {
      expect(ctx.stdout).to.eq(output(
        'api: removed (running -> absent)',
        'db: removed (running -> absent)',
        'network shop-net: removed',
        '\nshop destroyed',
      ));
      expect(approved.containers.size).to.eq(0);
      expect(approved.networks.size).to.eq(0);
    });

  const unprompted = new FakeRuntime();
  mockStack(unprompted)
    .stdout()
    .stderr()
    .command(['destroy', '--config', config_path])
    .catch('--auto-approve flag is required when prompts are unavailable')
    .it('should require --auto-approve when prompts are unavailable', ctx => {
      expect(ctx.stdout).to.eq(output(...CONFIRMATION_LISTING));
      expect(unprompted.calls).to.deep.eq([]);
    });

  const declined = new FakeRuntime();
  mockStack(declined)
    .stub(PromptUtils, 'promptsAvailable', () => true)
    .stub(inquirer, 'prompt', async () => ({ confirmation: 'yes' }))
    .stdout()
    .command(['destroy', '--config', config_path])
    .exit(DESTROY_CANCELLED_EXIT_CODE)
    .it('should cancel on a wrong confirmation', ctx => {
      expect(ctx.stdout).to.eq(output(...CONFIRMATION_LISTING, 'Destruction cancelled'));
      expect(declined.calls).to.deep.eq([]);
      expect(declined.containers.size).to.eq(2);
    });

  const confirmed = new FakeRuntime();
  mockStack(confirmed)
    .stub(PromptUtils, 'promptsAvailable', () => true)
    .stub(inquirer, 'prompt', async () => ({ confirmation: ' destroy-app ' }))
    .stdout()
    .command(['destroy', '--config', config_path])
    .it('should proceed once the phrase is typed', ctx => {
      expect(ctx.stdout).to.eq(output(
        ...CONFIRMATION_LISTING,
        'api: removed (running -> absent)',
        'db: removed (running -> absent)',
        'network shop-net: removed',
        '\nshop destroyed',
      ));
      expect(confirmed.containers.size).to.eq(0);
    });

  const planned = new FakeRuntime();
  mockStack(planned)
    .stdout()
    .command(['destroy', '--config', config_path, '--dry-run'])
    .it('should only print the plan on a dry run', ctx => {
      expect(ctx.stdout).to.eq(output(
        '[dry run] stop api',
        '[dry run] remove api',
        '[dry run] stop db',
        '[dry run] remove db',
        'api: planned (running -> absent)',
        'db: planned (running -> absent)',
        'network shop-net: planned',
        '\n[dry run] 5 action(s) planned, nothing was removed',
      ));
      expect(planned.mutations()).to.deep.eq([]);
    });

  const stuck = new FakeRuntime().failOn('stop', 'api');
  mockStack(stuck)
    .stdout()
    .stderr()
    .command(['destroy', '--config', config_path, '--auto-approve'])
    .exit(1)
    .it('should exit with 1 when a service cannot be removed', ctx => {
      expect(ctx.stdout).to.eq(output(
        'api: failed (running -> running)\n    stop api failed: stop api refused',
        'db: removed (running -> absent)',
        'network shop-net: in-use',
      ));
      expect(ctx.stderr).to.contain('Warning: api: stop api failed: stop api refused');
      expect(ctx.stderr).to.contain('Warning: Network shop-net is still used by api');
    });
});
