import { expect } from 'chai';
import fs from 'fs-extra';
import mock_fs from 'mock-fs';
import sinon from 'sinon';
import { ReconcileInProgressError } from '../../../src/common/errors/lifecycle-errors';
import { DeploymentLock } from '../../../src/common/lifecycle/deployment-lock';

const processGone = () => Object.assign(new Error('kill ESRCH'), { code: 'ESRCH' });

const rejection = async (promise: Promise<unknown>): Promise<unknown> => {
  try {
    await promise;
  } catch (err) {
    return err;
  }
  throw new Error('Expected the promise to reject');
};

describe('deployment lock', () => {
  beforeEach(() => {
    mock_fs({ '/state': {} });
  });

  it('should hold a lock file with the owner pid', async () => {
    const lock = new DeploymentLock('shop-net', '/state');
    await lock.acquire();
    expect(lock.lock_file).to.eq('/state/shop-net.lock');
    expect(fs.readFileSync('/state/shop-net.lock', 'utf-8')).to.eq(`${process.pid}`);

    await lock.release();
    expect(fs.existsSync('/state/shop-net.lock')).to.be.false;
  });

  it('should create the lock directory', async () => {
    const lock = new DeploymentLock('shop-net', '/state/nested');
    await lock.run(async () => {
      expect(fs.existsSync('/state/nested/shop-net.lock')).to.be.true;
    });
  });

  it('should refuse a second holder in this process', async () => {
    const first = new DeploymentLock('shop-net', '/state');
    await first.acquire();
    try {
      const error = await rejection(new DeploymentLock('shop-net', '/state').acquire());
      expect(error).to.be.instanceOf(ReconcileInProgressError);
      expect(error).to.have.property('message', `Another reconciliation of 'shop-net' is in progress (pid ${process.pid})`);
    } finally {
      await first.release();
    }
  });

  it('should refuse a lock held by another live process', async () => {
    fs.writeFileSync('/state/shop-net.lock', '4242');
    sinon.stub(process, 'kill').returns(true);

    const error = await rejection(new DeploymentLock('shop-net', '/state').acquire());
    expect(error).to.have.property('message', `Another reconciliation of 'shop-net' is in progress (pid 4242)`);
    expect(fs.readFileSync('/state/shop-net.lock', 'utf-8')).to.eq('4242');

    // the failed attempt does not leave the deployment marked as held
    sinon.restore();
    fs.removeSync('/state/shop-net.lock');
    await new DeploymentLock('shop-net', '/state').run(async () => undefined);
  });

  it('should reclaim a lock left by a dead process', async () => {
    fs.writeFileSync('/state/shop-net.lock', '4242');
    sinon.stub(process, 'kill').throws(processGone());

    const lock = new DeploymentLock('shop-net', '/state');
    await lock.acquire();
    expect(fs.readFileSync('/state/shop-net.lock', 'utf-8')).to.eq(`${process.pid}`);
    await lock.release();
  });

  it('should release after a failed run', async () => {
    const lock = new DeploymentLock('shop-net', '/state');
    const error = await rejection(lock.run(async () => {
      throw new Error('boom');
    }));
    expect(error).to.have.property('message', 'boom');
    expect(fs.existsSync('/state/shop-net.lock')).to.be.false;
    expect(await new DeploymentLock('shop-net', '/state').run(async () => 'again')).to.eq('again');
  });

  it('should guard in memory without a lock directory', async () => {
    const lock = new DeploymentLock('shop-net');
    expect(lock.lock_file).to.be.undefined;
    await lock.run(async () => {
      const error = await rejection(new DeploymentLock('shop-net').acquire());
      expect(error).to.be.instanceOf(ReconcileInProgressError);
    });
  });
});
