import { expect } from 'chai';
import sinon from 'sinon';

import { ALICE, BOB, RELAY, TOKEN, testLogger } from '../test/testUtils.js';
import { AllowlistKind } from '../types.js';

import { Network } from './Network.js';

describe('Network', () => {
  let network: Network;

  beforeEach(() => {
    network = new Network('alpha', testLogger);
  });

  afterEach(() => {
    sinon.restore();
  });

  it('commits the events of successful operations', () => {
    network.transact({ from: ALICE, to: RELAY }, (ctx) => {
      ctx.network.emit(RELAY, { type: 'AdminGranted', holder: BOB });
      expect(network.logs).to.have.length(0);
    });
    expect(network.logs).to.deep.equal([
      {
        network: 'alpha',
        emitter: RELAY,
        index: 0,
        event: { type: 'AdminGranted', holder: BOB },
      },
    ]);
  });

  it('discards the events of failed operations', () => {
    expect(() =>
      network.transact({ from: ALICE, to: RELAY }, (ctx) => {
        ctx.network.emit(RELAY, { type: 'AdminGranted', holder: BOB });
        throw new Error('abort');
      }),
    ).to.throw('abort');
    expect(network.logs).to.have.length(0);
  });

  it('filters logs by type and emitter', () => {
    network.assets.mint(TOKEN, ALICE, 10n);
    network.emit(RELAY, {
      type: 'AllowlistUpdated',
      list: AllowlistKind.Asset,
      id: TOKEN,
      allowed: true,
    });
    expect(network.getLogs({ type: 'AllowlistUpdated' })).to.have.length(1);
    expect(network.getLogs({ type: 'Transfer', emitter: RELAY })).to.have.length(
      0,
    );
    expect(network.getLogs({ type: 'Transfer', emitter: TOKEN })).to.have.length(
      1,
    );
  });

  it('notifies listeners until they unsubscribe', () => {
    const listener = sinon.spy();
    const unsubscribe = network.on(listener);
    network.emit(RELAY, { type: 'AdminGranted', holder: BOB });
    unsubscribe();
    network.emit(RELAY, { type: 'AdminRevoked', holder: BOB });
    expect(listener.calledOnce).to.be.true;
    expect(listener.firstCall.args[0].event).to.deep.equal({
      type: 'AdminGranted',
      holder: BOB,
    });
  });

  it('skips listeners that throw', () => {
    const failing = sinon.stub().throws(new Error('listener failed'));
    const healthy = sinon.spy();
    network.on(failing);
    network.on(healthy);
    network.emit(RELAY, { type: 'AdminGranted', holder: BOB });
    expect(failing.calledOnce).to.be.true;
    expect(healthy.calledOnce).to.be.true;
    expect(network.logs).to.have.length(1);
  });
});
