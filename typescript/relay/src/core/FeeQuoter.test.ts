import { expect } from 'chai';

import {
  InsufficientFeeBalance,
  TransferFailed,
  TransportError,
  UnexpectedPayment,
} from '../errors.js';
import { NATIVE_ASSET } from '../ledger/AssetLedger.js';
import { CallContext, Network } from '../ledger/Network.js';
import {
  ALICE,
  ALPHA,
  BETA,
  BOB,
  FEE_TOKEN,
  FEE_TOKEN_FEE,
  NATIVE_FEE,
  RELAY,
  TEST_FEE_SCHEDULE,
  TOKEN,
  TRANSPORT,
  testLogger,
} from '../test/testUtils.js';
import { LocalTransport } from '../transport/LocalTransport.js';
import { FeeSettlement, MessageDraft, ProtocolVariants } from '../types.js';

import { Custody } from './Custody.js';
import { FeeQuoter } from './FeeQuoter.js';
import { RelayState } from './RelayState.js';

function draftFor(settlement: FeeSettlement, feeAsset: string): MessageDraft {
  return {
    destinationNetwork: BETA,
    sender: RELAY,
    receiver: RELAY,
    // 160 bytes, the size of a transfer instruction without data
    payload: '0x' + '00'.repeat(160),
    assetTransfers: [{ asset: TOKEN, amount: 100n }],
    feeSettlement: settlement,
    feeAsset,
  };
}

describe('FeeQuoter', () => {
  let network: Network;
  let custody: Custody;
  let quoter: FeeQuoter;

  const callFrom = (sender: string, value = 0n): CallContext => ({
    network,
    sender,
    self: RELAY,
    value,
  });

  beforeEach(() => {
    network = new Network(ALPHA, testLogger);
    const transport = new LocalTransport(
      {
        address: TRANSPORT,
        routes: { [BETA]: TEST_FEE_SCHEDULE },
        feeAssets: { [ALPHA]: { [FEE_TOKEN]: 2n } },
      },
      {},
      testLogger,
    );
    const state = new RelayState(
      network,
      RELAY,
      ProtocolVariants.standard,
      transport,
      FEE_TOKEN,
    );
    custody = new Custody(network, RELAY);
    quoter = new FeeQuoter(state, custody, testLogger);
  });

  it('picks the fee asset for each settlement', () => {
    expect(quoter.feeAssetFor(FeeSettlement.PrefundedReserve)).to.equal(
      FEE_TOKEN,
    );
    expect(quoter.feeAssetFor(FeeSettlement.CallerAttachedPayment)).to.equal(
      NATIVE_ASSET,
    );
  });

  it('quotes through the transport', () => {
    expect(
      quoter.quote(BETA, draftFor(FeeSettlement.PrefundedReserve, FEE_TOKEN)),
    ).to.deep.equal({ asset: FEE_TOKEN, amount: FEE_TOKEN_FEE });
    expect(
      quoter.quote(
        BETA,
        draftFor(FeeSettlement.CallerAttachedPayment, NATIVE_ASSET),
      ),
    ).to.deep.equal({ asset: NATIVE_ASSET, amount: NATIVE_FEE });
  });

  it('wraps transport failures', () => {
    expect(() =>
      quoter.quote('gamma', draftFor(FeeSettlement.PrefundedReserve, FEE_TOKEN)),
    )
      .to.throw(TransportError, 'Transport could not quote gamma')
      .with.nested.property(
        'cause.message',
        'Unsupported destination network gamma',
      );
  });

  describe('prefunded reserve', () => {
    const quote = { asset: FEE_TOKEN, amount: 2520n };

    beforeEach(() => {
      network.assets.mint(FEE_TOKEN, RELAY, 3000n);
    });

    it('accepts a fee the reserve covers', () => {
      expect(() =>
        quoter.ensureFeeCoverage(
          callFrom(ALICE),
          quote,
          FeeSettlement.PrefundedReserve,
        ),
      ).to.not.throw();
    });

    it('excludes the amount reserved for the message itself', () => {
      expect(() =>
        quoter.ensureFeeCoverage(
          callFrom(ALICE),
          quote,
          FeeSettlement.PrefundedReserve,
          1000n,
        ),
      )
        .to.throw(InsufficientFeeBalance)
        .with.property('available', 2000n);
    });

    it('refuses attached payment', () => {
      expect(() =>
        quoter.ensureFeeCoverage(
          callFrom(ALICE, 1n),
          quote,
          FeeSettlement.PrefundedReserve,
        ),
      ).to.throw(UnexpectedPayment);
    });
  });

  describe('caller attached payment', () => {
    const quote = { asset: NATIVE_ASSET, amount: NATIVE_FEE };

    it('rejects a payment below the quote', () => {
      expect(() =>
        quoter.ensureFeeCoverage(
          callFrom(ALICE, NATIVE_FEE - 1n),
          quote,
          FeeSettlement.CallerAttachedPayment,
        ),
      )
        .to.throw(InsufficientFeeBalance)
        .with.property('required', NATIVE_FEE);
    });

    it('refunds the excess to the caller', () => {
      // the attached value has already reached the relay
      network.assets.mint(NATIVE_ASSET, RELAY, NATIVE_FEE + 240n);
      quoter.ensureFeeCoverage(
        callFrom(ALICE, NATIVE_FEE + 240n),
        quote,
        FeeSettlement.CallerAttachedPayment,
      );
      expect(network.assets.balanceOf(NATIVE_ASSET, ALICE)).to.equal(240n);
      expect(custody.balanceOf(NATIVE_ASSET)).to.equal(NATIVE_FEE);
    });
  });
});

describe('Custody', () => {
  let network: Network;
  let custody: Custody;

  beforeEach(() => {
    network = new Network(ALPHA, testLogger);
    custody = new Custody(network, RELAY);
  });

  it('pulls approved assets in', () => {
    network.assets.mint(TOKEN, ALICE, 50n);
    network.assets.approve(TOKEN, ALICE, RELAY, 50n);
    custody.transferIn(TOKEN, ALICE, 50n);
    expect(custody.balanceOf(TOKEN)).to.equal(50n);
    expect(network.assets.allowance(TOKEN, ALICE, RELAY)).to.equal(0n);
  });

  it('raises TransferFailed when a transfer does not succeed', () => {
    expect(() => custody.transferOut(TOKEN, BOB, 1n))
      .to.throw(TransferFailed)
      .with.property('to', BOB);
    network.assets.mint(TOKEN, ALICE, 50n);
    expect(() => custody.transferIn(TOKEN, ALICE, 50n))
      .to.throw(TransferFailed)
      .with.property('from', ALICE);
  });
});
