import { expect } from 'chai';

import { encodeTransferInstruction } from '../codec/payload.js';
import {
  ChainNotAllowed,
  InsufficientFeeBalance,
  InvalidAmount,
  InvalidPayload,
  InvalidReceiver,
  ReplayedMessage,
  SenderNotAllowed,
  TokenNotAllowed,
  TransportError,
  UnexpectedPayment,
  UnsupportedSettlement,
} from '../errors.js';
import { NATIVE_ASSET } from '../ledger/AssetLedger.js';
import {
  ALICE,
  ALPHA,
  BETA,
  BOB,
  FEE_TOKEN,
  FEE_TOKEN_FEE,
  NATIVE_FEE,
  RELAY,
  TOKEN,
  TRANSPORT,
  TestEnvironment,
  allowRoute,
  createTestEnvironment,
  fundSender,
  sendRequest,
} from '../test/testUtils.js';
import { FeeSettlement, Message, ProtocolVariants } from '../types.js';

const RESERVE = 10_000n;

function inboundMessage(overrides: Partial<Message> = {}): Message {
  return {
    id: '0x' + '11'.repeat(32),
    sourceNetwork: ALPHA,
    destinationNetwork: BETA,
    sender: RELAY,
    receiver: RELAY,
    payload: encodeTransferInstruction(
      { recipient: BOB, asset: TOKEN, amount: 50n, data: '0x' },
      true,
    ),
    assetTransfers: [{ asset: TOKEN, amount: 50n }],
    feeSettlement: FeeSettlement.PrefundedReserve,
    feeAsset: FEE_TOKEN,
    ...overrides,
  };
}

describe('CrossNetworkRelay', () => {
  let env: TestEnvironment;

  beforeEach(() => {
    env = createTestEnvironment();
  });

  describe('send', () => {
    beforeEach(() => {
      allowRoute(env);
      fundSender(env, 100n);
      env.alpha.assets.mint(FEE_TOKEN, RELAY, RESERVE);
    });

    it('dispatches a prefunded send and reports it', () => {
      const { relay } = env.source;
      const messageId = relay.send({ from: ALICE }, sendRequest());

      expect(messageId).to.match(/^0x[0-9a-f]{64}$/);
      const [sent] = env.alpha.getLogs({ type: 'MessageSent', emitter: RELAY });
      expect(sent.event).to.deep.equal({
        type: 'MessageSent',
        messageId,
        destinationNetwork: BETA,
        receiver: RELAY,
        asset: TOKEN,
        amount: 100n,
        feeAsset: FEE_TOKEN,
        feeAmount: FEE_TOKEN_FEE,
      });
      expect(env.alpha.assets.balanceOf(TOKEN, ALICE)).to.equal(0n);
      expect(relay.custodyBalance(FEE_TOKEN)).to.equal(RESERVE - FEE_TOKEN_FEE);
      expect(env.alpha.assets.balanceOf(FEE_TOKEN, TRANSPORT)).to.equal(
        FEE_TOKEN_FEE,
      );
      expect(env.transport.getBacklog().map((q) => q.message.id)).to.deep.equal(
        [messageId],
      );
    });

    it('delivers the transfer to the recipient once the transport runs', () => {
      const messageId = env.source.relay.send({ from: ALICE }, sendRequest());
      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(0n);

      expect(env.transport.flush()).to.equal(1);

      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(100n);
      expect(env.destination.relay.hasProcessed(messageId)).to.be.true;
      expect(env.destination.relay.getLastReceived()).to.deep.equal({
        messageId,
        sourceNetwork: ALPHA,
        sender: RELAY,
        payload: env.transport.getMessage(messageId)?.message.payload,
        recipient: BOB,
        asset: TOKEN,
        amount: 100n,
        data: '0x',
      });
      expect(env.transport.getMessage(messageId)?.status).to.equal('delivered');
    });

    it('carries payload data to the destination', () => {
      env.source.relay.send({ from: ALICE }, sendRequest({ data: '0xdeadbeef' }));
      env.transport.flush();
      expect(env.destination.relay.getLastReceived()?.data).to.equal(
        '0xdeadbeef',
      );
    });

    it('quotes what the send pays', () => {
      expect(env.source.relay.quote(sendRequest())).to.deep.equal({
        asset: FEE_TOKEN,
        amount: FEE_TOKEN_FEE,
      });
      // four more data bytes take one more 32 byte word
      expect(
        env.source.relay.quote(sendRequest({ data: '0xdeadbeef' })).amount,
      ).to.equal(FEE_TOKEN_FEE + 32n * 2n);
    });

    it('fails ChainNotAllowed for a destination off the allowlist', () => {
      const { relay, capability } = env.source;
      relay.admin.setDestinationAllowed(capability, BETA, false);
      expect(() => relay.send({ from: ALICE }, sendRequest()))
        .to.throw(ChainNotAllowed)
        .with.property('network', BETA);
      expect(env.alpha.assets.balanceOf(TOKEN, ALICE)).to.equal(100n);
    });

    it('fails TokenNotAllowed for an asset off the allowlist', () => {
      const { relay, capability } = env.source;
      relay.admin.setAssetAllowed(capability, TOKEN, false);
      expect(() => relay.send({ from: ALICE }, sendRequest())).to.throw(
        TokenNotAllowed,
      );
    });

    it('fails InvalidReceiver for a missing receiver or recipient', () => {
      const { relay } = env.source;
      expect(() =>
        relay.send({ from: ALICE }, sendRequest({ receiver: NATIVE_ASSET })),
      ).to.throw(InvalidReceiver);
      expect(() =>
        relay.send({ from: ALICE }, sendRequest({ recipient: '' })),
      ).to.throw(InvalidReceiver);
    });

    it('fails InvalidAmount for a zero amount', () => {
      expect(() =>
        env.source.relay.send({ from: ALICE }, sendRequest({ amount: 0n })),
      ).to.throw(InvalidAmount);
    });

    it('restores the caller when the reserve cannot cover the fee', () => {
      const { relay, capability } = env.source;
      relay.admin.withdrawFeeAsset(capability, BOB);
      env.alpha.assets.mint(FEE_TOKEN, RELAY, FEE_TOKEN_FEE - 1n);

      expect(() => relay.send({ from: ALICE }, sendRequest()))
        .to.throw(InsufficientFeeBalance)
        .with.property('available', FEE_TOKEN_FEE - 1n);

      expect(env.alpha.assets.balanceOf(TOKEN, ALICE)).to.equal(100n);
      expect(env.alpha.assets.allowance(TOKEN, ALICE, RELAY)).to.equal(100n);
      expect(relay.custodyBalance(TOKEN)).to.equal(0n);
      expect(env.alpha.getLogs({ type: 'MessageSent' })).to.have.length(0);
      expect(env.transport.getBacklog()).to.have.length(0);
    });

    it('rejects a payment attached to a prefunded send', () => {
      env.alpha.assets.mint(NATIVE_ASSET, ALICE, 50n);
      expect(() =>
        env.source.relay.send({ from: ALICE, value: 50n }, sendRequest()),
      ).to.throw(UnexpectedPayment);
      expect(env.alpha.assets.balanceOf(NATIVE_ASSET, ALICE)).to.equal(50n);
    });

    it('wraps transport failures and rolls back the send', () => {
      const { relay, capability } = env.source;
      // the transport does not accept TOKEN as a fee asset
      relay.admin.setFeeAsset(capability, TOKEN);
      expect(() => relay.send({ from: ALICE }, sendRequest()))
        .to.throw(TransportError)
        .with.nested.property('cause.message')
        .that.contains('is not accepted on alpha');
      expect(env.alpha.assets.balanceOf(TOKEN, ALICE)).to.equal(100n);
    });

    describe('with an attached payment', () => {
      const request = sendRequest({
        settlement: FeeSettlement.CallerAttachedPayment,
      });

      beforeEach(() => {
        env.alpha.assets.mint(NATIVE_ASSET, ALICE, 5000n);
      });

      it('charges exactly the quote and refunds the excess', () => {
        const { relay } = env.source;
        expect(relay.quote(request)).to.deep.equal({
          asset: NATIVE_ASSET,
          amount: NATIVE_FEE,
        });

        relay.send({ from: ALICE, value: NATIVE_FEE + 10n }, request);

        expect(env.alpha.assets.balanceOf(NATIVE_ASSET, ALICE)).to.equal(
          5000n - NATIVE_FEE,
        );
        expect(env.alpha.assets.balanceOf(NATIVE_ASSET, TRANSPORT)).to.equal(
          NATIVE_FEE,
        );
        expect(relay.custodyBalance(NATIVE_ASSET)).to.equal(0n);
        // the shared reserve is untouched
        expect(relay.custodyBalance(FEE_TOKEN)).to.equal(RESERVE);
        const [sent] = env.alpha.getLogs({ type: 'MessageSent' });
        expect(sent.event.feeAsset).to.equal(NATIVE_ASSET);
        expect(sent.event.feeAmount).to.equal(NATIVE_FEE);
      });

      it('fails InsufficientFeeBalance when the payment is short', () => {
        expect(() =>
          env.source.relay.send({ from: ALICE, value: NATIVE_FEE - 1n }, request),
        ).to.throw(InsufficientFeeBalance);
        expect(env.alpha.assets.balanceOf(NATIVE_ASSET, ALICE)).to.equal(5000n);
        expect(env.alpha.assets.balanceOf(TOKEN, ALICE)).to.equal(100n);
      });
    });
  });

  describe('deliver', () => {
    beforeEach(() => {
      allowRoute(env);
      env.beta.assets.mint(TOKEN, RELAY, 500n);
    });

    it('releases the decoded amount to the recipient', () => {
      const message = inboundMessage();
      const received = env.destination.relay.deliver(message, TRANSPORT);

      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(50n);
      expect(env.destination.relay.hasProcessed(message.id)).to.be.true;
      expect(received).to.deep.equal({
        messageId: message.id,
        sourceNetwork: ALPHA,
        sender: RELAY,
        payload: message.payload,
        recipient: BOB,
        asset: TOKEN,
        amount: 50n,
        data: '0x',
      });
      const [event] = env.beta.getLogs({ type: 'MessageReceived' });
      expect(event.event).to.deep.equal({ type: 'MessageReceived', ...received });
    });

    it('rejects a second delivery of the same id without side effects', () => {
      const message = inboundMessage();
      env.destination.relay.deliver(message, TRANSPORT);
      const logCount = env.beta.logs.length;

      expect(() => env.destination.relay.deliver(message, TRANSPORT))
        .to.throw(ReplayedMessage)
        .with.property('messageId', message.id);

      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(50n);
      expect(env.destination.relay.custodyBalance(TOKEN)).to.equal(450n);
      expect(env.destination.relay.processedCount()).to.equal(1);
      expect(env.beta.logs).to.have.length(logCount);
    });

    it('rejects a delivery re-entered from the recipient', () => {
      const message = inboundMessage();
      const reentryErrors: unknown[] = [];
      env.beta.assets.onReceive(BOB, () => {
        try {
          env.destination.relay.deliver(message, TRANSPORT);
        } catch (error) {
          reentryErrors.push(error);
        }
      });

      env.destination.relay.deliver(message, TRANSPORT);

      expect(reentryErrors).to.have.length(1);
      expect(reentryErrors[0]).to.be.instanceOf(ReplayedMessage);
      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(50n);
    });

    it('fails ChainNotAllowed for a source off the allowlist', () => {
      expect(() =>
        env.destination.relay.deliver(
          inboundMessage({ sourceNetwork: 'gamma' }),
          TRANSPORT,
        ),
      )
        .to.throw(ChainNotAllowed)
        .with.property('network', 'gamma');
    });

    it('fails SenderNotAllowed for a sender off the allowlist', () => {
      expect(() =>
        env.destination.relay.deliver(
          inboundMessage({ sender: ALICE }),
          TRANSPORT,
        ),
      ).to.throw(SenderNotAllowed);
      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(0n);
    });

    it('rolls back the processed mark when the asset is not allowed', () => {
      const { relay, capability } = env.destination;
      relay.admin.setAssetAllowed(capability, TOKEN, false);
      const message = inboundMessage();

      expect(() => relay.deliver(message, TRANSPORT)).to.throw(TokenNotAllowed);

      expect(relay.hasProcessed(message.id)).to.be.false;
      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(0n);
    });

    it('fails InvalidPayload for an undecodable payload', () => {
      const message = inboundMessage({ payload: '0x1234' });
      expect(() =>
        env.destination.relay.deliver(message, TRANSPORT),
      ).to.throw(InvalidPayload);
      expect(env.destination.relay.hasProcessed(message.id)).to.be.false;
    });

    it('never shrinks the processed ledger through administration', () => {
      const { relay, capability } = env.destination;
      relay.deliver(inboundMessage(), TRANSPORT);
      relay.admin.setSourceAllowed(capability, ALPHA, false);
      relay.admin.setSenderAllowed(capability, RELAY, false);
      relay.admin.withdrawAsset(capability, TOKEN, BOB);
      expect(relay.processedCount()).to.equal(1);
      expect(relay.hasProcessed(inboundMessage().id)).to.be.true;
    });
  });

  describe('protocol variants', () => {
    it('rejects payload data when the relay carries none', () => {
      env = createTestEnvironment({ variant: ProtocolVariants.tokenOnly });
      allowRoute(env);
      fundSender(env, 100n);
      env.alpha.assets.mint(FEE_TOKEN, RELAY, RESERVE);

      expect(() =>
        env.source.relay.send(
          { from: ALICE },
          sendRequest({ data: '0xdeadbeef' }),
        ),
      ).to.throw(InvalidPayload);

      env.source.relay.send({ from: ALICE }, sendRequest());
      env.transport.flush();
      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(100n);
    });

    it('rejects settlement modes the variant lacks', () => {
      env = createTestEnvironment({ variant: ProtocolVariants.unprotected });
      allowRoute(env);
      fundSender(env, 100n);
      expect(() =>
        env.source.relay.send(
          { from: ALICE },
          sendRequest({ settlement: FeeSettlement.CallerAttachedPayment }),
        ),
      ).to.throw(UnsupportedSettlement);
    });

    it('keeps no replay ledger in the unprotected variant', () => {
      env = createTestEnvironment({ variant: ProtocolVariants.unprotected });
      allowRoute(env);
      env.beta.assets.mint(TOKEN, RELAY, 500n);
      const message = inboundMessage();

      env.destination.relay.deliver(message, TRANSPORT);
      env.destination.relay.deliver(message, TRANSPORT);

      expect(env.beta.assets.balanceOf(TOKEN, BOB)).to.equal(100n);
      expect(env.destination.relay.hasProcessed(message.id)).to.be.false;
    });
  });
});
