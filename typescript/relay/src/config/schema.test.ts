import { expect } from 'chai';

import { Network } from '../ledger/Network.js';
import {
  ADMIN,
  ALPHA,
  BETA,
  FEE_TOKEN,
  RELAY,
  TOKEN,
  TRANSPORT,
  testLogger,
} from '../test/testUtils.js';
import { LocalTransport } from '../transport/LocalTransport.js';
import { AllowlistKind, ProtocolVariants } from '../types.js';

import { ZAmount } from './customZodTypes.js';
import { deployRelay } from './deploy.js';
import { RelayConfigSchema, TransportConfigSchema } from './schema.js';

describe('config schema', () => {
  describe('ZAmount', () => {
    it('accepts integers in several forms', () => {
      expect(ZAmount.parse('1000')).to.equal(1000n);
      expect(ZAmount.parse(42)).to.equal(42n);
      expect(ZAmount.parse(7n)).to.equal(7n);
    });

    it('rejects fractions and negatives', () => {
      const result = ZAmount.safeParse('1.5');
      expect(result.success).to.be.false;
      if (!result.success) {
        expect(result.error.issues[0].message).to.equal('Invalid amount 1.5');
      }
      expect(ZAmount.safeParse('-3').success).to.be.false;
      expect(ZAmount.safeParse(1.5).success).to.be.false;
    });
  });

  it('parses a transport config with defaults', () => {
    const config = TransportConfigSchema.parse({
      address: TRANSPORT.toLowerCase(),
      routes: { [BETA]: { baseFee: '1000' } },
      feeAssets: { [ALPHA]: { [FEE_TOKEN.toLowerCase()]: 2 } },
    });
    expect(config).to.deep.equal({
      address: TRANSPORT,
      carryAssets: true,
      routes: {
        [BETA]: { baseFee: 1000n, feePerByte: 0n, feePerTransfer: 0n },
      },
      feeAssets: { [ALPHA]: { [FEE_TOKEN]: 2n } },
    });
  });

  it('rejects invalid addresses', () => {
    const result = TransportConfigSchema.safeParse({
      address: '0x1234',
      routes: {},
    });
    expect(result.success).to.be.false;
    if (!result.success) {
      expect(result.error.issues[0].path).to.deep.equal(['address']);
      expect(result.error.issues[0].message).to.equal('Invalid address');
    }
  });

  it('parses a relay config with defaults', () => {
    const config = RelayConfigSchema.parse({
      address: RELAY,
      owner: ADMIN,
      feeAsset: FEE_TOKEN,
    });
    expect(config.variant).to.equal('standard');
    expect(config.allowlists).to.deep.equal({
      destinationNetworks: [],
      sourceNetworks: [],
      assets: [],
      senders: [],
    });
  });

  it('rejects unknown variants', () => {
    const result = RelayConfigSchema.safeParse({
      address: RELAY,
      owner: ADMIN,
      feeAsset: FEE_TOKEN,
      variant: 'experimental',
    });
    expect(result.success).to.be.false;
  });
});

describe('deployRelay', () => {
  it('deploys a relay with its allowlists applied', () => {
    const network = new Network(ALPHA, testLogger);
    const transport = new LocalTransport(
      { address: TRANSPORT, routes: {} },
      {},
      testLogger,
    );
    const config = RelayConfigSchema.parse({
      address: RELAY,
      owner: ADMIN,
      feeAsset: FEE_TOKEN,
      variant: 'tokenOnly',
      allowlists: {
        destinationNetworks: [BETA],
        assets: [TOKEN.toLowerCase()],
      },
    });

    const { relay, capability } = deployRelay(
      network,
      transport,
      config,
      testLogger,
    );

    expect(relay.variant).to.equal(ProtocolVariants.tokenOnly);
    expect(relay.admin.isAdmin(capability)).to.be.true;
    expect(relay.allowlist.isDestinationAllowed(BETA)).to.be.true;
    expect(relay.allowlist.entries(AllowlistKind.Asset)).to.deep.equal([TOKEN]);
    expect(relay.allowlist.entries(AllowlistKind.SourceNetwork)).to.deep.equal(
      [],
    );
  });
});
