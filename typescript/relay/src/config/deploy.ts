import { Logger } from 'pino';

import { CrossNetworkRelay, DeployedRelay } from '../core/CrossNetworkRelay.js';
import type { Network } from '../ledger/Network.js';
import type { Transport } from '../transport/types.js';
import { ProtocolVariants } from '../types.js';

import { RelayConfig } from './schema.js';

/**
 * Deploys a relay from a validated config and applies its allowlists
 * with the owner's capability
 */
export function deployRelay(
  network: Network,
  transport: Transport,
  config: RelayConfig,
  logger?: Logger,
): DeployedRelay {
  const deployed = CrossNetworkRelay.deploy(
    network,
    {
      address: config.address,
      owner: config.owner,
      transport,
      feeAsset: config.feeAsset,
      variant: ProtocolVariants[config.variant],
    },
    logger,
  );
  const { relay, capability } = deployed;
  const { allowlists } = config;
  for (const destination of allowlists.destinationNetworks) {
    relay.admin.setDestinationAllowed(capability, destination, true);
  }
  for (const source of allowlists.sourceNetworks) {
    relay.admin.setSourceAllowed(capability, source, true);
  }
  for (const asset of allowlists.assets) {
    relay.admin.setAssetAllowed(capability, asset, true);
  }
  for (const sender of allowlists.senders) {
    relay.admin.setSenderAllowed(capability, sender, true);
  }
  return deployed;
}
