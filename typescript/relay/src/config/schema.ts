import { z } from 'zod';

import { ProtocolVariants } from '../types.js';

import { ZAddress, ZAmount, ZNetworkId } from './customZodTypes.js';

export const FeeScheduleSchema = z.object({
  baseFee: ZAmount,
  feePerByte: ZAmount.default('0'),
  feePerTransfer: ZAmount.default('0'),
});

export const TransportConfigSchema = z.object({
  address: ZAddress,
  carryAssets: z.boolean().default(true),
  routes: z.record(ZNetworkId, FeeScheduleSchema),
  feeAssets: z.record(ZNetworkId, z.record(ZAddress, ZAmount)).optional(),
});

const variantNames = Object.keys(ProtocolVariants);

export const ProtocolVariantNameSchema = z
  .string()
  .refine(
    (name): name is keyof typeof ProtocolVariants =>
      variantNames.includes(name),
    { message: `Variant must be one of ${variantNames.join(', ')}` },
  );

export const AllowlistConfigSchema = z.object({
  destinationNetworks: z.array(ZNetworkId).default([]),
  sourceNetworks: z.array(ZNetworkId).default([]),
  assets: z.array(ZAddress).default([]),
  senders: z.array(ZAddress).default([]),
});

export const RelayConfigSchema = z.object({
  address: ZAddress,
  owner: ZAddress,
  feeAsset: ZAddress,
  variant: ProtocolVariantNameSchema.default('standard'),
  allowlists: AllowlistConfigSchema.default({}),
});

export type FeeScheduleConfig = z.infer<typeof FeeScheduleSchema>;
export type TransportConfig = z.infer<typeof TransportConfigSchema>;
export type AllowlistConfig = z.infer<typeof AllowlistConfigSchema>;
export type RelayConfig = z.infer<typeof RelayConfigSchema>;
