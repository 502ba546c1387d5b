import { z } from 'zod';

import {
  AllowlistKind,
  FeeSettlement,
  ProtocolVariantNameSchema,
  ZNetworkId,
} from '@ferryline/relay';
import { Result, failure, success, tryParseJsonOrYaml } from '@ferryline/utils';

import { readYamlOrJson } from '../utils/files.js';

/** Symbol of the network's native asset */
export const NATIVE_SYMBOL = 'native';
export const NATIVE_DECIMALS = 18;

// Accounts are written as labels ("alice") or as addresses
const AccountRef = z.string().min(1);
// Assets are written as symbols declared under `assets`, or `native`
const AssetRef = z.string().min(1);
// Display amount, e.g. "12.5", converted with the asset's decimals
const DisplayAmount = z
  .union([z.string(), z.number()])
  .transform((value) => value.toString())
  .refine((value) => /^\d+(\.\d+)?$/.test(value), {
    message: 'Amount must be a non-negative decimal',
  });
// Base-unit integer, used for fee schedules
const BaseUnits = z
  .union([z.string().regex(/^\d+$/), z.number().int().nonnegative()])
  .transform((value) => value.toString());

export const AssetDefinitionSchema = z.object({
  decimals: z.number().int().min(0).max(36).default(18),
});

export const ScenarioTransportSchema = z.object({
  address: AccountRef.default('transport'),
  carryAssets: z.boolean().default(true),
  routes: z.record(
    ZNetworkId,
    z.object({
      baseFee: BaseUnits,
      feePerByte: BaseUnits.default('0'),
      feePerTransfer: BaseUnits.default('0'),
    }),
  ),
  /** Fee multiplier per fee asset symbol, per source network */
  feeAssets: z.record(ZNetworkId, z.record(AssetRef, BaseUnits)).default({}),
});

export const ScenarioRelaySchema = z.object({
  address: AccountRef.default('relay'),
  owner: AccountRef,
  feeAsset: AssetRef,
  variant: ProtocolVariantNameSchema.default('standard'),
  allowlists: z
    .object({
      destinationNetworks: z.array(ZNetworkId).default([]),
      sourceNetworks: z.array(ZNetworkId).default([]),
      assets: z.array(AssetRef).default([]),
      senders: z.array(AccountRef).default([]),
    })
    .default({}),
});

const StepBase = z.object({
  /** Name of the error the step is expected to fail with */
  expectError: z.string().optional(),
});

export const MintStepSchema = StepBase.extend({
  action: z.literal('mint'),
  network: ZNetworkId,
  asset: AssetRef,
  to: AccountRef,
  amount: DisplayAmount,
});

export const ApproveStepSchema = StepBase.extend({
  action: z.literal('approve'),
  network: ZNetworkId,
  asset: AssetRef,
  owner: AccountRef,
  /** Defaults to the network's relay */
  spender: AccountRef.optional(),
  amount: DisplayAmount,
});

export const AllowStepSchema = StepBase.extend({
  action: z.literal('allow'),
  network: ZNetworkId,
  list: z.nativeEnum(AllowlistKind),
  id: z.string().min(1),
  allowed: z.boolean().default(true),
});

export const SendStepSchema = StepBase.extend({
  action: z.literal('send'),
  network: ZNetworkId,
  from: AccountRef,
  destination: ZNetworkId,
  recipient: AccountRef,
  asset: AssetRef,
  amount: DisplayAmount,
  settlement: z
    .nativeEnum(FeeSettlement)
    .default(FeeSettlement.PrefundedReserve),
  /** Native payment attached to the call, in display units */
  value: DisplayAmount.optional(),
  data: z
    .string()
    .regex(/^0x([0-9a-fA-F]{2})*$/)
    .optional(),
});

export const FlushStepSchema = StepBase.extend({
  action: z.literal('flush'),
});

export const WithdrawStepSchema = StepBase.extend({
  action: z.literal('withdraw'),
  network: ZNetworkId,
  /** Defaults to the relay's fee asset */
  asset: AssetRef.optional(),
  to: AccountRef,
  /** Defaults to the relay owner */
  as: AccountRef.optional(),
});

export const ScenarioStepSchema = z.discriminatedUnion('action', [
  MintStepSchema,
  ApproveStepSchema,
  AllowStepSchema,
  SendStepSchema,
  FlushStepSchema,
  WithdrawStepSchema,
]);

export const ScenarioSchema = z
  .object({
    name: z.string().optional(),
    networks: z.array(ZNetworkId).min(1),
    assets: z.record(AssetRef, AssetDefinitionSchema).default({}),
    transport: ScenarioTransportSchema,
    relays: z.record(ZNetworkId, ScenarioRelaySchema),
    steps: z.array(ScenarioStepSchema).default([]),
    /** Accounts whose balances are reported, besides relays */
    report: z.array(AccountRef).default([]),
  })
  .superRefine((scenario, ctx) => {
    const networks = new Set(scenario.networks);
    const symbols = new Set([NATIVE_SYMBOL, ...Object.keys(scenario.assets)]);
    const checkNetwork = (network: string, path: (string | number)[]) => {
      if (!networks.has(network)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown network ${network}`,
          path,
        });
      }
    };
    const checkAsset = (asset: string, path: (string | number)[]) => {
      if (!symbols.has(asset)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Unknown asset ${asset}`,
          path,
        });
      }
    };

    for (const [network, relay] of Object.entries(scenario.relays)) {
      checkNetwork(network, ['relays', network]);
      checkAsset(relay.feeAsset, ['relays', network, 'feeAsset']);
      relay.allowlists.assets.forEach((asset, i) =>
        checkAsset(asset, ['relays', network, 'allowlists', 'assets', i]),
      );
    }
    for (const [network, assets] of Object.entries(
      scenario.transport.feeAssets,
    )) {
      for (const asset of Object.keys(assets)) {
        checkAsset(asset, ['transport', 'feeAssets', network, asset]);
      }
    }
    scenario.steps.forEach((step, i) => {
      if (step.action === 'flush') return;
      if (!scenario.relays[step.network]) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `No relay on network ${step.network}`,
          path: ['steps', i, 'network'],
        });
      }
      if ('asset' in step && step.asset !== undefined) {
        checkAsset(step.asset, ['steps', i, 'asset']);
      }
      if (step.action === 'send') {
        checkNetwork(step.destination, ['steps', i, 'destination']);
      }
    });
  });

export type ScenarioStep = z.infer<typeof ScenarioStepSchema>;
export type Scenario = z.infer<typeof ScenarioSchema>;
export type ScenarioRelay = z.infer<typeof ScenarioRelaySchema>;

export function parseScenario(input: unknown): Result<Scenario> {
  const parsed = ScenarioSchema.safeParse(input);
  if (!parsed.success) {
    return failure(formatIssues(parsed.error));
  }
  return success(parsed.data);
}

export function parseScenarioString(input: string): Result<Scenario> {
  const raw = tryParseJsonOrYaml(input);
  if (!raw.success) return raw;
  return parseScenario(raw.data);
}

export function readScenario(filepath: string): Scenario {
  const parsed = parseScenario(readYamlOrJson(filepath));
  if (!parsed.success) {
    throw new Error(`Invalid scenario ${filepath}:\n${parsed.error}`);
  }
  return parsed.data;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '<root>'}: ${issue.message}`)
    .join('\n');
}
