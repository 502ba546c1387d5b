import { z } from 'zod';

import {
  isValidAddressEvm,
  normalizeAddressEvm,
  tryParseAmount,
} from '@ferryline/utils';

export const ZAddress = z
  .string()
  .refine((value) => isValidAddressEvm(value), {
    message: 'Invalid address',
  })
  .transform((value) => normalizeAddressEvm(value));

export const ZNetworkId = z.string().min(1);

/** Integer amount in base units, as a decimal string or a safe integer */
export const ZAmount = z
  .union([z.string(), z.number().int(), z.bigint()])
  .transform((value, ctx) => {
    const amount = tryParseAmount(value);
    if (amount === null) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `Invalid amount ${value}`,
      });
      return z.NEVER;
    }
    return amount;
  });
