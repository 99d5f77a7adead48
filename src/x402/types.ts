import { z } from 'zod';

// Smallest-unit integer amounts travel as decimal strings. Empty means "not given" (v2 servers
// that still put the amount under the legacy field).
const AmountString = z.string().regex(/^\d*$/, 'amount must be a base-10 integer string');

export const ResourceInfoSchema = z.object({
  url: z.string().optional(),
  description: z.string().optional(),
  mimeType: z.string().optional(),
});

export const PaymentOptionSchema = z.object({
  scheme: z.string(),
  network: z.string(),
  amount: AmountString.optional(),
  maxAmountRequired: AmountString.optional(), // v1
  asset: z.string().optional(),
  payTo: z.string(),
  maxTimeoutSeconds: z.number().int().nonnegative(),
  extra: z.record(z.unknown()).nullable().optional(),
});

export const PaymentRequirementSchema = z.object({
  x402Version: z.number().int(),
  error: z.string().optional(),
  accepts: z.array(PaymentOptionSchema),
  resource: ResourceInfoSchema.optional(),
  extensions: z.record(z.unknown()).optional(),
});

export type ResourceInfo = z.infer<typeof ResourceInfoSchema>;
export type PaymentOption = z.infer<typeof PaymentOptionSchema>;
export type PaymentRequirement = z.infer<typeof PaymentRequirementSchema>;

export const TransferAuthorizationSchema = z.object({
  from: z.string(),
  to: z.string(),
  value: z.string(), // uint256
  validAfter: z.string(), // unix seconds
  validBefore: z.string(), // unix seconds
  nonce: z.string(), // bytes32
});

export const PaymentPayloadSchema = z.object({
  x402Version: z.number().int(),
  resource: z.object({
    url: z.string(),
    description: z.string(),
    mimeType: z.string(),
  }),
  accepted: z.object({
    scheme: z.string(),
    network: z.string(),
    amount: z.string(),
    asset: z.string(),
    payTo: z.string(),
    maxTimeoutSeconds: z.number().int(),
    extra: z.object({ name: z.string(), version: z.string() }),
  }),
  payload: z.object({
    signature: z.string(),
    authorization: TransferAuthorizationSchema,
  }),
  extensions: z.record(z.unknown()).optional(),
});

export type TransferAuthorization = z.infer<typeof TransferAuthorizationSchema>;
export type PaymentPayload = z.infer<typeof PaymentPayloadSchema>;
export type AcceptedOption = PaymentPayload['accepted'];
export type PaymentData = PaymentPayload['payload'];

/** Where the amount of the selected option came from. */
export type AmountSource =
  | { kind: 'amount'; value: string }
  | { kind: 'legacy'; field: 'maxAmountRequired' | 'extra.maxAmountRequired'; value: string }
  | { kind: 'missing' };

export type SelectedOption = {
  option: PaymentOption;
  amount: string;
  source: Exclude<AmountSource, { kind: 'missing' }>['kind'];
};

export const PAYMENT_REQUIRED_HEADER = 'payment-required';
export const PAYMENT_SIGNATURE_HEADER = 'PAYMENT-SIGNATURE';
export const X402_VERSION = 2;
