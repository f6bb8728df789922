/**
 * Request DTOs with Zod validation schemas.
 *
 * Amounts travel as base-10 strings and are parsed to bigint here;
 * addresses and message ids are checked for shape only.
 */

import { z } from "zod";
import type { Address, Hex } from "@bondline/types";
import { isAddressLike } from "@bondline/types";
import { isHex } from "viem";

// =============================================================================
// Shared Schemas
// =============================================================================

export const AmountSchema = z
  .string()
  .regex(/^\d+$/, "Expected a non-negative base-10 integer string")
  .transform((v) => BigInt(v));

export const SignedAmountSchema = z
  .string()
  .regex(/^-?\d+$/, "Expected a base-10 integer string")
  .transform((v) => BigInt(v));

export const AddressSchema = z.custom<Address>(isAddressLike, {
  message: "Expected a 20-byte hex address",
});

export const MessageIdSchema = z.custom<Hex>(
  (v) => typeof v === "string" && isHex(v, { strict: true }) && v.length === 66,
  { message: "Expected a 32-byte hex message id" },
);

// =============================================================================
// Vault DTOs
// =============================================================================

export const DepositSchema = z.object({
  /** Upper bound on assets pulled from the caller */
  maxAssets: AmountSchema,
  /** Value to pay, in value units */
  targetValue: AmountSchema,
  principal: z.boolean(),
});

export type DepositDto = z.infer<typeof DepositSchema>;

export const WithdrawSchema = z.object({
  assets: AmountSchema,
  /** Default: the caller */
  receiver: AddressSchema.optional(),
  /** Default: the caller */
  owner: AddressSchema.optional(),
});

export type WithdrawDto = z.infer<typeof WithdrawSchema>;

export const RedeemSchema = z.object({
  shares: AmountSchema,
  receiver: AddressSchema.optional(),
  owner: AddressSchema.optional(),
});

export type RedeemDto = z.infer<typeof RedeemSchema>;

export const SetFeesSchema = z.object({
  bips: z.number().int(),
});

export type SetFeesDto = z.infer<typeof SetFeesSchema>;

export const SetFeesRecipientSchema = z.object({
  recipient: AddressSchema,
});

export type SetFeesRecipientDto = z.infer<typeof SetFeesRecipientSchema>;

export const QuoteQuerySchema = z.object({
  targetValue: AmountSchema,
});

// =============================================================================
// Asset DTOs
// =============================================================================

export const ApproveSchema = z.object({
  /** Allowance granted to the vault */
  amount: AmountSchema,
});

export type ApproveDto = z.infer<typeof ApproveSchema>;

// =============================================================================
// Oracle & Relay DTOs
// =============================================================================

export const RoundIdParamSchema = AmountSchema;

export const SourcePriceSchema = z.object({
  answer: SignedAmountSchema,
});

export type SourcePriceDto = z.infer<typeof SourcePriceSchema>;

export const DeliverSchema = z.object({
  /** Deliver one message; omit to deliver everything pending */
  messageId: MessageIdSchema.optional(),
});

export type DeliverDto = z.infer<typeof DeliverSchema>;

// =============================================================================
// Event DTOs
// =============================================================================

export const ListEventsQuerySchema = z.object({
  stream: z.enum(["vault", "oracle", "relayer"]).optional(),
  afterPosition: z.coerce.number().int().min(0).optional(),
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

export type ListEventsQuery = z.infer<typeof ListEventsQuerySchema>;
