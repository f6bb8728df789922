/**
 * Type barrel — re-exports all public types from @bondline/node.
 */

// DTOs
export {
  AmountSchema,
  SignedAmountSchema,
  AddressSchema,
  MessageIdSchema,
  DepositSchema,
  WithdrawSchema,
  RedeemSchema,
  SetFeesSchema,
  SetFeesRecipientSchema,
  QuoteQuerySchema,
  ApproveSchema,
  RoundIdParamSchema,
  SourcePriceSchema,
  DeliverSchema,
  ListEventsQuerySchema,
} from "./dto.js";
export type {
  DepositDto,
  WithdrawDto,
  RedeemDto,
  SetFeesDto,
  SetFeesRecipientDto,
  ApproveDto,
  SourcePriceDto,
  DeliverDto,
  ListEventsQuery,
} from "./dto.js";

// Error
export { createErrorEnvelope } from "./error.js";
export type { ApiErrorCode, ErrorDetail, ErrorEnvelope } from "./error.js";

// Auth
export { ROLE_PERMISSIONS, hasPermission } from "./auth.js";
export type { Role, Permission, AuthContext, ApiKeyRecord } from "./auth.js";

// Views
export {
  toRoundView,
  toVaultStateView,
  toRelayMessageView,
  toDeliveryReceiptView,
} from "./views.js";
export type {
  RoundView,
  VaultStateView,
  RelayMessageView,
  DeliveryReceiptView,
} from "./views.js";

// Hono env
export type { AppEnv } from "./api-contract.js";
