/**
 * JSON views of domain values.
 *
 * bigint does not survive JSON.stringify, so every amount, price,
 * round id and timestamp leaves the API as a base-10 string.
 */

import type { PriceRound } from "@bondline/types";
import type { DeliveryReceipt, RelayMessage } from "@bondline/relay";
import type { VaultState } from "@bondline/vault";

type Stringified<T> = {
  readonly [K in keyof T]: T[K] extends bigint ? string : T[K];
};

export type RoundView = Stringified<PriceRound>;

export function toRoundView(round: PriceRound): RoundView {
  return {
    roundId: round.roundId.toString(),
    answer: round.answer.toString(),
    startedAt: round.startedAt.toString(),
    updatedAt: round.updatedAt.toString(),
    answeredInRound: round.answeredInRound.toString(),
  };
}

export type VaultStateView = Stringified<VaultState>;

export function toVaultStateView(state: VaultState): VaultStateView {
  return {
    ...state,
    bondId: state.bondId.toString(),
    debtAmount: state.debtAmount.toString(),
    bondMaturity: state.bondMaturity.toString(),
    principalRepaid: state.principalRepaid.toString(),
    totalAssets: state.totalAssets.toString(),
    totalSupply: state.totalSupply.toString(),
  };
}

export interface RelayMessageView {
  readonly messageId: string;
  readonly nonce: string;
  readonly sourceDomain: string;
  readonly sourceSender: string;
  readonly destinationDomain: string;
  readonly destinationAddress: string;
  readonly feeInfo: { readonly feeToken: string; readonly amount: string };
  readonly requiredGasLimit: string;
  readonly payload: string;
}

export function toRelayMessageView(message: RelayMessage): RelayMessageView {
  return {
    messageId: message.messageId,
    nonce: message.nonce.toString(),
    sourceDomain: message.sourceDomain,
    sourceSender: message.sourceSender,
    destinationDomain: message.destinationDomain,
    destinationAddress: message.destinationAddress,
    feeInfo: { feeToken: message.feeInfo.feeToken, amount: message.feeInfo.amount.toString() },
    requiredGasLimit: message.requiredGasLimit.toString(),
    payload: message.payload,
  };
}

export interface DeliveryReceiptView {
  readonly messageId: string;
  readonly status: "delivered" | "failed";
  readonly error?: { readonly code: string; readonly message: string };
}

export function toDeliveryReceiptView(receipt: DeliveryReceipt): DeliveryReceiptView {
  if (receipt.status === "delivered") {
    return { messageId: receipt.messageId, status: "delivered" };
  }
  const { error } = receipt;
  const code = "code" in error && typeof error.code === "string" ? error.code : "INTERNAL_ERROR";
  return { messageId: receipt.messageId, status: "failed", error: { code, message: error.message } };
}
