/**
 * @bondline/oracle — Price round wire format.
 *
 * A relayed round is the ABI encoding of the tuple
 * (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt,
 * uint80 answeredInRound).
 */

import { decodeAbiParameters, encodeAbiParameters } from "viem";
import type { Hex, PriceRound } from "@bondline/types";
import { isPriceRound } from "@bondline/types";
import { OracleError } from "./errors.js";

const ROUND_PARAMETERS = [
  { name: "roundId", type: "uint80" },
  { name: "answer", type: "int256" },
  { name: "startedAt", type: "uint256" },
  { name: "updatedAt", type: "uint256" },
  { name: "answeredInRound", type: "uint80" },
] as const;

export function encodePriceRound(round: PriceRound): Hex {
  const label = round.roundId.toString();
  if (!isPriceRound(round)) {
    throw new OracleError("MALFORMED_PAYLOAD", `Round ${label} does not fit the wire format`);
  }
  try {
    return encodeAbiParameters(ROUND_PARAMETERS, [
      round.roundId,
      round.answer,
      round.startedAt,
      round.updatedAt,
      round.answeredInRound,
    ]);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new OracleError("MALFORMED_PAYLOAD", `Round ${label} does not fit the wire format: ${reason}`);
  }
}

/**
 * Decode a relayed payload.
 * Throws OracleError(MALFORMED_PAYLOAD) for anything that is not one round.
 */
export function decodePriceRound(payload: Hex): PriceRound {
  let values: readonly [bigint, bigint, bigint, bigint, bigint];
  try {
    values = decodeAbiParameters(ROUND_PARAMETERS, payload);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new OracleError("MALFORMED_PAYLOAD", `Payload is not a price round: ${reason}`);
  }
  const [roundId, answer, startedAt, updatedAt, answeredInRound] = values;
  const round: PriceRound = { roundId, answer, startedAt, updatedAt, answeredInRound };
  // uint80 words are decoded as full 256-bit integers
  if (!isPriceRound(round)) {
    throw new OracleError("MALFORMED_PAYLOAD", "Payload round id exceeds uint80");
  }
  return round;
}
