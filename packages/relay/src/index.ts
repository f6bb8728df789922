/**
 * @bondline/relay — Cross-domain messaging.
 *
 * - RelayMessenger / RelayReceiver: the two ends of a relay
 * - InProcessRelayChannel: asynchronous, reliable-or-absent delivery
 *   between domains living in one process
 */

export { InProcessRelayChannel } from "./in-process-channel.js";
export type { InProcessRelayChannelOptions } from "./in-process-channel.js";

export type {
  RelayErrorCode,
  FeeInfo,
  CrossDomainMessageInput,
  RelayMessage,
  RelayMessenger,
  RelayReceiver,
  DeliveryReceipt,
} from "./types.js";
export { RelayError } from "./types.js";
