/**
 * RelayScheduler — Periodic price relay.
 *
 * Every tick forwards the source feed's latest round and then delivers
 * whatever is pending on the channel. A failed tick is logged and the
 * next one runs as usual.
 */

import pino from "pino";
import type { Logger } from "pino";
import type { BondService } from "./bond-service.js";

export interface RelaySchedulerOptions {
  readonly service: BondService;
  readonly intervalMs: number;
  readonly logger?: Logger;
}

export interface TickResult {
  readonly messageId?: string;
  readonly delivered: number;
  readonly failed: number;
}

export class RelayScheduler {
  private readonly service: BondService;
  private readonly intervalMs: number;
  private readonly logger: Logger;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: RelaySchedulerOptions) {
    if (!Number.isInteger(options.intervalMs) || options.intervalMs <= 0) {
      throw new Error(`Relay interval must be a positive integer, got ${options.intervalMs}`);
    }
    this.service = options.service;
    this.intervalMs = options.intervalMs;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  get running(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer !== null) {
      return;
    }
    this.timer = setInterval(() => {
      this.tick();
    }, this.intervalMs);
    this.logger.info({ intervalMs: this.intervalMs }, "Relay scheduler started");
  }

  stop(): void {
    if (this.timer === null) {
      return;
    }
    clearInterval(this.timer);
    this.timer = null;
    this.logger.info("Relay scheduler stopped");
  }

  tick(): TickResult {
    let messageId: string | undefined;
    try {
      messageId = this.service.relayLatestRound();
    } catch (err) {
      this.logger.error({ err }, "Relay send failed");
    }

    // The channel logs each failed delivery itself
    const receipts = this.service.deliverAll();
    const failed = receipts.filter((r) => r.status === "failed").length;
    this.logger.debug({ delivered: receipts.length - failed, failed }, "Relay tick");

    const result: TickResult = { delivered: receipts.length - failed, failed };
    return messageId === undefined ? result : { ...result, messageId };
  }
}
