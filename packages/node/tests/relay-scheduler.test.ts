import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { RelayScheduler } from "../src/services/relay-scheduler.js";
import { createTestService, ManualClock } from "./setup.js";
import type { BondService } from "../src/services/bond-service.js";

describe("RelayScheduler", () => {
  let clock: ManualClock;
  let service: BondService;

  beforeEach(() => {
    vi.useFakeTimers();
    clock = new ManualClock();
    service = createTestService(clock);
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("rejects a non-positive interval", () => {
    expect(() => new RelayScheduler({ service, intervalMs: 0 })).toThrow(
      "Relay interval must be a positive integer, got 0",
    );
  });

  it("relays and delivers the source round on each tick", () => {
    const scheduler = new RelayScheduler({ service, intervalMs: 1_000 });

    const result = scheduler.tick();

    expect(result.delivered).toBe(1);
    expect(result.failed).toBe(0);
    expect(result.messageId).toMatch(/^0x[0-9a-f]{64}$/);
    expect(service.latestRound().roundId).toBe(1n);
    expect(service.pendingMessages()).toEqual([]);
  });

  it("runs on its interval until stopped", () => {
    const scheduler = new RelayScheduler({ service, intervalMs: 1_000 });
    scheduler.start();
    expect(scheduler.running).toBe(true);

    vi.advanceTimersByTime(999);
    expect(service.latestRound().roundId).toBe(0n);

    vi.advanceTimersByTime(1);
    expect(service.latestRound().roundId).toBe(1n);

    service.setSourcePrice(250_000_000n);
    vi.advanceTimersByTime(1_000);
    expect(service.latestRound().answer).toBe(250_000_000n);

    scheduler.stop();
    expect(scheduler.running).toBe(false);
    service.setSourcePrice(300_000_000n);
    vi.advanceTimersByTime(5_000);
    expect(service.latestRound().answer).toBe(250_000_000n);
  });

  it("starts once", () => {
    const scheduler = new RelayScheduler({ service, intervalMs: 1_000 });
    const tick = vi.spyOn(scheduler, "tick");

    scheduler.start();
    scheduler.start();
    vi.advanceTimersByTime(1_000);

    expect(tick).toHaveBeenCalledTimes(1);
    scheduler.stop();
  });

  it("keeps going when a send fails", () => {
    const scheduler = new RelayScheduler({ service, intervalMs: 1_000 });
    vi.spyOn(service, "relayLatestRound").mockImplementationOnce(() => {
      throw new Error("relay offline");
    });

    expect(scheduler.tick()).toEqual({ delivered: 0, failed: 0 });
    expect(scheduler.tick().delivered).toBe(1);
  });

  it("counts deliveries the oracle refuses", () => {
    const scheduler = new RelayScheduler({ service, intervalMs: 1_000 });
    vi.spyOn(service.oracle, "receiveRelayedMessage").mockImplementationOnce(() => {
      throw new Error("oracle halted");
    });

    const result = scheduler.tick();
    expect(result.delivered).toBe(0);
    expect(result.failed).toBe(1);
    expect(service.latestRound().roundId).toBe(0n);
  });
});
