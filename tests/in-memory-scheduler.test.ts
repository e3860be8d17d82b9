import { describe, expect, it, vi } from "vitest";

import { InMemoryScheduler } from "../src/adapters/in-memory/InMemoryScheduler.js";
import { TurnTimeout } from "../src/domain/commands/TurnTimeout.js";

describe("InMemoryScheduler", () => {
  it("dispatches turn timeouts when the virtual clock reaches them", async () => {
    const dispatch = vi.fn<(command: TurnTimeout) => void>();
    const scheduler = new InMemoryScheduler(dispatch);

    await scheduler.scheduleTurnTimeout("session-1", "A", 1_000);
    await scheduler.scheduleTurnTimeout("session-1", "B", 1_000);

    await scheduler.runFor(999);
    expect(dispatch).not.toHaveBeenCalled();

    await scheduler.runFor(1);
    expect(dispatch).toHaveBeenCalledTimes(2);

    const [first] = dispatch.mock.calls[0] ?? [];
    expect(first).toBeInstanceOf(TurnTimeout);
    expect(first).toMatchObject({ sessionId: "session-1", slot: "A", at: 1_000 });
    expect(scheduler.now).toBe(1_000);
  });

  it("fires in deadline order", async () => {
    const fired: string[] = [];
    const scheduler = new InMemoryScheduler((command) => {
      fired.push(`${command.sessionId}:${command.slot}@${command.at}`);
    });

    await scheduler.scheduleTurnTimeout("session-2", "A", 300);
    await scheduler.scheduleTurnTimeout("session-1", "B", 100);
    await scheduler.scheduleTurnTimeout("session-3", "A", 200);

    await scheduler.runFor(1_000);

    expect(fired).toEqual(["session-1:B@100", "session-3:A@200", "session-2:A@300"]);
  });

  it("replaces a pending timeout for the same slot", async () => {
    const dispatch = vi.fn<(command: TurnTimeout) => void>();
    const scheduler = new InMemoryScheduler(dispatch);

    await scheduler.scheduleTurnTimeout("session-1", "A", 100);
    await scheduler.scheduleTurnTimeout("session-1", "A", 500);

    await scheduler.runFor(1_000);

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0]).toMatchObject({ at: 500 });
  });

  it("drops cancelled timeouts", async () => {
    const dispatch = vi.fn<(command: TurnTimeout) => void>();
    const scheduler = new InMemoryScheduler(dispatch);

    await scheduler.scheduleTurnTimeout("session-1", "A", 100);
    await scheduler.scheduleTurnTimeout("session-1", "B", 100);
    await scheduler.scheduleTurnTimeout("session-2", "A", 100);

    await scheduler.cancelTurnTimeout("session-1", "A");
    await scheduler.cancelSessionTimeouts("session-2");
    await scheduler.runFor(200);

    expect(dispatch).toHaveBeenCalledTimes(1);
    expect(dispatch.mock.calls[0]?.[0]).toMatchObject({ sessionId: "session-1", slot: "B" });
  });

  it("rejects negative delays and backwards runs", async () => {
    const scheduler = new InMemoryScheduler(vi.fn());

    await expect(scheduler.scheduleTurnTimeout("session-1", "A", -1)).rejects.toThrow(
      "Timeout delay must be non-negative",
    );
    await expect(scheduler.runFor(-5)).rejects.toThrow("Cannot run scheduler backwards in time");
  });
});
