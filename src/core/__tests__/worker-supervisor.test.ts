import { describe, it, expect, vi } from "vitest";
import { UpstreamError } from "../errors.js";
import { WorkerSupervisor } from "../worker-supervisor.js";
import { FlakyWordStatsWorker, analyticsRegistry, makeItem, silentLogger } from "../../__tests__/helpers/index.js";

function setup(nextCrash: () => Error | null, now: () => number = () => 0) {
  const registry = analyticsRegistry();
  const factory = vi.fn(() => new FlakyWordStatsWorker(nextCrash));
  registry.register("wordStats", factory);
  const supervisor = new WorkerSupervisor(registry, { now, logger: silentLogger() });
  return { supervisor, factory };
}

const task = { kind: "wordStats" as const, items: [makeItem("a")] };
const timeout = () => new UpstreamError("timeout", "upstream timed out");

describe("WorkerSupervisor", () => {
  it("completes a task on a healthy worker", async () => {
    const { supervisor } = setup(() => null);
    const outcome = await supervisor.dispatch(task);
    expect(outcome.status).toBe("completed");
  });

  it("restarts a crashing worker three times, then stops it", async () => {
    const { supervisor, factory } = setup(timeout);

    const handlings: string[] = [];
    for (let i = 0; i < 4; i++) {
      const outcome = await supervisor.dispatch(task);
      handlings.push(outcome.status === "crashed" ? outcome.handling : outcome.status);
    }

    expect(handlings).toEqual(["restarted", "restarted", "restarted", "stopped"]);
    expect(factory).toHaveBeenCalledTimes(4);
    expect((await supervisor.dispatch(task)).status).toBe("disabled");
    expect(factory).toHaveBeenCalledTimes(4);
  });

  it("forgets restarts older than the window", async () => {
    let clock = 0;
    const { supervisor } = setup(timeout, () => clock);

    for (let i = 0; i < 3; i++) await supervisor.dispatch(task);
    clock = 60_001;
    const outcome = await supervisor.dispatch(task);

    expect(outcome.status === "crashed" && outcome.handling).toBe("restarted");
  });

  it("escalates an unclassified crash without stopping the worker", async () => {
    let crash: Error | null = new Error("invariant broken");
    const { supervisor } = setup(() => crash);

    const first = await supervisor.dispatch(task);
    expect(first.status === "crashed" && first.handling).toBe("escalated");

    crash = null;
    expect((await supervisor.dispatch(task)).status).toBe("completed");
  });

  it("keeps other kinds running while one is stopped", async () => {
    const { supervisor } = setup(timeout);
    for (let i = 0; i < 4; i++) await supervisor.dispatch(task);

    const sentiment = await supervisor.dispatch({ kind: "sentiment", items: [makeItem("a")] });
    expect(sentiment.status).toBe("completed");
    expect(supervisor.health().find((h) => h.kind === "wordStats")).toEqual({
      kind: "wordStats",
      running: false,
      stopped: true,
      recentRestarts: 3,
    });
  });

  it("reports every kind disabled after shutdown", async () => {
    const { supervisor } = setup(() => null);
    await supervisor.dispatch(task);
    supervisor.shutdown();

    expect((await supervisor.dispatch(task)).status).toBe("disabled");
    expect(supervisor.health().every((h) => !h.running)).toBe(true);
  });
});
