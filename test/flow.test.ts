import { fileURLToPath } from "node:url";
import { afterEach, describe, expect, it, vi } from "vitest";
import { ValidationError } from "../src/errors.js";
import { loadFlow, runFlow } from "../src/flow.js";
import { Job } from "../src/tree/job.js";
import { forever } from "./helpers.js";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("runFlow", () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("builds the tree and runs it", async () => {
    const { commander, report } = await runFlow(
      (c) => {
        c.submit(new Job(() => "done", { name: "only" }));
      },
      { name: "flow" },
    );
    expect(commander.name).toBe("flow");
    expect(commander.state).toBe("resolved");
    expect(report.status).toBe("completed");
    expect(report.totals.completed).toBe(1);
  });

  it("awaits an async setup", async () => {
    const { commander } = await runFlow(async (c) => {
      await Promise.resolve();
      c.submit(new Job(() => 1, { name: "late" }));
    });
    expect(commander.roots.map((r) => r.status)).toEqual(["completed"]);
  });

  it("terminates the run after the timeout", async () => {
    const { commander, report } = await runFlow(
      (c) => {
        c.submit(new Job(() => forever(), { name: "stuck" }));
      },
      { timeoutMs: 30 },
    );
    expect(report.status).toBe("terminated");
    expect(commander.roots[0].status).toBe("terminated");
    expect(await commander.roots[0].settled()).toEqual({ status: "terminated", reason: "timed out after 30ms" });
  });

  it("keeps the process alive until the timeout fires", async () => {
    const timers = vi.spyOn(globalThis, "setTimeout");
    let refed: boolean | undefined;
    await runFlow(
      (c) => {
        c.submit(
          new Job(
            () => {
              const index = timers.mock.calls.findIndex((call) => call[1] === 5_000);
              const timer: unknown = timers.mock.results[index]?.value;
              if (typeof timer === "object" && timer !== null && "hasRef" in timer && typeof timer.hasRef === "function") {
                refed = Boolean(timer.hasRef());
              }
            },
            { name: "inspect" },
          ),
        );
      },
      { timeoutMs: 5_000 },
    );
    expect(refed).toBe(true);
  });
});

describe("loadFlow", () => {
  it("loads the default export of a module", async () => {
    const setup = await loadFlow(fixture("flow.mjs"));
    const { commander, report } = await runFlow(setup);
    expect(commander.data).toEqual({ loaded: true });
    expect(report.status).toBe("completed");
  });

  it("rejects a module without a default function", async () => {
    await expect(loadFlow(fixture("not-a-flow.mjs"))).rejects.toBeInstanceOf(ValidationError);
    await expect(loadFlow(fixture("not-a-flow.mjs"))).rejects.toThrow(
      "default: flow module must default-export a function",
    );
  });
});
