import { describe, expect, it } from "vitest";
import { Commander } from "../src/commander.js";
import { addConditionalEdge, addEdge } from "../src/edges/edges.js";
import { InvalidEdgeError } from "../src/errors.js";
import { Handler } from "../src/tree/handler.js";
import { Job } from "../src/tree/job.js";
import { callHandler, submitJob } from "../src/tree/submit.js";

describe("addEdge", () => {
  it("submits the target job under the source's parent when the source completes", async () => {
    const cmd = new Commander();
    const a = cmd.submit(new Job(() => "a", { name: "A" }));
    const b = new Job(() => "b", { name: "B" });
    addEdge(a, b);

    await cmd.run();
    expect(b.status).toBe("completed");
    expect(b.parent).toBe(cmd);
    expect(cmd.roots.map((n) => n.name)).toEqual(["A", "B"]);
  });

  it("passes the source's result to a handler target", async () => {
    const cmd = new Commander();
    const a = cmd.submit(new Job(() => 21, { name: "A" }));
    const twice = new Handler(async (n: unknown) => Number(n) * 2, { name: "twice" });
    addEdge(a, twice);

    await cmd.run();
    expect(twice.result).toBe(42);
  });

  it("maps handler args and parent through options", async () => {
    const cmd = new Commander();
    const received: unknown[][] = [];
    const root = cmd.submit(
      new Job(
        (self) => {
          const src = submitJob(self, () => "payload", [], { name: "src" });
          addEdge(src, new Handler(async (...args: unknown[]) => received.push(args), { name: "sink" }), {
            parent: cmd,
            args: (from) => [from.name, from.result],
          });
        },
        { name: "root" },
      ),
    );
    await cmd.run();

    expect(received).toEqual([["src", "payload"]]);
    expect(root.children.map((n) => n.name)).toEqual(["src"]);
    expect(cmd.roots.map((n) => n.name)).toEqual(["root", "sink"]);
  });

  it("does nothing when the source fails", async () => {
    const cmd = new Commander();
    const a = cmd.submit(
      new Job(
        () => {
          throw new Error("no");
        },
        { name: "A" },
      ),
    );
    const b = new Job(() => "b", { name: "B" });
    addEdge(a, b);

    await cmd.run();
    expect(b.status).toBe("pending");
    expect(b.parent).toBeNull();
  });

  it("rejects targets that are not nodes", () => {
    const a = new Job(() => 1, { name: "A" });
    expect(() => addEdge(a, JSON.parse("null"))).toThrow(InvalidEdgeError);
    expect(() => addEdge(a, JSON.parse("{}"))).toThrow("Edge target is not a job or handler");
  });

  it("records a target that was already submitted as a callback fault", async () => {
    const cmd = new Commander();
    const a = cmd.submit(new Job(() => 1, { name: "A" }));
    const b = cmd.submit(new Job(() => 2, { name: "B" }));
    addEdge(a, b);

    const report = await cmd.run();
    expect(a.status).toBe("completed");
    expect(a.callbackErrors).toHaveLength(1);
    expect(a.callbackErrors[0].stage).toBe("job:end");
    expect(a.callbackErrors[0].error).toMatchObject({ code: "ALREADY_SUBMITTED" });
    expect(report.callbackErrors).toHaveLength(1);
  });
});

describe("addConditionalEdge", () => {
  function routed(result: string): { cmd: Commander; x: Job; y: Job } {
    const cmd = new Commander();
    const from = cmd.submit(new Job(() => result, { name: "from" }));
    const x = new Job(() => "x", { name: "X" });
    const y = new Job(() => "y", { name: "Y" });
    addConditionalEdge(from, { success: x, failure: y });
    return { cmd, x, y };
  }

  it("follows the success route", async () => {
    const { cmd, x, y } = routed("success");
    await cmd.run();
    expect(x.status).toBe("completed");
    expect(y.status).toBe("pending");
  });

  it("follows the failure route", async () => {
    const { cmd, x, y } = routed("failure");
    await cmd.run();
    expect(x.status).toBe("pending");
    expect(y.status).toBe("completed");
  });

  it("schedules nothing and raises nothing for an unknown key", async () => {
    const { cmd, x, y } = routed("retry");
    const report = await cmd.run();

    expect(x.status).toBe("pending");
    expect(y.status).toBe("pending");
    expect(cmd.roots.map((n) => n.name)).toEqual(["from"]);
    expect(report.status).toBe("completed");
    expect(report.callbackErrors).toEqual([]);
  });

  it("ignores keys inherited from Object.prototype", async () => {
    const { cmd, x, y } = routed("toString");
    await cmd.run();
    expect([x.status, y.status]).toEqual(["pending", "pending"]);
  });

  it("stringifies numeric and boolean results", async () => {
    const cmd = new Commander();
    const from = cmd.submit(new Job(() => true, { name: "flag" }));
    const yes = new Job(() => "yes", { name: "yes" });
    addConditionalEdge(from, { true: yes });
    await cmd.run();
    expect(yes.status).toBe("completed");
  });

  it("routes through a custom selector", async () => {
    const cmd = new Commander();
    const from = cmd.submit(new Job(() => ({ score: 0.9 }), { name: "scored" }));
    const high = new Job(() => "high", { name: "high" });
    const low = new Job(() => "low", { name: "low" });
    addConditionalEdge(
      from,
      { high, low },
      {
        select: (node) => {
          const result = node.result;
          if (typeof result !== "object" || result === null || !("score" in result)) return undefined;
          return Number(result.score) >= 0.5 ? "high" : "low";
        },
      },
    );
    await cmd.run();
    expect(high.status).toBe("completed");
    expect(low.status).toBe("pending");
  });

  it("loops a reusable handler until its result has no route", async () => {
    const cmd = new Commander();
    const seen: number[] = [];
    const countdown = new Handler(
      async (n: number) => {
        seen.push(n);
        return n > 0 ? "again" : "done";
      },
      { name: "countdown", reusable: true },
    );
    addConditionalEdge(countdown, { again: countdown }, { args: () => [seen[seen.length - 1] - 1] });
    callHandler(cmd, countdown, [2]);

    const report = await cmd.run();
    expect(seen).toEqual([2, 1, 0]);
    expect(countdown.cycles.map((c) => (c.status === "completed" ? c.result : c.status))).toEqual([
      "again",
      "again",
      "done",
    ]);
    expect(cmd.roots).toHaveLength(1);
    expect(report.status).toBe("completed");
    expect(report.callbackErrors).toEqual([]);
  });

  it("rejects invalid routes", () => {
    const from = new Job(() => 1, { name: "from" });
    expect(() => addConditionalEdge(from, { ok: JSON.parse('"nope"') })).toThrow(
      'Edge route "ok" is not a job or handler',
    );
  });
});
