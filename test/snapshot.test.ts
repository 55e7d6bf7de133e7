import { describe, expect, it } from "vitest";
import { Commander } from "../src/commander.js";
import { formatTree, snapshot, walk } from "../src/tree/snapshot.js";
import { Job } from "../src/tree/job.js";
import { callHandler, submitJob } from "../src/tree/submit.js";

function build(): Commander {
  const cmd = new Commander({ name: "main" });
  const a = cmd.submit(new Job(() => 1, { name: "A" }));
  submitJob(
    a,
    () => {
      throw new Error("boom");
    },
    [],
    { name: "B" },
  );
  callHandler(cmd, () => "ok", [], { name: "C" });
  return cmd;
}

describe("formatTree", () => {
  it("renders a pending tree", () => {
    expect(formatTree(build())).toBe(
      ["commander main [idle]", "├── job A [pending]", "│   └── job B [pending]", "└── handler C [pending]"].join(
        "\n",
      ),
    );
  });

  it("renders outcomes after a run", async () => {
    const cmd = build();
    await cmd.run();
    expect(formatTree(cmd)).toBe(
      [
        "commander main [resolved]",
        "├── job A [completed]",
        "│   └── job B [failed: boom]",
        "└── handler C [completed]",
      ].join("\n"),
    );
  });

  it("indents nested last children with spaces", async () => {
    const cmd = new Commander({ name: "deep" });
    const outer = cmd.submit(new Job(() => "o", { name: "outer" }));
    const inner = submitJob(outer, () => "i", [], { name: "inner" });
    submitJob(inner, () => "l", [], { name: "leaf" });
    await cmd.run();
    expect(formatTree(cmd)).toBe(
      ["commander deep [resolved]", "└── job outer [completed]", "    └── job inner [completed]", "        └── job leaf [completed]"].join(
        "\n",
      ),
    );
  });
});

describe("snapshot", () => {
  it("captures the tree as plain data", async () => {
    const cmd = build();
    await cmd.run();
    const snap = snapshot(cmd);

    expect(snap.name).toBe("main");
    expect(snap.state).toBe("resolved");
    expect(snap.roots.map((r) => [r.kind, r.name, r.status])).toEqual([
      ["job", "A", "completed"],
      ["handler", "C", "completed"],
    ]);
    const [a, c] = snap.roots;
    expect(a.result).toBe(1);
    expect(a.children[0]).toMatchObject({ name: "B", status: "failed", error: "boom", children: [] });
    expect(a.children[0].result).toBeUndefined();
    expect(c.result).toBe("ok");
    expect(typeof a.startedAt).toBe("number");
    expect(JSON.parse(JSON.stringify(snap))).toEqual(snap);
  });

  it("walks parents before children", () => {
    const cmd = build();
    expect(walk(cmd.roots).map((n) => n.name)).toEqual(["A", "B", "C"]);
  });
});
