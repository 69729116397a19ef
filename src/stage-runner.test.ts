import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, mkdir, writeFile, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import {
  StageRunner,
  createSpawnLauncher,
  expandArgs,
  tailLines,
  type LaunchRequest,
  type LaunchResult,
  type ProcessLauncher,
} from "./stage-runner.js";
import type { StageCommand } from "./config.js";
import type { Unit } from "./types.js";

// ─── Test Helpers ─────────────────────────────────────────────────────────────

let root: string;

beforeEach(async () => {
  root = await mkdtemp(join(tmpdir(), "stage-runner-test-"));
});

afterEach(async () => {
  await rm(root, { recursive: true, force: true });
});

const COMMAND: StageCommand = { command: "extract-tool", args: [], timeoutMs: 1000 };

function exited(code: number, stderrTail: string[] = []): LaunchResult {
  return { exitCode: code, signal: null, timedOut: false, spawnError: null, stderrTail };
}

/** Launcher that runs `write` against the request, then returns `result`. */
function fakeLauncher(
  write: (request: LaunchRequest) => Promise<void>,
  result: LaunchResult = exited(0),
): ProcessLauncher & { requests: LaunchRequest[] } {
  const requests: LaunchRequest[] = [];
  return {
    requests,
    async launch(request) {
      requests.push(request);
      await write(request);
      return result;
    },
  };
}

async function makeUnit(id: string): Promise<Unit> {
  const rawPath = join(root, `${id}.mp4`);
  await writeFile(rawPath, "raw");
  return { id, dir: join(root, id), rawPath };
}

async function writeFramesInto(dir: string, count: number): Promise<void> {
  await mkdir(dir, { recursive: true });
  for (let i = 1; i <= count; i++) {
    await writeFile(join(dir, `frame_000${i}.jpg`), "jpeg");
  }
}

// ─── expandArgs ───────────────────────────────────────────────────────────────

describe("expandArgs", () => {
  it("substitutes known placeholders and leaves unknown ones", () => {
    const args = expandArgs(["--in={input}", "{output}", "--id", "{unit}", "{other}"], {
      input: "/v/a.mp4",
      output: "/v/a/.staging/extract",
      unit: "a",
    });
    expect(args).toEqual(["--in=/v/a.mp4", "/v/a/.staging/extract", "--id", "a", "{other}"]);
  });

  it("appends input and output when the template mentions neither", () => {
    expect(expandArgs(["--fast"], { input: "in", output: "out" }, true)).toEqual(["--fast", "in", "out"]);
  });

  it("does not append when the template already places the output", () => {
    expect(expandArgs(["-o", "{output}"], { input: "in", output: "out" }, true)).toEqual(["-o", "out"]);
  });
});

describe("tailLines", () => {
  it("keeps the last non-blank lines", () => {
    expect(tailLines("a\n\nb\r\nc\n", 2)).toEqual(["b", "c"]);
  });
});

// ─── StageRunner.run ──────────────────────────────────────────────────────────

describe("StageRunner.run", () => {
  it("publishes output written into staging when the marker holds", async () => {
    const unit = await makeUnit("p1");
    const launcher = fakeLauncher((req) => writeFramesInto(req.env.PIPELINE_OUTPUT, 2));
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run(unit, "extract", COMMAND);

    expect(outcome.kind).toBe("success");
    if (outcome.kind === "success") expect(outcome.metrics.markerFiles).toBe(2);
    expect(await readdir(join(unit.dir, "release_frames"))).toEqual(["frame_0001.jpg", "frame_0002.jpg"]);
    expect(await readdir(unit.dir)).toEqual(["release_frames"]);
  });

  it("passes the raw video and staging directory to the tool", async () => {
    const unit = await makeUnit("p1");
    const launcher = fakeLauncher((req) => writeFramesInto(req.env.PIPELINE_OUTPUT, 1));
    const runner = new StageRunner({ runId: "run-1", launcher });

    await runner.run(unit, "extract", { command: "extract-tool", args: ["--unit", "{unit}"], timeoutMs: 1000 });

    const staging = join(unit.dir, ".staging", "extract");
    expect(launcher.requests[0].args).toEqual(["--unit", "p1", join(root, "p1.mp4"), staging]);
    expect(launcher.requests[0].env).toEqual({
      PIPELINE_STAGE: "extract",
      PIPELINE_UNIT_ID: "p1",
      PIPELINE_UNIT_DIR: unit.dir,
      PIPELINE_INPUT: join(root, "p1.mp4"),
      PIPELINE_OUTPUT: staging,
    });
    expect(launcher.requests[0].timeoutMs).toBe(1000);
  });

  it("reports a non-zero exit with the stderr tail and publishes nothing", async () => {
    const unit = await makeUnit("p1");
    const launcher = fakeLauncher((req) => writeFramesInto(req.env.PIPELINE_OUTPUT, 1), exited(3, ["decoder error"]));
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run(unit, "extract", COMMAND);

    expect(outcome).toEqual({
      kind: "failure",
      reason: "extract failed for p1: exited with code 3\ndecoder error",
      durationMs: expect.any(Number),
    });
    expect(await readdir(unit.dir)).toEqual([".staging"]);
  });

  it("treats exit zero without a marker as a failure", async () => {
    const unit = await makeUnit("p1");
    const launcher = fakeLauncher(async () => {});
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run(unit, "extract", COMMAND);

    expect(outcome.kind).toBe("failure");
    if (outcome.kind === "failure") {
      expect(outcome.reason).toContain("exited 0 but marker is missing or empty");
    }
  });

  it("classifies a timed-out tool as a timeout", async () => {
    const unit = await makeUnit("p1");
    const launcher = fakeLauncher(async () => {}, {
      exitCode: null,
      signal: "SIGTERM",
      timedOut: true,
      spawnError: null,
      stderrTail: [],
    });
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run(unit, "extract", COMMAND);

    expect(outcome).toEqual({ kind: "timeout", reason: "extract timed out for p1 after 1000ms", durationMs: expect.any(Number) });
  });

  it("fails without launching when the raw video is absent", async () => {
    const launcher = fakeLauncher(async () => {});
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run({ id: "gone", dir: join(root, "gone"), rawPath: null }, "extract", COMMAND);

    expect(outcome).toEqual({ kind: "failure", reason: "extract failed for gone: raw artifact missing", durationMs: 0 });
    expect(launcher.requests).toHaveLength(0);
  });

  it("requires a per-frame marker for every frame in later stages", async () => {
    const unit = await makeUnit("p1");
    await writeFramesInto(join(unit.dir, "release_frames"), 2);
    const launcher = fakeLauncher(async (req) => {
      const dir = join(req.env.PIPELINE_OUTPUT, "frame_0001_poses");
      await mkdir(dir, { recursive: true });
      await writeFile(join(dir, "data.json"), "{}");
    });
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.run(unit, "pose", { ...COMMAND, command: "pose-tool" });

    expect(outcome.kind).toBe("failure");
    if (outcome.kind === "failure") {
      expect(outcome.reason).toBe(
        `pose failed for p1: exited 0 but marker is missing or empty (${join("frame_0002_poses", "data.json")})`,
      );
    }
  });

  it("hands the label output to the measure tool", async () => {
    const unit = await makeUnit("p1");
    const runner = new StageRunner({ runId: "run-1" });

    expect(runner.inputPath(unit, "measure")).toBe(join(unit.dir, "pitcher_labels"));
    expect(runner.inputPath(unit, "pose")).toBe(join(unit.dir, "release_frames"));
  });
});

// ─── StageRunner.invoke ───────────────────────────────────────────────────────

describe("StageRunner.invoke", () => {
  it("succeeds on exit zero with no marker check", async () => {
    const launcher = fakeLauncher(async () => {});
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.invoke("plot", { command: "plotter", args: ["--format", "{format}"], timeoutMs: 500 }, {
      input: "hist.json",
      output: "plots",
      format: "svg",
    });

    expect(outcome.kind).toBe("success");
    expect(launcher.requests[0].args).toEqual(["--format", "svg", "hist.json", "plots"]);
  });

  it("reports a failing renderer", async () => {
    const launcher = fakeLauncher(async () => {}, exited(1));
    const runner = new StageRunner({ runId: "run-1", launcher });

    const outcome = await runner.invoke("plot", { command: "plotter", args: [], timeoutMs: 500 }, {});

    expect(outcome).toEqual({ kind: "failure", reason: "plot exited with code 1", durationMs: expect.any(Number) });
  });
});

// ─── Spawn launcher ───────────────────────────────────────────────────────────

describe("createSpawnLauncher", () => {
  it("kills a tool that outlives its timeout", async () => {
    const launcher = createSpawnLauncher(200);

    const result = await launcher.launch({
      command: process.execPath,
      args: ["-e", "setTimeout(() => {}, 30000)"],
      env: {},
      timeoutMs: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(result.exitCode).toBeNull();
  });

  it("stops a timed-out tool's helpers that hold stderr open", async () => {
    const launcher = createSpawnLauncher(200);
    const helper = "require('node:child_process').spawn(process.execPath, ['-e', 'setTimeout(() => {}, 30000)'], { stdio: 'inherit' });";
    const started = Date.now();

    const result = await launcher.launch({
      command: process.execPath,
      args: ["-e", `${helper} setTimeout(() => {}, 30000)`],
      env: {},
      timeoutMs: 100,
    });

    expect(result.timedOut).toBe(true);
    expect(Date.now() - started).toBeLessThan(2000);
  });

  it("captures the stderr tail and exit code", async () => {
    const launcher = createSpawnLauncher();

    const result = await launcher.launch({
      command: process.execPath,
      args: ["-e", "process.stderr.write('first\\nsecond\\n'); process.exit(4)"],
      env: {},
      timeoutMs: 10000,
    });

    expect(result).toEqual({ exitCode: 4, signal: null, timedOut: false, spawnError: null, stderrTail: ["first", "second"] });
  });

  it("reports a command that cannot be started", async () => {
    const launcher = createSpawnLauncher();

    const result = await launcher.launch({
      command: join(root, "no-such-tool"),
      args: [],
      env: {},
      timeoutMs: 1000,
    });

    expect(result.spawnError).not.toBeNull();
    expect(result.exitCode).toBeNull();
  });
});

describe("staging cleanup", () => {
  it("clears a failed attempt's staging output before the retry publishes", async () => {
    const unit = await makeUnit("p1");
    const failing = fakeLauncher(async (req) => {
      await writeFile(join(req.env.PIPELINE_OUTPUT, "frame_0009.jpg"), "partial");
    }, exited(1));
    await new StageRunner({ runId: "run-1", launcher: failing }).run(unit, "extract", COMMAND);

    const ok = fakeLauncher((req) => writeFramesInto(req.env.PIPELINE_OUTPUT, 1));
    await new StageRunner({ runId: "run-2", launcher: ok }).run(unit, "extract", COMMAND);

    expect(await readdir(join(unit.dir, "release_frames"))).toEqual(["frame_0001.jpg"]);
    expect(await readFile(join(unit.dir, "release_frames", "frame_0001.jpg"), "utf-8")).toBe("jpeg");
  });
});
