import { describe, expect, it } from "vitest";

import { createAnsiFormatter } from "./error-format.js";
import type { DevelopEvent } from "./logger.js";
import { createProgressReporter, formatRule } from "./progress.js";

function createClock(...readings: number[]): () => number {
  let index = 0;
  return () => readings[Math.min(index++, readings.length - 1)] ?? 0;
}

describe("createProgressReporter", () => {
  it("prints start and timed end banners when verbose", async () => {
    const output: string[] = [];
    const events: DevelopEvent[] = [];
    const reporter = createProgressReporter({
      verbose: true,
      write: (line) => output.push(line),
      logger: { log: (event) => events.push(event) },
      now: createClock(1_000, 3_250),
    });

    const value = await reporter.timed(
      { stage: "deploy", start: "Deploying", end: "Deployed" },
      async () => 42,
    );

    expect(value).toBe(42);
    expect(output).toEqual(["Deploying", "Deployed in 2.250 [s]"]);
    expect(events).toEqual([
      { type: "stage.start", stage: "deploy", payload: { message: "Deploying" } },
      { type: "stage.complete", stage: "deploy", payload: { message: "Deployed", duration_ms: 2_250 } },
    ]);
  });

  it("stays silent but still logs when not verbose", async () => {
    const output: string[] = [];
    const events: DevelopEvent[] = [];
    const reporter = createProgressReporter({
      verbose: false,
      write: (line) => output.push(line),
      logger: { log: (event) => events.push(event) },
      now: createClock(0),
    });

    await reporter.timed({ stage: "render", start: "Rendering", end: "Rendered" }, async () => undefined);

    expect(output).toEqual([]);
    expect(events.map((event) => event.type)).toEqual(["stage.start", "stage.complete"]);
  });

  it("withholds the end banner and rethrows when the work fails", async () => {
    const output: string[] = [];
    const events: DevelopEvent[] = [];
    const failure = new Error("minikube exited");
    const reporter = createProgressReporter({
      verbose: true,
      write: (line) => output.push(line),
      logger: { log: (event) => events.push(event) },
      now: createClock(10, 15),
    });

    const result = await reporter
      .timed({ stage: "provision-cluster", start: "Creating", end: "Created" }, async () => {
        throw failure;
      })
      .catch((err: unknown) => err);

    expect(result).toBe(failure);
    expect(output).toEqual(["Creating"]);
    expect(events.at(-1)).toEqual({
      type: "stage.fail",
      stage: "provision-cluster",
      payload: { message: "minikube exited", duration_ms: 5 },
    });
  });

  it("dims the timing suffix when color is enabled", async () => {
    const output: string[] = [];
    const reporter = createProgressReporter({
      verbose: true,
      write: (line) => output.push(line),
      format: createAnsiFormatter(true),
      now: createClock(0, 500),
    });

    await reporter.timed({ stage: "s", start: "Start", end: "End" }, async () => undefined);

    expect(output[1]).toBe("End \x1b[2min 0.500 [s]\x1b[0m");
  });

  it("prints rules and plain messages regardless of verbosity", () => {
    const output: string[] = [];
    const reporter = createProgressReporter({ verbose: false, write: (line) => output.push(line) });

    reporter.rule("Installing QHub");
    reporter.print("Development documentation");

    expect(output).toEqual([formatRule("Installing QHub"), "Development documentation"]);
  });
});

describe("formatRule", () => {
  it("centres the title in a fixed-width rule", () => {
    const rule = formatRule("Installing QHub");

    expect(rule).toHaveLength(72);
    expect(rule).toBe(`${"─".repeat(27)} Installing QHub ${"─".repeat(28)}`);
  });

  it("keeps a minimum border around long titles", () => {
    const title = "x".repeat(80);

    expect(formatRule(title)).toBe(`── ${title} ──`);
  });
});
