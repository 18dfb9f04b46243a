/**
 * Human-readable progress reporting for develop stages.
 * Purpose: print section rules and timed start/end banners, mirrored into the JSONL event log.
 * Assumptions: the end banner is printed only when the wrapped work resolves.
 * Usage: const reporter = createProgressReporter({ verbose }); await reporter.timed(...).
 */

import { formatErrorMessage, createAnsiFormatter, type AnsiFormatter } from "./error-format.js";
import type { EventLogger } from "./logger.js";

// =============================================================================
// TYPES
// =============================================================================

export type TimedMessages = {
  stage: string;
  start: string;
  end: string;
};

export type ProgressReporter = {
  rule(title: string): void;
  print(message: string): void;
  timed<T>(messages: TimedMessages, work: () => Promise<T>): Promise<T>;
};

export type ProgressReporterOptions = {
  verbose: boolean;
  logger?: EventLogger;
  write?: (line: string) => void;
  format?: AnsiFormatter;
  now?: () => number;
};

const RULE_WIDTH = 72;

// =============================================================================
// PUBLIC API
// =============================================================================

export function createProgressReporter(options: ProgressReporterOptions): ProgressReporter {
  const write = options.write ?? ((line: string) => console.log(line));
  const format = options.format ?? createAnsiFormatter(false);
  const now = options.now ?? Date.now;

  async function timed<T>(messages: TimedMessages, work: () => Promise<T>): Promise<T> {
    const startedAt = now();
    options.logger?.log({
      type: "stage.start",
      stage: messages.stage,
      payload: { message: messages.start },
    });
    if (options.verbose) {
      write(messages.start);
    }

    let result: Awaited<T>;
    try {
      result = await work();
    } catch (err) {
      options.logger?.log({
        type: "stage.fail",
        stage: messages.stage,
        payload: { message: formatErrorMessage(err), duration_ms: now() - startedAt },
      });
      throw err;
    }

    const elapsedMs = now() - startedAt;
    options.logger?.log({
      type: "stage.complete",
      stage: messages.stage,
      payload: { message: messages.end, duration_ms: elapsedMs },
    });
    if (options.verbose) {
      write(`${messages.end} ${format(`in ${formatSeconds(elapsedMs)} [s]`, ["dim"])}`);
    }

    return result;
  }

  return {
    rule: (title) => write(format(formatRule(title), ["bold", "cyan"])),
    print: (message) => write(message),
    timed,
  };
}

export function formatRule(title: string): string {
  const label = ` ${title} `;
  const remaining = Math.max(RULE_WIDTH - label.length, 4);
  const left = Math.floor(remaining / 2);
  return `${"─".repeat(left)}${label}${"─".repeat(remaining - left)}`;
}

function formatSeconds(ms: number): string {
  return (ms / 1000).toFixed(3);
}
