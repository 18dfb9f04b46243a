/*
Purpose: turn develop pipeline failures into titled, hinted CLI lines and provide ANSI styling.
Assumptions: debug mode may include stack traces; color is only used for TTY streams.
Usage: formatErrorLines(err, { mode: "debug" }); createAnsiFormatter(resolveColorEnabled({ stream: process.stderr })).
*/

import {
  ClusterError,
  ClusterStartFailedError,
  ConfigError,
  DeployError,
  DevelopError,
  DirectoryNotFoundError,
  GitError,
  ImageBuildError,
  NotInRepositoryError,
  USER_FACING_ERROR_CODES,
  UserFacingError,
  type UserFacingErrorInput,
} from "./errors.js";

// =============================================================================
// TYPES
// =============================================================================

export type ErrorFormatMode = "short" | "debug";

export type ErrorFormatLineKind =
  | "title"
  | "message"
  | "hint"
  | "next"
  | "code"
  | "name"
  | "cause"
  | "stack";

export type ErrorFormatLine = {
  kind: ErrorFormatLineKind;
  text: string;
};

export type AnsiStyle = "bold" | "dim" | "red" | "yellow" | "green" | "cyan";

export type AnsiFormatter = (value: string, styles?: AnsiStyle[]) => string;

// =============================================================================
// ANSI COLOR HELPERS
// =============================================================================

const ANSI_CODES: Record<AnsiStyle, number> = {
  bold: 1,
  dim: 2,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
};

export function createAnsiFormatter(enabled: boolean): AnsiFormatter {
  return (value, styles = []) => {
    if (!enabled || styles.length === 0) return value;
    const prefix = styles.map((style) => `\x1b[${ANSI_CODES[style]}m`).join("");
    return `${prefix}${value}\x1b[0m`;
  };
}

export function resolveColorEnabled(
  options: { stream?: { isTTY?: boolean }; useColor?: boolean } = {},
): boolean {
  const isTty = Boolean((options.stream ?? process.stderr).isTTY);
  return isTty && options.useColor !== false;
}

// =============================================================================
// ERROR DESCRIPTION
// =============================================================================

const UNEXPECTED_TITLE = "Unexpected error";
const UNEXPECTED_MESSAGE = "An unexpected error occurred.";

type DescribedError = Omit<UserFacingErrorInput, "cause"> & {
  name?: string;
  cause?: unknown;
  stack?: string;
};

function describeError(error: unknown): DescribedError {
  if (error instanceof UserFacingError) {
    return {
      code: error.code,
      title: textOr(error.title, UNEXPECTED_TITLE),
      message: textOr(error.message, UNEXPECTED_MESSAGE),
      hint: optionalText(error.hint),
      next: optionalText(error.next),
      name: error.name,
      cause: error.cause,
      stack: error.stack,
    };
  }

  if (error instanceof DevelopError) {
    return {
      ...describeDevelopError(error),
      message: textOr(formatErrorMessage(error), UNEXPECTED_MESSAGE),
      name: error.name,
      cause: error.cause,
      stack: error.stack,
    };
  }

  return {
    code: USER_FACING_ERROR_CODES.unknown,
    title: UNEXPECTED_TITLE,
    message:
      error === null || error === undefined
        ? UNEXPECTED_MESSAGE
        : textOr(formatErrorMessage(error), UNEXPECTED_MESSAGE),
    name: error instanceof Error ? error.name : undefined,
    cause: error instanceof Error ? error.cause : undefined,
    stack: error instanceof Error ? error.stack : undefined,
  };
}

function describeDevelopError(
  error: DevelopError,
): Pick<UserFacingErrorInput, "code" | "title" | "hint"> {
  if (error instanceof NotInRepositoryError) {
    return {
      code: USER_FACING_ERROR_CODES.git,
      title: "Not inside a git repository.",
      hint: "Run qhub-develop from a checkout of the QHub repository.",
    };
  }
  if (error instanceof GitError) {
    return { code: USER_FACING_ERROR_CODES.git, title: "Git command failed." };
  }
  if (error instanceof ClusterStartFailedError) {
    return {
      code: USER_FACING_ERROR_CODES.cluster,
      title: "Minikube cluster failed to start.",
      hint: `Inspect the cluster with "minikube status --profile=${error.profile}" or "minikube logs".`,
    };
  }
  if (error instanceof ClusterError) {
    return { code: USER_FACING_ERROR_CODES.cluster, title: "Minikube command failed." };
  }
  if (error instanceof ImageBuildError) {
    return {
      code: USER_FACING_ERROR_CODES.image,
      title: "Docker image build failed.",
      hint: "Check the image build output above for the failing step.",
    };
  }
  if (error instanceof DirectoryNotFoundError) {
    return {
      code: USER_FACING_ERROR_CODES.directory,
      title: "Image directory missing.",
      hint: "Make sure the QHub template image directory exists in the repository.",
    };
  }
  if (error instanceof ConfigError) {
    return {
      code: USER_FACING_ERROR_CODES.config,
      title: "Configuration error.",
      hint: "Check the --config path and the qhub-config.yaml structure.",
    };
  }
  if (error instanceof DeployError) {
    return { code: USER_FACING_ERROR_CODES.deploy, title: "QHub render or deploy failed." };
  }
  return { code: USER_FACING_ERROR_CODES.unknown, title: UNEXPECTED_TITLE };
}

// =============================================================================
// ERROR FORMATTING
// =============================================================================

export function formatErrorLines(
  error: unknown,
  options: { mode?: ErrorFormatMode } = {},
): ErrorFormatLine[] {
  const described = describeError(error);
  const lines: ErrorFormatLine[] = [{ kind: "title", text: described.title }];

  if (described.message.trim() !== described.title.trim()) {
    lines.push({ kind: "message", text: described.message });
  }
  if (described.hint) lines.push({ kind: "hint", text: described.hint });
  if (described.next) lines.push({ kind: "next", text: described.next });

  if (options.mode !== "debug") return lines;

  lines.push({ kind: "code", text: described.code });

  const name = optionalText(described.name);
  if (name) lines.push({ kind: "name", text: name });

  // A cause that only repeats the message adds nothing.
  const cause =
    described.cause === undefined || described.cause === null
      ? undefined
      : optionalText(formatErrorMessage(described.cause));
  if (cause && cause !== described.message) lines.push({ kind: "cause", text: cause });

  const stack =
    described.stack ?? (described.cause instanceof Error ? described.cause.stack : undefined);
  if (stack) lines.push({ kind: "stack", text: stack });

  return lines;
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return optionalText(error.message) ?? optionalText(error.name) ?? String(error);
  }
  if (typeof error === "string") return error;
  if (error && typeof error === "object" && "message" in error) {
    const { message } = error;
    if (typeof message === "string" && message.trim()) return message.trim();
  }
  return String(error);
}

function textOr(value: string | undefined, fallback: string): string {
  return optionalText(value) ?? fallback;
}

function optionalText(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}
