/*
Purpose: error types raised by the develop pipeline, its providers, and CLI output.
Assumptions: UserFacingError instances are safe to display to end users.
Usage: throw new ClusterStartFailedError("qhub"); throw new UserFacingError({ code, title, message, hint, next, cause }).
*/

// =============================================================================
// CORE ERRORS
// =============================================================================

export class DevelopError extends Error {
  constructor(
    message: string,
    public readonly cause?: unknown,
  ) {
    super(message);
    this.name = "DevelopError";
  }
}

export class ConfigError extends DevelopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ConfigError";
  }
}

export class GitError extends DevelopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "GitError";
  }
}

export class ClusterError extends DevelopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ClusterError";
  }
}

export class ImageBuildError extends DevelopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "ImageBuildError";
  }
}

export class DeployError extends DevelopError {
  constructor(message: string, cause?: unknown) {
    super(message, cause);
    this.name = "DeployError";
  }
}

// =============================================================================
// PRECONDITION AND STAGE ERRORS
// =============================================================================

export class NotInRepositoryError extends GitError {
  constructor(public readonly startDir: string) {
    super("QHub develop required to run within QHub git repository");
    this.name = "NotInRepositoryError";
  }
}

export class DirectoryNotFoundError extends DevelopError {
  constructor(
    public readonly directory: string,
    cause?: unknown,
  ) {
    super(`Image directory not found: ${directory}`, cause);
    this.name = "DirectoryNotFoundError";
  }
}

export class ClusterStartFailedError extends ClusterError {
  constructor(public readonly profile: string) {
    super("Minikube cluster failed to start");
    this.name = "ClusterStartFailedError";
  }
}

export class ConfigLoadError extends ConfigError {
  constructor(
    public readonly configPath: string,
    cause?: unknown,
  ) {
    super(`Unable to read configuration at ${configPath}`, cause);
    this.name = "ConfigLoadError";
  }
}

export class ConfigMalformedError extends ConfigError {
  constructor(
    public readonly configPath: string,
    detail: string,
    cause?: unknown,
  ) {
    super(`Malformed configuration at ${configPath}: ${detail}`, cause);
    this.name = "ConfigMalformedError";
  }
}

export class ConfigStructureError extends ConfigError {
  constructor(
    public readonly keyPath: string,
    expected: string,
  ) {
    super(`Configuration key "${keyPath}" must be ${expected}`);
    this.name = "ConfigStructureError";
  }
}

// =============================================================================
// USER-FACING ERRORS
// =============================================================================

export const USER_FACING_ERROR_CODES = {
  unknown: "UNKNOWN",
  config: "CONFIG_ERROR",
  git: "GIT_ERROR",
  cluster: "CLUSTER_ERROR",
  image: "IMAGE_BUILD_ERROR",
  deploy: "DEPLOY_ERROR",
  directory: "DIRECTORY_NOT_FOUND",
} as const;

export type UserFacingErrorCode =
  (typeof USER_FACING_ERROR_CODES)[keyof typeof USER_FACING_ERROR_CODES];

export type UserFacingErrorInput = {
  code: UserFacingErrorCode;
  title: string;
  message: string;
  hint?: string;
  next?: string;
  cause?: unknown;
};

export class UserFacingError extends Error {
  public readonly code: UserFacingErrorCode;
  public readonly title: string;
  public readonly hint?: string;
  public readonly next?: string;
  public readonly cause?: unknown;

  constructor(input: UserFacingErrorInput) {
    super(input.message);
    this.name = "UserFacingError";
    this.code = input.code;
    this.title = input.title;
    this.hint = input.hint;
    this.next = input.next;
    this.cause = input.cause;
  }
}
