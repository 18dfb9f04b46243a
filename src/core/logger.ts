import path from "node:path";

import fse from "fs-extra";

// =============================================================================
// TYPES
// =============================================================================

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export type DevelopEventType =
  | "develop.start"
  | "develop.complete"
  | "stage.start"
  | "stage.complete"
  | "stage.fail"
  | "image.build"
  | "config.write";

export type DevelopEvent = {
  type: DevelopEventType;
  stage?: string;
  payload?: JsonObject;
};

export type EventLogger = {
  log(event: DevelopEvent): void;
};

// =============================================================================
// JSONL LOGGER
// =============================================================================

export class JsonlLogger implements EventLogger {
  private readonly baseFields: JsonObject;
  private initialized = false;

  constructor(
    readonly filePath: string,
    baseFields: JsonObject = {},
  ) {
    this.baseFields = baseFields;
  }

  log(event: DevelopEvent): void {
    if (!this.initialized) {
      fse.ensureDirSync(path.dirname(this.filePath));
      this.initialized = true;
    }

    const record: JsonObject = {
      ts: new Date().toISOString(),
      ...this.baseFields,
      type: event.type,
    };
    if (event.stage !== undefined) record.stage = event.stage;
    if (event.payload !== undefined) record.payload = event.payload;

    fse.appendFileSync(this.filePath, `${JSON.stringify(record)}\n`, "utf8");
  }
}
