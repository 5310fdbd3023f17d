/*
Purpose: append structured identity events to a JSONL file.
Assumptions: one writer per file; every line is a standalone JSON object.
Usage: const log = new JsonlLogger(path, { command: "compute" }); logIdentityEvent(log, "identity.computed", { package_id }).
*/

import path from "node:path";

import fse from "fs-extra";

export type JsonPrimitive = string | number | boolean | null;
export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };
export type JsonObject = { [key: string]: JsonValue };

export class JsonlLogger {
  constructor(
    public readonly filePath: string,
    private readonly defaults: JsonObject = {},
  ) {
    fse.ensureDirSync(path.dirname(filePath));
  }

  log(event: JsonObject & { type: string }): void {
    const line = JSON.stringify({ ts: new Date().toISOString(), ...this.defaults, ...event });
    fse.appendFileSync(this.filePath, `${line}\n`, "utf8");
  }
}

export function logIdentityEvent(
  logger: JsonlLogger | undefined,
  type: string,
  payload: JsonObject = {},
): void {
  logger?.log({ ...payload, type });
}
