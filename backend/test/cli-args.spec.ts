import { describe, expect, it } from "vitest";

import { parseCliArgs } from "../src/cli-args";
import { resolveLogLevels } from "../src/logging";

describe("parseCliArgs", () => {
  it("defaults to a single run for the configured day", () => {
    expect(parseCliArgs([])).toEqual({serve: false, day: null});
  });

  it("reads --serve and both forms of --date", () => {
    expect(parseCliArgs(["--serve", "--date=today"])).toEqual({serve: true, day: "today"});
    expect(parseCliArgs(["--date", "2025-06-10"])).toEqual({serve: false, day: "2025-06-10"});
  });

  it("rejects unknown flags and a dangling --date", () => {
    expect(() => parseCliArgs(["--verbose"])).toThrow("Unknown argument '--verbose'");
    expect(() => parseCliArgs(["--date"])).toThrow("--date expects a value");
    expect(() => parseCliArgs(["--date", "--serve"])).toThrow("--date expects a value");
  });
});

describe("resolveLogLevels", () => {
  it("maps configured names onto Nest log levels", () => {
    expect(resolveLogLevels("warning")).toEqual({levels: ["fatal", "error", "warn"], normalized: "warn", fallbackUsed: false});
    expect(resolveLogLevels(" DEBUG ").levels).toEqual(["fatal", "error", "warn", "log", "debug"]);
  });

  it("falls back to info for unknown names", () => {
    expect(resolveLogLevels("chatty")).toEqual({levels: ["fatal", "error", "warn", "log"], normalized: "info", fallbackUsed: true});
  });
});
