import * as path from "node:path";
import { describe, test, expect } from "vitest";
import { ZodError } from "zod";
import { defaultCredentialsPath, resolveRunOptions } from "../config.js";

describe("defaultCredentialsPath", () => {
  test("lives under ~/.config/route-highlighter", () => {
    expect(defaultCredentialsPath("/home/test")).toBe(
      path.join("/home/test", ".config", "route-highlighter", "credentials.json"),
    );
  });
});

describe("resolveRunOptions", () => {
  test("resolves paths against the working directory and applies defaults", () => {
    const cwd = path.resolve("/work");
    expect(resolveRunOptions({ inputDir: "exports", output: "combined.kml" }, cwd)).toEqual({
      inputDir: path.join(cwd, "exports"),
      output: path.join(cwd, "combined.kml"),
      upload: false,
      mergeStore: undefined,
      credentials: defaultCredentialsPath(),
      documentName: "Combined routes",
    });
  });

  test("keeps explicit values", () => {
    const cwd = path.resolve("/work");
    const opts = resolveRunOptions(
      {
        inputDir: "/data/exports",
        output: "out.kml",
        upload: true,
        mergeStore: "state/routes.jsonl",
        credentials: "creds.json",
        documentName: "Trips",
      },
      cwd,
    );
    expect(opts).toEqual({
      inputDir: path.resolve("/data/exports"),
      output: path.join(cwd, "out.kml"),
      upload: true,
      mergeStore: path.join(cwd, "state", "routes.jsonl"),
      credentials: path.join(cwd, "creds.json"),
      documentName: "Trips",
    });
  });

  test("rejects a blank output path", () => {
    expect(() => resolveRunOptions({ inputDir: "exports", output: "  " })).toThrow(ZodError);
  });
});
