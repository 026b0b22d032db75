import { describe, test, expect } from "vitest";
import { z } from "zod";
import { createMockFileSystem } from "#/test-utils/mocks";
import { formatFriendlyError, loadYamlSettings, parseYamlSettings } from "./friendly-errors";

const Schema = z.object({
  name: z.string().default("unnamed"),
  retries: z.number().int().default(3),
});

const FILE = "/project/settings.yaml";

describe("friendly-errors", () => {
  describe("parseYamlSettings", () => {
    test("returns validated data", () => {
      const result = parseYamlSettings("name: churn\nretries: 5\n", Schema, FILE);

      expect(result).toEqual({ success: true, data: { name: "churn", retries: 5 } });
    });

    test("applies schema defaults", () => {
      const result = parseYamlSettings("name: churn\n", Schema, FILE);

      expect(result).toEqual({ success: true, data: { name: "churn", retries: 3 } });
    });

    test.each(["", "   \n", "# only a comment\n"])("validates %j as no settings", (content) => {
      expect(parseYamlSettings(content, Schema, FILE)).toEqual({
        success: true,
        data: { name: "unnamed", retries: 3 },
      });
    });

    test("reports YAML syntax errors with their position", () => {
      const result = parseYamlSettings("name: [unclosed", Schema, FILE);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.type).toBe("yaml");
        expect(result.error.file).toBe(FILE);
        expect(result.error.message).toBe("Invalid YAML in /project/settings.yaml");
        expect(result.error.details).toHaveLength(1);
        expect(result.error.details[0]).toMatch(/^line 1, column \d+: /);
        expect(result.error.details[0]).not.toMatch(/\n/);
      }
    });

    test("rejects a top-level scalar", () => {
      expect(parseYamlSettings("just text\n", Schema, FILE)).toEqual({
        success: false,
        error: {
          type: "validation",
          file: FILE,
          message: "Invalid settings in /project/settings.yaml",
          details: ["(top level): Expected a mapping of settings, found a string"],
        },
      });
    });

    test("rejects a top-level list", () => {
      const result = parseYamlSettings("- 1\n- 2\n", Schema, FILE);

      expect(result.success).toBe(false);
      if (!result.success) {
        expect(result.error.details).toEqual(["(top level): Expected a mapping of settings, found a list"]);
      }
    });

    test("reports validation issues with their key", () => {
      const result = parseYamlSettings("name: 42\nretries: many\n", Schema, FILE);

      expect(result).toEqual({
        success: false,
        error: {
          type: "validation",
          file: FILE,
          message: "Invalid settings in /project/settings.yaml",
          details: ["name: Expected string, received number", "retries: Expected number, received string"],
        },
      });
    });
  });

  describe("loadYamlSettings", () => {
    test("reads the file through the filesystem port", () => {
      const fs = createMockFileSystem({ [FILE]: "retries: 1\n" });

      expect(loadYamlSettings(fs, FILE, Schema)).toEqual({
        success: true,
        data: { name: "unnamed", retries: 1 },
      });
    });

    test("treats a missing file as empty", () => {
      const fs = createMockFileSystem();

      expect(loadYamlSettings(fs, FILE, Schema)).toEqual({
        success: true,
        data: { name: "unnamed", retries: 3 },
      });
    });

    test("propagates read failures", () => {
      const fs = createMockFileSystem({ [FILE]: "retries: 1\n" });
      fs.readFile = (path: string) => {
        throw Object.assign(new Error(`EACCES: permission denied, open '${path}'`), { code: "EACCES" });
      };

      expect(() => loadYamlSettings(fs, FILE, Schema)).toThrow("EACCES");
    });
  });

  describe("formatFriendlyError", () => {
    test("indents details under the message", () => {
      const lines = formatFriendlyError({
        type: "validation",
        file: "modelver.yaml",
        message: "Invalid settings in modelver.yaml",
        details: ["strict: Expected boolean, received string"],
      });

      expect(lines).toEqual([
        "Invalid settings in modelver.yaml",
        "  strict: Expected boolean, received string",
      ]);
    });

    test("prints only the message when there are no details", () => {
      expect(
        formatFriendlyError({ type: "yaml", file: "modelver.yaml", message: "Invalid YAML in modelver.yaml", details: [] })
      ).toEqual(["Invalid YAML in modelver.yaml"]);
    });
  });
});
