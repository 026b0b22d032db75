/**
 * Settings file errors
 *
 * Reads a YAML settings file through the FileSystem port and validates it with
 * a Zod schema. Problems the user can fix by editing the file come back as a
 * SettingsError naming the file, with one detail line per problem. I/O
 * failures other than a missing file are thrown.
 *
 * @example
 * ```ts
 * const result = loadYamlSettings(fs, "/project/modelver.yaml", ModelverConfigSchema);
 * if (!result.success) {
 *   formatFriendlyError(result.error).forEach((line) => console.error(line));
 *   process.exit(1);
 * }
 * ```
 */

import { parse as parseYaml, YAMLParseError } from "yaml";
import type { ZodError, ZodType, ZodTypeDef } from "zod";
import type { FileSystem } from "#/core";

export type ParseErrorType = "yaml" | "validation";

export interface FriendlyError {
  type: ParseErrorType;
  /** Settings file the error was found in */
  file: string;
  message: string;
  details: string[];
}

export type ParseResult<T> =
  | { success: true; data: T }
  | { success: false; error: FriendlyError };

function isMapping(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function describeValue(value: unknown): string {
  if (Array.isArray(value)) {
    return "a list";
  }
  return typeof value === "string" ? "a string" : `${typeof value} ${String(value)}`;
}

function formatZodIssues(error: ZodError): string[] {
  return error.issues.map((issue) => {
    const key = issue.path.length > 0 ? issue.path.join(".") : "(top level)";
    return `${key}: ${issue.message}`;
  });
}

// yaml puts the position at the end of the first line and a source excerpt after it
function describeYamlError(error: YAMLParseError): string {
  const firstLine = error.message.split("\n")[0] ?? error.message;
  const problem = firstLine.replace(/ at line \d+, column \d+:?$/, "");
  const start = error.linePos?.[0];
  return start ? `line ${start.line}, column ${start.col}: ${problem}` : problem;
}

/**
 * Validate the text of a settings file.
 *
 * An empty or comment-only document stands for "no settings" and is validated
 * as `{}`, so schemas made of defaulted fields accept it. Any other top-level
 * value that is not a mapping is rejected before the schema runs.
 */
export function parseYamlSettings<Output, Input = Output>(
  content: string,
  schema: ZodType<Output, ZodTypeDef, Input>,
  file: string
): ParseResult<Output> {
  let raw: unknown;
  try {
    raw = parseYaml(content);
  } catch (err) {
    if (!(err instanceof YAMLParseError)) {
      throw err;
    }
    return {
      success: false,
      error: { type: "yaml", file, message: `Invalid YAML in ${file}`, details: [describeYamlError(err)] },
    };
  }

  const settings = raw ?? {};
  if (!isMapping(settings)) {
    return {
      success: false,
      error: {
        type: "validation",
        file,
        message: `Invalid settings in ${file}`,
        details: [`(top level): Expected a mapping of settings, found ${describeValue(settings)}`],
      },
    };
  }

  const result = schema.safeParse(settings);
  if (!result.success) {
    return {
      success: false,
      error: { type: "validation", file, message: `Invalid settings in ${file}`, details: formatZodIssues(result.error) },
    };
  }

  return { success: true, data: result.data };
}

/**
 * Read and validate a settings file. A missing file is treated like an empty
 * one, so the schema's defaults apply.
 */
export function loadYamlSettings<Output, Input = Output>(
  fs: FileSystem,
  file: string,
  schema: ZodType<Output, ZodTypeDef, Input>
): ParseResult<Output> {
  const content = fs.exists(file) ? fs.readFile(file) : "";
  return parseYamlSettings(content, schema, file);
}

/**
 * Lines to print for a FriendlyError: the message, then indented details.
 */
export function formatFriendlyError(error: FriendlyError): string[] {
  return [error.message, ...error.details.map((detail) => `  ${detail}`)];
}
