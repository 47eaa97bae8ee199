import type { ZodIssue } from "zod";

/**
 * Bad or missing input. Never retried; surfaced before any provider call.
 */
export class ConfigurationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(issues.length > 0 ? `${message}:\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigurationError";
  }

  /**
   * Build from zod issues. `describePath` renames issue paths for the reader,
   * e.g. config keys to environment variable names.
   */
  static fromIssues(
    message: string,
    issues: ZodIssue[],
    describePath: (path: Array<string | number>) => string = (path) => path.join(".")
  ): ConfigurationError {
    return new ConfigurationError(
      message,
      issues.map((issue) => {
        const location = describePath(issue.path);
        return location ? `${location}: ${issue.message}` : issue.message;
      })
    );
  }
}
