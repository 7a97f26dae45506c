import type { ZodError } from "zod";

/**
 * Formats a Zod error into a readable string
 */
export function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.map(String).join(".");
      return `  - ${path || "root"}: ${issue.message}`;
    })
    .join("\n");
}
