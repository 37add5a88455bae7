/**
 * Tool descriptor validation (zod)
 */

import { z } from "zod";
import { ToolRunner } from "../types";

/**
 * Tool names double as the `Action:` value in model replies, so they must be
 * identifier-shaped.
 */
export const TOOL_NAME_PATTERN = /^[_a-zA-Z][_a-zA-Z0-9]*$/;

export const ToolDefSchema = z.object({
  name: z
    .string()
    .min(1)
    .max(100)
    .regex(TOOL_NAME_PATTERN, { message: "Tool name must be an identifier ([_a-zA-Z][_a-zA-Z0-9]*)" }),
  description: z.string().trim().min(1, { message: "Tool description must not be empty" }),
  parameters: z.record(z.unknown()).optional(),
  run: z.custom<ToolRunner>((val) => typeof val === "function", {
    message: "Tool run must be a function",
  }),
});

/**
 * Returns the list of problems with a descriptor, empty when it is usable.
 */
export function describeToolDefIssues(def: unknown): string[] {
  const parsed = ToolDefSchema.safeParse(def);
  if (parsed.success) return [];
  return parsed.error.issues.map((issue) => {
    const path = issue.path.join(".");
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
