import { ToolDef } from "../types";

function pad(n: number): string {
  return String(n).padStart(2, "0");
}

/**
 * Local date and time as YYYY-MM-DDTHH:mm
 */
export function formatLocalMinute(d: Date): string {
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}T${pad(d.getHours())}:${pad(d.getMinutes())}`;
}

export function createDateTool(now: () => Date = () => new Date()): ToolDef {
  return {
    name: "date",
    description: [
      "Reports the current date and time",
      "",
      "Args:",
      "    None",
      "",
      "Returns:",
      "    str: a string with the date and time in ISO 8601 format",
    ].join("\n"),
    parameters: { type: "object", properties: {} },
    run: () => formatLocalMinute(now()),
  };
}
