import { ToolDef } from "../types";

export const TERMINAL_TOOL_NAME = "answer";

/**
 * The terminal tool. Invoking it ends the task; its output is the final reply.
 */
export const answerTool: ToolDef = {
  name: TERMINAL_TOOL_NAME,
  description: [
    "Conveys your final reply to the user",
    "",
    "Args:",
    "    reply (str): Your final reply to the user",
    "",
    "Returns:",
    "    str: echoes 'reply'",
  ].join("\n"),
  parameters: {
    type: "object",
    properties: {
      reply: {},
    },
    required: ["reply"],
  },
  // Any JSON value is a reply; non-strings are serialised
  run: (args) => (typeof args.reply === "string" ? args.reply : JSON.stringify(args.reply)),
};
