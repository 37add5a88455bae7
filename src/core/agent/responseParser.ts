/**
 * Recognizer for the agent's reply grammar:
 *
 *   Thought: <free text>
 *   Action: <tool-name>
 *   Action Input: <JSON object>
 *
 * Exactly one Action and one Action Input are accepted. Any sign that the model
 * went on past its action (an Observation line, a second action) classifies the
 * reply as runaway so the controller can throw the exchange away.
 */

import { JsonObject, isJsonObject } from "../types";

export interface Directive {
  action: string;
  input: JsonObject;
}

export type RunawayReason = "observation" | "multiple_actions";

export type ParseResult =
  | { kind: "directive"; directive: Directive }
  | { kind: "runaway"; reason: RunawayReason }
  | { kind: "malformed"; missing: Array<"Action" | "Action Input"> }
  | { kind: "invalid_input"; raw: string };

const RE_OBSERVATION = /^[ \t]*Observation:/m;
const RE_ACTION = /^Action:[ \t]*([_a-zA-Z][_a-zA-Z0-9]*)/gm;
const RE_ACTION_INPUT = /^Action Input:/gm;

/**
 * Cut the JSON object out of the (trimmed) text after the `Action Input:` tag,
 * from its opening `{` to the last `}`. The object may span several lines.
 */
function extractPayload(afterTag: string): string | null {
  // Arrays and scalars are rejected here: the root must be an object
  if (!afterTag.startsWith("{")) return null;
  const end = afterTag.lastIndexOf("}");
  return afterTag.slice(0, end + 1);
}

export function parseResponse(reply: string): ParseResult {
  const text = reply.replace(/\r\n?/g, "\n");

  if (RE_OBSERVATION.test(text)) {
    return { kind: "runaway", reason: "observation" };
  }

  const actions = Array.from(text.matchAll(RE_ACTION), (m) => m[1]);
  const inputTags = Array.from(text.matchAll(RE_ACTION_INPUT), (m) => (m.index ?? 0) + m[0].length);

  const missing: Array<"Action" | "Action Input"> = [];
  if (actions.length === 0) missing.push("Action");
  if (inputTags.length === 0) missing.push("Action Input");
  if (missing.length > 0) {
    return { kind: "malformed", missing };
  }

  if (actions.length > 1 || inputTags.length > 1) {
    return { kind: "runaway", reason: "multiple_actions" };
  }

  const raw = text.slice(inputTags[0]).trim();
  const payload = extractPayload(raw);
  if (payload === null) {
    return { kind: "invalid_input", raw };
  }

  let input: unknown;
  try {
    input = JSON.parse(payload);
  } catch {
    return { kind: "invalid_input", raw };
  }

  if (!isJsonObject(input)) {
    return { kind: "invalid_input", raw };
  }

  return { kind: "directive", directive: { action: actions[0], input } };
}
