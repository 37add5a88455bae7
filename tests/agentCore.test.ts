/**
 * Agent Unit Tests
 */

import { Agent, OBSERVATION_INVALID_FORMAT, OBSERVATION_INVALID_INPUT } from "../src/core/agent/agentCore";
import { EventBus } from "../src/core/eventBus";
import { AgentBusyError, TransportError } from "../src/core/errors";
import { AgentLogger } from "../src/core/logger";
import { ScriptedTransport, ScriptedReply } from "../src/core/models/mockAdapter";
import { calculatorTool } from "../src/core/tools";
import { ToolDef } from "../src/core/types";

const ADD = ["Thought: I need to add.", "Action: calculator", 'Action Input: {"expression": "2+2"}'].join("\n");
const ANSWER_4 = ["Thought: I can answer without using any more tools.", "Action: answer", 'Action Input: {"reply": "4"}'].join(
  "\n"
);
const RUNAWAY = [ADD, "Observation: 4", "Thought: done", "Action: answer", 'Action Input: {"reply": "4"}'].join("\n");

const faultyTool: ToolDef = {
  name: "faulty",
  description: "always fails",
  run: () => {
    throw new Error("disk on fire");
  },
};

describe("Agent", () => {
  let eventBus: EventBus;

  beforeEach(() => {
    eventBus = new EventBus();
  });

  function agentWith(script: readonly string[] | ScriptedReply, tools: ToolDef[] = [calculatorTool], maxSteps?: number) {
    const transport = new ScriptedTransport(eventBus, script, { retryIntervals: [0] });
    const agent = new Agent({ id: "test-agent", model: "test-model", transport, tools, maxSteps }, eventBus);
    return { agent, transport };
  }

  /** The user turn sent with the n-th model request */
  function sentInput(transport: ScriptedTransport, n: number): string | undefined {
    const messages = transport.requests[n]?.messages ?? [];
    return messages[messages.length - 1]?.content;
  }

  test("should answer through a tool call", async () => {
    const { agent, transport } = agentWith([ADD, ANSWER_4]);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(transport.callCount).toBe(2);
    expect(sentInput(transport, 1)).toBe("Observation: 4");
  });

  test("should start the history with the system prompt", async () => {
    const { agent, transport } = agentWith([ANSWER_4]);
    await agent.task("hi");

    expect(agent.systemPrompt).toContain("> Tool Name: calculator");
    expect(agent.systemPrompt).toContain("> Tool Name: answer");
    expect(transport.requests[0].messages).toEqual([
      { role: "system", content: agent.systemPrompt },
      { role: "user", content: "hi" },
    ]);
  });

  test("should alternate user and assistant messages", async () => {
    const { agent } = agentWith([ADD, ANSWER_4]);
    await agent.task("What is 2+2?");

    expect(agent.getMessages().map((m) => m.role)).toEqual(["system", "user", "assistant", "user", "assistant"]);
  });

  test("should return the exhaustion message when the step bound is hit", async () => {
    const { agent, transport } = agentWith([ADD, ADD, ADD]);

    expect(await agent.task("What is 2+2?", 1)).toBe(
      "Agent was unable to answer your question in the maximal number of steps (1)"
    );
    expect(transport.callCount).toBe(1);
  });

  test("should use the configured step bound by default", async () => {
    const { agent, transport } = agentWith(() => ADD, [calculatorTool], 3);

    expect(await agent.task("loop")).toBe("Agent was unable to answer your question in the maximal number of steps (3)");
    expect(transport.callCount).toBe(3);
  });

  test("should default to ten steps", async () => {
    const { agent, transport } = agentWith(() => ADD);

    await agent.task("loop");
    expect(transport.callCount).toBe(10);
  });

  test("should discard a runaway reply and retry the same input", async () => {
    const { agent, transport } = agentWith([RUNAWAY, ANSWER_4]);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(transport.requests[1].messages).toEqual(transport.requests[0].messages);
    expect(agent.getMessages()).toHaveLength(3);
    expect(agent.getMessages().some((m) => m.content === RUNAWAY)).toBe(false);
  });

  test("should discard a reply with two actions", async () => {
    const twoActions = [ADD, "Thought: again", ADD.split("\n").slice(1).join("\n")].join("\n");
    const { agent, transport } = agentWith([twoActions, ANSWER_4]);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(sentInput(transport, 1)).toBe("What is 2+2?");
    expect(agent.getMessages()).toHaveLength(3);
  });

  test("should count a discarded runaway exchange as a step", async () => {
    const { agent, transport } = agentWith([RUNAWAY, ANSWER_4]);

    expect(await agent.task("What is 2+2?", 1)).toBe(
      "Agent was unable to answer your question in the maximal number of steps (1)"
    );
    expect(transport.callCount).toBe(1);
    expect(agent.getMessages()).toHaveLength(1);
  });

  test("should feed back a format error for malformed replies", async () => {
    const { agent, transport } = agentWith(["The answer is 4.", ANSWER_4]);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(sentInput(transport, 1)).toBe(OBSERVATION_INVALID_FORMAT);
  });

  test("should feed back an input error for unparsable action input", async () => {
    const { agent, transport } = agentWith(["Action: calculator\nAction Input: {2+2}", ANSWER_4]);

    await agent.task("What is 2+2?");
    expect(sentInput(transport, 1)).toBe(OBSERVATION_INVALID_INPUT);
    expect(OBSERVATION_INVALID_INPUT).toBe("Observation: Error: Invalid Action Input format");
  });

  test("should report unknown actions", async () => {
    const { agent, transport } = agentWith(["Action: teleport\nAction Input: {}", ANSWER_4]);

    await agent.task("Go to Mars");
    expect(sentInput(transport, 1)).toBe("Observation: Error: Invalid action (teleport)");
  });

  test("should turn tool faults into observations and keep going", async () => {
    const { agent, transport } = agentWith(["Action: faulty\nAction Input: {}", ANSWER_4], [faultyTool]);

    expect(await agent.task("Try it")).toBe("4");
    expect(sentInput(transport, 1)).toBe(
      "Observation: Error: There was a problem using the tool ('faulty') with the given input: disk on fire"
    );
  });

  test("should report tool input that fails validation", async () => {
    const { agent, transport } = agentWith(['Action: calculator\nAction Input: {"expr": "2+2"}', ANSWER_4]);

    await agent.task("What is 2+2?");
    expect(sentInput(transport, 1)).toBe(
      "Observation: Error: There was a problem using the tool ('calculator') with the given input: " +
        "Invalid input: input must have required property 'expression'"
    );
  });

  test("should keep going when the answer tool rejects its input", async () => {
    const { agent, transport } = agentWith(['Action: answer\nAction Input: {"text": "4"}', ANSWER_4]);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(sentInput(transport, 1)).toMatch(/^Observation: Error: There was a problem using the tool \('answer'\)/);
  });

  test("should return a non-string reply as text", async () => {
    const { agent, transport } = agentWith(['Thought: done\nAction: answer\nAction Input: {"reply": 4}'], [calculatorTool], 2);

    expect(await agent.task("What is 2+2?")).toBe("4");
    expect(transport.callCount).toBe(1);
  });

  test("should pass tool results through as observations", async () => {
    const { agent, transport } = agentWith([
      'Action: calculator\nAction Input: {"expression": "nonsense"}',
      ANSWER_4,
    ]);

    await agent.task("What is nonsense?");
    expect(sentInput(transport, 1)).toBe("Observation: Error: Invalid mathematical expression");
  });

  test("should let transport failures escape", async () => {
    const { agent } = agentWith([]);

    await expect(agent.task("hello")).rejects.toThrow(TransportError);
    expect(agent.isRunning).toBe(false);
  });

  test("should refuse a second task while one is running", async () => {
    let release: ((reply: string) => void) | undefined;
    const { agent } = agentWith(
      () =>
        new Promise<string>((resolve) => {
          release = resolve;
        })
    );

    const first = agent.task("first");
    await expect(agent.task("second")).rejects.toThrow(AgentBusyError);

    release?.(ANSWER_4);
    expect(await first).toBe("4");
    expect(agent.isRunning).toBe(false);
  });

  test("should keep history across tasks", async () => {
    const { agent } = agentWith([ANSWER_4, ANSWER_4]);

    await agent.task("one");
    await agent.task("two");

    expect(agent.getMessages().filter((m) => m.role === "user").map((m) => m.content)).toEqual(["one", "two"]);
  });

  test("should render the debug history without the system prompt", async () => {
    const { agent } = agentWith([ADD, ANSWER_4]);
    await agent.task("What is 2+2?");

    expect(agent.messageHistory()).toBe(
      [
        "**user**:\nWhat is 2+2?\n",
        `**assistant**:\n${ADD}\n`,
        "**user**:\nObservation: 4\n",
        `**assistant**:\n${ANSWER_4}\n`,
      ].join("\n")
    );
  });

  test("should hand out copies of the history", async () => {
    const { agent } = agentWith([ANSWER_4]);
    await agent.task("hi");

    const copy = agent.getMessages();
    copy.push({ role: "user", content: "injected" });
    copy[0].content = "changed";

    expect(agent.getMessages()).toHaveLength(3);
    expect(agent.getMessages()[0].content).toBe(agent.systemPrompt);
  });

  test("should emit lifecycle events", async () => {
    const { agent } = agentWith([ADD, ANSWER_4]);
    await agent.task("What is 2+2?");

    const agentEvents = eventBus.history.filter((e) => e.type.startsWith("Agent"));
    expect(agentEvents.map((e) => e.type)).toEqual([
      "AgentStartEvent",
      "AgentStepEvent",
      "AgentStepEvent",
      "AgentFinishEvent",
    ]);
    expect(agentEvents[0].payload).toEqual({ agentId: "test-agent", task: "What is 2+2?", maxSteps: 10 });
    expect(agentEvents[3].payload).toMatchObject({ agentId: "test-agent", steps: 2, outcome: "answer" });
  });

  test("should trace the run through its logger", async () => {
    const lines: Array<Record<string, unknown>> = [];
    const log = new AgentLogger(eventBus, {
      level: "info",
      format: "json",
      destination: { write: (msg: string) => lines.push(JSON.parse(msg)) },
    });
    const transport = new ScriptedTransport(eventBus, [ADD, ANSWER_4]);
    const agent = new Agent({ id: "traced", model: "m", transport, tools: [calculatorTool] }, eventBus, log);

    await agent.task("What is 2+2?");
    log.dispose();

    const summary = lines.find((l) => l.type === "agent_execution");
    expect(summary).toMatchObject({ agentId: "traced", task: "What is 2+2?", steps: 2, outcome: "answer" });
  });

  test("should generate an id when none is given", () => {
    const transport = new ScriptedTransport(eventBus, []);
    const agent = new Agent({ model: "m", transport }, eventBus);
    expect(agent.id).toMatch(/^agent-[0-9A-Z]{26}$/);
  });
});
