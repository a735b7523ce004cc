import { describe, it, expect } from "vitest";
import {
  MACRO_KEY_HOLD_MS,
  createAction,
  createActionEvent,
  keyAction,
  keyEvent,
  sequenceAction,
  serializeAction,
  shellAction,
  shellEvent,
} from "../../src/rules/action.js";

// ═════════════════════════════════════════════════════════════════════════
// SIMPLE (KEYS) MODE
// ═════════════════════════════════════════════════════════════════════════

describe("serializeAction — keys", () => {
  it("serializes a single key without a hold field", () => {
    expect(serializeAction(keyAction("a"))).toEqual([{ key_code: "a" }]);
  });

  it("serializes a key list in order with a 20 ms hold on every key", () => {
    expect(MACRO_KEY_HOLD_MS).toBe(20);
    expect(serializeAction(keyAction(["a", "b", "c"]))).toEqual([
      { key_code: "a", hold_down_milliseconds: 20 },
      { key_code: "b", hold_down_milliseconds: 20 },
      { key_code: "c", hold_down_milliseconds: 20 },
    ]);
  });

  it("applies modifiers to every key of the list", () => {
    expect(serializeAction(keyAction(["l", "c", "escape"], ["left_command"]))).toEqual([
      { key_code: "l", modifiers: ["left_command"], hold_down_milliseconds: 20 },
      { key_code: "c", modifiers: ["left_command"], hold_down_milliseconds: 20 },
      { key_code: "escape", modifiers: ["left_command"], hold_down_milliseconds: 20 },
    ]);
  });

  it("keeps duplicates and does not hold a one-element list", () => {
    expect(serializeAction(keyAction(["c", "c"]))).toHaveLength(2);
    expect(serializeAction(keyAction(["x"]))).toEqual([{ key_code: "x" }]);
  });

  it("classifies mouse buttons in the output", () => {
    expect(serializeAction(keyAction("button2"))).toEqual([{ pointing_button: "button2" }]);
  });
});

// ═════════════════════════════════════════════════════════════════════════
// SEQUENCE MODE
// ═════════════════════════════════════════════════════════════════════════

describe("serializeAction — sequence", () => {
  it("emits one descriptor per event, keeping per-event modifiers and holds", () => {
    const action = sequenceAction([
      keyEvent("f", ["left_shift"]),
      keyEvent("p", [], 50),
      shellEvent("say done"),
    ]);
    expect(serializeAction(action)).toEqual([
      { key_code: "f", modifiers: ["left_shift"] },
      { key_code: "p", hold_down_milliseconds: 50 },
      { shell_command: "say done" },
    ]);
  });

  it("does not add the macro hold to sequence events", () => {
    const action = sequenceAction([keyEvent("spacebar"), keyEvent("f"), keyEvent("r")]);
    expect(serializeAction(action)).toEqual([
      { key_code: "spacebar" },
      { key_code: "f" },
      { key_code: "r" },
    ]);
  });

  it("classifies mouse buttons inside sequence events", () => {
    const action = sequenceAction([keyEvent("button1"), keyEvent("a")]);
    expect(serializeAction(action)).toEqual([{ pointing_button: "button1" }, { key_code: "a" }]);
  });

  it("rejects a negative hold", () => {
    expect(() => keyEvent("a", [], -1)).toThrow(/non-negative integer/);
  });
});

describe("serializeAction — shell", () => {
  it("emits a single shell command descriptor", () => {
    expect(serializeAction(shellAction("open -a Notes"))).toEqual([
      { shell_command: "open -a Notes" },
    ]);
  });
});

// ═════════════════════════════════════════════════════════════════════════
// LOOSE INPUT
// ═════════════════════════════════════════════════════════════════════════

describe("createAction", () => {
  it("prefers shell_command over events and key_code", () => {
    const action = createAction({
      shellCommand: "echo hi",
      events: [{ keyCode: "a" }],
      keyCode: "b",
    });
    expect(action).toEqual({ kind: "shell", shellCommand: "echo hi" });
  });

  it("prefers events over key_code", () => {
    const action = createAction({ events: [{ keyCode: "a" }], keyCode: "b" });
    expect(action.kind).toBe("sequence");
    expect(serializeAction(action)).toEqual([{ key_code: "a" }]);
  });

  it("falls back to key_code when events is empty", () => {
    const action = createAction({ events: [], keyCode: "b", modifiers: ["left_command"] });
    expect(serializeAction(action)).toEqual([{ key_code: "b", modifiers: ["left_command"] }]);
  });

  it("rejects an action with no payload", () => {
    expect(() => createAction({})).toThrow(/needs a shell_command, events, or key_code/);
    expect(() => createAction({ keyCode: [] })).toThrow(/needs a shell_command/);
  });

  it("does not share the caller's arrays", () => {
    const keys = ["a", "b"];
    const action = createAction({ keyCode: keys });
    keys.push("c");
    expect(serializeAction(action)).toHaveLength(2);
  });
});

describe("createActionEvent", () => {
  it("prefers shell_command over key_code", () => {
    expect(createActionEvent({ shellCommand: "ls", keyCode: "a" })).toEqual({
      kind: "shell",
      shellCommand: "ls",
    });
  });

  it("defaults modifiers and hold", () => {
    expect(createActionEvent({ keyCode: "a" })).toEqual({
      kind: "key",
      keyCode: "a",
      modifiers: [],
      holdDownMilliseconds: 0,
    });
  });

  it("rejects an empty event", () => {
    expect(() => createActionEvent({})).toThrow(/needs a key_code or a shell_command/);
  });
});
