import { describe, it, expect } from "vitest";
import { buildFromBlock } from "../../src/rules/from-block.js";
import { defineButton } from "../../src/rules/button.js";

describe("buildFromBlock", () => {
  it("builds a key_code trigger", () => {
    const config = defineButton({ buttonId: "1", behavior: "click", tapAction: { keyCode: "a" } });
    expect(buildFromBlock(config)).toEqual({ key_code: "1" });
  });

  it("builds a pointing_button trigger", () => {
    const config = defineButton({ buttonId: "button3", behavior: "modifier", layerVariable: "hyper" });
    expect(buildFromBlock(config)).toEqual({ pointing_button: "button3" });
  });

  it("builds a chord with classified members and fixed options", () => {
    const config = defineButton({ buttonId: ["button1", "2"], behavior: "simultaneous" });
    expect(buildFromBlock(config)).toEqual({
      simultaneous: [{ pointing_button: "button1" }, { key_code: "2" }],
      simultaneous_options: {
        key_down_order: "insensitive",
        detect_key_down_uninterruptedly: true,
      },
    });
  });

  it("attaches mandatory and optional modifiers", () => {
    const config = defineButton({
      buttonId: "4",
      behavior: "click",
      tapAction: { keyCode: "x" },
      mandatoryModifiers: ["left_control"],
      optionalModifiers: ["any"],
    });
    expect(buildFromBlock(config)).toEqual({
      key_code: "4",
      modifiers: { mandatory: ["left_control"], optional: ["any"] },
    });
  });

  it("omits the modifiers block when both lists are empty", () => {
    const config = defineButton({ buttonId: "4", behavior: "click", tapAction: { keyCode: "x" } });
    expect(buildFromBlock(config)).not.toHaveProperty("modifiers");
  });
});
