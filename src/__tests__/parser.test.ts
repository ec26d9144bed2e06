import { describe, expect, it } from "vitest";
import { detectAddress } from "../addressing";
import { createFullConfig } from "../config";
import { parseCommand } from "../parser";
import type { SanitizedText } from "../types";

const { addressing } = createFullConfig();

const text = (value: string): SanitizedText => ({
  body: value.trim(),
  commandLine: value.trim().replace(/\s+/g, " "),
});

describe("parseCommand", () => {
  it.each([
    ["@docbot update auth section", "update", "auth section"],
    ["@docbot clarify the intro paragraph", "clarify", "the intro paragraph"],
    ["@docbot expand installation steps", "expand", "installation steps"],
    ["@docbot fix the broken heading", "fix", "the broken heading"],
    ["@docbot add example for the login flow", "add_example", "for the login flow"],
    ["@docbot add a note about retries", "add_example", "a note about retries"],
    ["@docbot revert last change", "revert", "last change"],
  ])("parses %s", (comment, actionKind, target) => {
    expect(parseCommand(text(comment), addressing)).toEqual({
      ok: true,
      command: { actionKind, target, rawText: comment },
    });
  });

  it("matches the handle and keyword case-insensitively", () => {
    expect(parseCommand(text("@DOCBOT Update auth section"), addressing)).toEqual({
      ok: true,
      command: { actionKind: "update", target: "auth section", rawText: "@DOCBOT Update auth section" },
    });
  });

  it("accepts control verbs without a target", () => {
    expect(parseCommand(text("@docbot approve"), addressing)).toEqual({
      ok: true,
      command: { actionKind: "approve", target: "", rawText: "@docbot approve" },
    });
    expect(parseCommand(text("@docbot: reject!"), addressing)).toEqual({
      ok: true,
      command: { actionKind: "reject", target: "", rawText: "@docbot: reject!" },
    });
  });

  it("treats an unknown keyword as freeform with the whole remainder", () => {
    expect(parseCommand(text("@docbot please mention the new flag"), addressing)).toEqual({
      ok: true,
      command: {
        actionKind: "freeform",
        target: "please mention the new flag",
        rawText: "@docbot please mention the new flag",
      },
    });
  });

  it("maps the legacy prefix to freeform", () => {
    expect(parseCommand(text("DocSync: Mention the retry flag"), addressing)).toEqual({
      ok: true,
      command: {
        actionKind: "freeform",
        target: "Mention the retry flag",
        rawText: "DocSync: Mention the retry flag",
      },
    });
  });

  it("prefers the structured form when both appear", () => {
    const result = parseCommand(text("docsync: please @docbot approve"), addressing);
    expect(result.ok && result.command.actionKind).toBe("approve");
  });

  it("accepts the second handle", () => {
    const result = parseCommand(text("@docsync fix the heading"), addressing);
    expect(result.ok && result.command).toEqual({
      actionKind: "fix",
      target: "the heading",
      rawText: "@docsync fix the heading",
    });
  });

  it("keeps line breaks in rawText", () => {
    const result = parseCommand(text("@docbot expand the install section\nwith npm and yarn"), addressing);
    expect(result.ok && result.command).toEqual({
      actionKind: "expand",
      target: "the install section with npm and yarn",
      rawText: "@docbot expand the install section\nwith npm and yarn",
    });
  });

  it.each(["hello @docbot fix it", "@docbotter fix the heading", "@docbot", "just a comment"])(
    "rejects %s as not a command",
    (comment) => {
      expect(parseCommand(text(comment), addressing)).toEqual({ ok: false, rejection: "not_a_command" });
    }
  );
});

describe("detectAddress", () => {
  it("returns the remainder after the handle", () => {
    expect(detectAddress("@docbot expand installation steps", addressing)).toEqual({
      form: "structured",
      handle: "docbot",
      remainder: "expand installation steps",
    });
  });

  it("returns the remainder after the legacy prefix", () => {
    expect(detectAddress("docsync: hi", addressing)).toEqual({ form: "legacy", remainder: "hi" });
  });

  it("ignores comments that only mention the bot later on", () => {
    expect(detectAddress("thanks @docbot", addressing)).toBeNull();
  });
});
