import { describe, it, expect, beforeEach, afterEach } from "vitest";
import prompts from "prompts";
import {
  PromptCancelledError,
  promptSelect,
  promptText,
} from "../prompt-utils";

describe("prompt-utils", () => {
  const originalIsTTY = process.stdout.isTTY;

  beforeEach(() => {
    process.stdout.isTTY = true;
  });

  afterEach(() => {
    process.stdout.isTTY = originalIsTTY;
  });

  describe("promptText", () => {
    it("should return the answer", async () => {
      prompts.inject(["test-identity"]);
      await expect(promptText("Identity")).resolves.toBe("test-identity");
    });

    it("should return undefined without a terminal", async () => {
      process.stdout.isTTY = false;
      await expect(promptText("Identity")).resolves.toBeUndefined();
    });

    it("should throw when the prompt is cancelled", async () => {
      prompts.inject([new Error("cancelled")]);
      await expect(promptText("Identity")).rejects.toBeInstanceOf(
        PromptCancelledError,
      );
    });
  });

  describe("promptSelect", () => {
    it("should return the chosen value", async () => {
      prompts.inject(["flac"]);
      await expect(
        promptSelect("Format", ["mp3", "flac"] as const),
      ).resolves.toBe("flac");
    });

    it("should throw when the prompt is cancelled", async () => {
      prompts.inject([new Error("cancelled")]);
      await expect(
        promptSelect("Format", ["mp3", "flac"] as const),
      ).rejects.toThrow("Cancelled");
    });
  });
});
