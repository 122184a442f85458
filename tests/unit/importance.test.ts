import { describe, it, expect } from "vitest";
import { LlmImportanceAssessor, parseImportance } from "../../src/importance.js";
import { CompletionError } from "../../src/errors.js";
import { createMockCompletion } from "../helpers/mock-completion.js";

describe("parseImportance", () => {
  it("reads a bare number", () => {
    expect(parseImportance("0.75")).toBe(0.75);
  });

  it("reads the first number in a chatty reply", () => {
    expect(parseImportance("Score: 0.8 (out of 1)")).toBe(0.8);
  });

  it("accepts the bounds", () => {
    expect(parseImportance("0")).toBe(0);
    expect(parseImportance("1")).toBe(1);
  });

  it("rejects a reply without a number", () => {
    expect(() => parseImportance("very important")).toThrow(
      "Could not read an importance score from: very important",
    );
  });

  it("rejects a score outside [0,1]", () => {
    expect(() => parseImportance("7.5")).toThrow("Importance score 7.5 is outside [0,1]");
    expect(() => parseImportance("-0.2")).toThrow(CompletionError);
  });
});

describe("LlmImportanceAssessor", () => {
  it("asks with a low temperature and a short token budget", async () => {
    const client = createMockCompletion(["0.9"]);
    const assessor = new LlmImportanceAssessor(client);

    await expect(assessor.assess("User prefers dark mode")).resolves.toBe(0.9);

    const [call] = client.complete.mock.calls;
    expect(call[0].temperature).toBe(0.3);
    expect(call[0].maxTokens).toBe(16);
    expect(call[0].prompt).toContain("User prefers dark mode");
  });

  it("honours explicit options", async () => {
    const client = createMockCompletion(["0.1"]);
    await new LlmImportanceAssessor(client, { temperature: 0, maxTokens: 4 }).assess("x");
    expect(client.complete.mock.calls[0][0]).toMatchObject({ temperature: 0, maxTokens: 4 });
  });

  it("propagates a failed completion", async () => {
    const client = createMockCompletion([new Error("endpoint down")]);
    await expect(new LlmImportanceAssessor(client).assess("x")).rejects.toThrow("endpoint down");
  });
});
