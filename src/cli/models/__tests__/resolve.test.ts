import { describe, it, expect } from "vitest";
import { resolveModelName } from "../resolve.js";

const names = ["Mistral-7B-Instruct", "mistral-nemo", "qwen2-7b", "phi-3-mini"];

describe("resolveModelName", () => {
  it("should prefer a case-insensitive exact match", () => {
    expect(resolveModelName(names, "MISTRAL-NEMO")).toEqual({ kind: "exact", name: "mistral-nemo" });
  });

  it("should accept a unique substring", () => {
    expect(resolveModelName(names, "qwen")).toEqual({ kind: "substring", name: "qwen2-7b" });
  });

  it("should report every candidate when the substring is ambiguous", () => {
    expect(resolveModelName(names, "mistral")).toEqual({
      kind: "ambiguous",
      candidates: ["Mistral-7B-Instruct", "mistral-nemo"],
    });
  });

  it("should report no match", () => {
    expect(resolveModelName(names, "llama")).toEqual({ kind: "none" });
  });
});
