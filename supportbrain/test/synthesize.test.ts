import { describe, expect, it } from "vitest";

import { GenerationUnavailableError } from "../src/errors.js";
import { assembleContext } from "../src/rag/context.js";
import {
  GENERATION_UNAVAILABLE_ANSWER,
  NO_INFORMATION_ANSWER,
  citedSources,
  extractCategoryLine,
  suggestCategory,
  synthesizeAnswer
} from "../src/rag/synthesize.js";
import { ScriptedGenerator, structuredHit, testSettings, vectorHit } from "./helpers.js";

const settings = testSettings();
const options = (generator: ScriptedGenerator) => ({
  generator,
  tuning: settings.answer,
  systemPrompt: "You answer help desk questions."
});

const ticket = structuredHit("T-1", 0.8, "Reinstall the printer driver.", { category: "Printing" });
const guide = vectorHit("doc_guide", 0.6, "Printers are listed under Devices.", { title: "guide.md" });

describe("synthesizeAnswer", () => {
  it("answers without calling the generator when there is no context", async () => {
    const generator = new ScriptedGenerator("should not be used");
    for (const question of ["", "How do I reset my VPN token?"]) {
      const result = await synthesizeAnswer(question, assembleContext([], [], 1000), options(generator));
      expect(result).toMatchObject({
        answer: NO_INFORMATION_ANSWER,
        confidence: 0,
        sources: [],
        status: "no-information",
        suggestedCategory: null
      });
    }
    expect(generator.prompts).toEqual([]);
  });

  it("cites referenced sources and takes an explicit category line", async () => {
    const generator = new ScriptedGenerator("Reinstall the driver [S1].\nCategory: Printing");
    const result = await synthesizeAnswer(
      "The printer is not found, please help",
      assembleContext([guide], [ticket], 1000),
      options(generator)
    );

    expect(result.answer).toBe("Reinstall the driver [S1].");
    expect(result.status).toBe("answered");
    expect(result.sources).toEqual([{ ...ticket, label: "S1" }]);
    expect(result.suggestedCategory).toBe("Printing");
    expect(result.confidence).toBe(0.69);
    expect(result.suggestedActions).toEqual([
      "Create a support ticket if the suggested solutions don't resolve your issue",
      "Check the resolution steps from similar tickets: T-1"
    ]);
  });

  it("builds the prompt from the question and labelled context", async () => {
    const generator = new ScriptedGenerator("See [S2].");
    await synthesizeAnswer("Where are printers listed?", assembleContext([guide], [ticket], 1000), options(generator));

    const [prompt] = generator.prompts;
    expect(prompt?.system).toBe("You answer help desk questions.");
    expect(prompt?.user).toContain("Question:\nWhere are printers listed?\n\nContext:\n[S1] SOURCE: ticket T-1: Ticket T-1");
    expect(prompt?.user).toContain("[S2] SOURCE: document guide.md (document)");
    expect(prompt?.user).toContain("Answer only from the context above.");
  });

  it("lowers confidence for uncertain answers and OCR sources", async () => {
    const scan = vectorHit("doc_scan", 0.5, "Error 0x5", {
      title: "dialog.png",
      label: "ocr-block",
      extractionConfidence: 0.5
    });
    const generator = new ScriptedGenerator("There is insufficient information in the available sources.");
    const result = await synthesizeAnswer(
      "What does error 0x5 mean?",
      assembleContext([scan], [], 1000),
      options(generator)
    );

    expect(result.confidence).toBe(0.056);
    expect(result.sources.map((s) => s.label)).toEqual(["S1"]);
    expect(result.suggestedCategory).toBeNull();
    expect(result.suggestedActions).toEqual([
      "Create a support ticket if the suggested solutions don't resolve your issue",
      "Open the source documents: dialog.png",
      "Escalate to a support agent, the available sources do not fully answer the question"
    ]);
  });

  it("falls back to the retrieved sources when generation is unavailable", async () => {
    const generator = new ScriptedGenerator(new GenerationUnavailableError("model offline"));
    const result = await synthesizeAnswer(
      "Where are printers listed?",
      assembleContext([guide], [ticket], 1000),
      options(generator)
    );

    expect(result.status).toBe("generation-unavailable");
    expect(result.answer).toBe(GENERATION_UNAVAILABLE_ANSWER);
    expect(result.confidence).toBe(0);
    expect(result.sources.map((s) => [s.label, s.provenance.id])).toEqual([
      ["S1", "T-1"],
      ["S2", "doc_guide"]
    ]);
    expect(result.suggestedCategory).toBe("Printing");
  });

  it("propagates cancellation", async () => {
    const aborted = new Error("This operation was aborted");
    aborted.name = "AbortError";
    await expect(
      synthesizeAnswer("Where?", assembleContext([guide], [], 1000), options(new ScriptedGenerator(aborted)))
    ).rejects.toBe(aborted);
  });
});

describe("answer post-processing", () => {
  const sources = ["a", "b", "c"].map((id, i) => ({ ...vectorHit(id, 0.5, id), label: `S${i + 1}` }));

  it("resolves grouped and single citations", () => {
    expect(citedSources("Do this [S1, S3].", sources).map((s) => s.label)).toEqual(["S1", "S3"]);
    expect(citedSources("Only [S2]", sources).map((s) => s.label)).toEqual(["S2"]);
    expect(citedSources("Unknown [S9]", sources).map((s) => s.label)).toEqual(["S1", "S2", "S3"]);
  });

  it("strips the category line", () => {
    expect(extractCategoryLine("Answer [S1]\n**Category:** Network.")).toEqual({
      text: "Answer [S1]",
      category: "Network"
    });
    expect(extractCategoryLine("Answer\nCategory: none")).toEqual({ text: "Answer", category: null });
    expect(extractCategoryLine("Plain answer")).toEqual({ text: "Plain answer", category: null });
  });

  it("suggests the dominant ticket category only above the minimum share", () => {
    const hits = [
      structuredHit("T-1", 0.6, "a", { category: "Network" }),
      structuredHit("T-2", 0.3, "b", { category: "Printing" }),
      structuredHit("T-3", 0.1, "c")
    ];
    expect(suggestCategory(hits, 0.5)).toBe("Network");
    expect(suggestCategory(hits, 0.7)).toBeNull();
    expect(suggestCategory([vectorHit("d", 0.9, "d")], 0.1)).toBeNull();
  });
});
