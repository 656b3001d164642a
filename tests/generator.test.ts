import { describe, expect, it } from "vitest";
import { buildWeeklyPlan } from "../apps/planner/src/plan.js";
import { createContentGenerator, generateFallback } from "../apps/producer/src/generator.js";
import { requestFromPlannedItem, type GenerationRequest } from "../apps/producer/src/prompt.js";
import { day, fakeBackend, testConfig } from "./helpers.js";

const config = testConfig();
const plan = buildWeeklyPlan(config, day("2025-07-07"));

function requestAt(index: number): GenerationRequest {
  const item = plan.items[index];
  if (!item) {
    throw new Error(`no planned item at ${index}`);
  }
  return requestFromPlannedItem(config, item);
}

const blogRequest = requestAt(1);
const instagramRequest = requestAt(2);

describe("fallback generation", () => {
  it("renders a deterministic Instagram post", () => {
    const result = generateFallback(instagramRequest);

    expect(result.body).toBe(
      "Monday Garden Wisdom: here's a summer tip that transforms gardens. During summer, focus on soil health first and everything else follows. Ancient Soil gives plants the foundation they crave. What's your biggest summer gardening question?",
    );
    expect(result.summary).toBe("Summer Instagram post for Monday: Week Kickoff & Planning.");
    expect(result.qualityScore).toBe(82);
    expect(result.source).toBe("fallback");
    expect(result.mediaSuggestions).toHaveLength(4);
  });

  it("honours the output contract for every planned item", () => {
    for (const item of plan.items) {
      const result = generateFallback(requestFromPlannedItem(config, item));
      expect(result.body.length).toBeGreaterThan(0);
      expect(result.summary.length).toBeLessThanOrEqual(160);
      expect(result.mediaSuggestions.length).toBeGreaterThanOrEqual(1);
      expect(result.mediaSuggestions.length).toBeLessThanOrEqual(5);
    }
  });

  it("writes a structured blog article", () => {
    const result = generateFallback(blogRequest);

    expect(result.body.startsWith("<h1>Start Your Week Right: Essential Summer Garden Tasks</h1>")).toBe(true);
    expect(result.body).toContain("<h2>Understanding Garden Planning for Summer Success</h2>");
    expect(result.body).toContain("<h2>The Rootwell Approach</h2>");
    expect(result.mediaSuggestions).toHaveLength(5);
  });

  it("opens the YouTube outline with its running time", () => {
    const result = generateFallback(requestAt(0));
    expect(result.body.split("\n").slice(0, 2)).toEqual([
      "YouTube Video Outline - 60 Minutes",
      "Title: Complete Summer Garden Mastery: Summer Care Essentials (60-Min Deep Dive)",
    ]);
  });
});

describe("createContentGenerator", () => {
  it("stays on fallback without a backend", async () => {
    const generator = createContentGenerator({ backend: null, timeoutMs: 50, selfTest: true });

    expect(await generator.initialize()).toEqual({
      mode: "fallback",
      configured: false,
      selfTestPassed: false,
      model: null,
    });
    expect((await generator.generate(instagramRequest)).source).toBe("fallback");
  });

  it("uses the remote backend once the self-test passes", async () => {
    const backend = fakeBackend(async () =>
      JSON.stringify({
        content: "Mulch early and water deeply.",
        meta_description: "Summer mulching basics",
        image_suggestions: ["Mulched bed at sunrise"],
        quality_score: 91,
      }),
    );
    const generator = createContentGenerator({ backend, timeoutMs: 50, selfTest: true });

    expect((await generator.initialize()).mode).toBe("remote");
    expect(await generator.generate(instagramRequest)).toEqual({
      body: "Mulch early and water deeply.",
      summary: "Summer mulching basics",
      mediaSuggestions: ["Mulched bed at sunrise"],
      qualityScore: 91,
      source: "remote",
    });
    expect(backend.calls).toEqual(["ping", `content:${instagramRequest.title}`]);
  });

  it("scores remote content 90 when the model gives no estimate", async () => {
    const backend = fakeBackend(async () => JSON.stringify({ content: "Short post." }));
    const generator = createContentGenerator({ backend, timeoutMs: 50, selfTest: true });
    await generator.initialize();

    expect((await generator.generate(instagramRequest)).qualityScore).toBe(90);
  });

  it("skips the self-test when it is disabled", async () => {
    const backend = fakeBackend(async () => "unused");
    const generator = createContentGenerator({ backend, timeoutMs: 50, selfTest: false });

    const status = await generator.initialize();
    expect(status).toEqual({ mode: "remote", configured: true, selfTestPassed: true, model: "fake-model" });
    expect(backend.calls).toEqual([]);
  });

  it("stays on fallback when the self-test fails", async () => {
    const generator = createContentGenerator({
      backend: {
        name: "broken-model",
        async ping() {
          throw new Error("connection refused");
        },
        async generateContent() {
          throw new Error("connection refused");
        },
      },
      timeoutMs: 50,
      selfTest: true,
    });

    expect(await generator.initialize()).toEqual({
      mode: "fallback",
      configured: true,
      selfTestPassed: false,
      model: "broken-model",
    });
    expect((await generator.generate(blogRequest)).source).toBe("fallback");
  });

  it.each([
    ["a transport error", () => Promise.reject(new Error("socket hang up"))],
    ["an empty reply", () => Promise.resolve("   ")],
    ["a timeout", () => new Promise<string>(() => undefined)],
  ])("falls back for one request on %s", async (_label, reply) => {
    const backend = fakeBackend(reply);
    const generator = createContentGenerator({ backend, timeoutMs: 20, selfTest: true });
    await generator.initialize();

    const result = await generator.generate(instagramRequest);
    expect(result).toEqual(generateFallback(instagramRequest));
    expect(generator.status().mode).toBe("remote");
  });
});
