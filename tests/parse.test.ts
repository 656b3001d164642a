import { describe, expect, it } from "vitest";
import { parseRemoteResponse, type ShellContext } from "../apps/producer/src/parse.js";

const blogContext: ShellContext = {
  title: "Mulch Matters",
  season: "fall",
  brandName: "Rootwell",
  platform: "blog",
};

const socialContext: ShellContext = { ...blogContext, platform: "instagram" };

describe("parseRemoteResponse", () => {
  it("reads a fenced JSON object", () => {
    const raw = [
      "Here you go:",
      "```json",
      '{"content":"<h1>Hi</h1><p>Body</p>","meta_description":"Short meta","image_suggestions":"one | two","quality_score":"77"}',
      "```",
    ].join("\n");

    expect(parseRemoteResponse(raw, blogContext)).toEqual({
      stage: "json",
      body: "<h1>Hi</h1><p>Body</p>",
      summary: "Short meta",
      mediaSuggestions: ["one", "two"],
      qualityScore: 77,
    });
  });

  it("strips markup the storefront must not receive", () => {
    const raw = JSON.stringify({
      content: '<p>Safe</p><script>alert("x")</script>',
      image_suggestions: ["a"],
    });

    const parsed = parseRemoteResponse(raw, blogContext);
    expect(parsed.stage).toBe("json");
    expect(parsed.body).toBe("<p>Safe</p>");
    expect(parsed.summary).toBeNull();
    expect(parsed.qualityScore).toBeNull();
  });

  it("scrapes labelled lines when there is no JSON", () => {
    const raw = [
      "Meta description: Compost keeps soil alive",
      "Image: Hands holding compost",
      "Compost is the heart of the garden.",
    ].join("\n");

    expect(parseRemoteResponse(raw, socialContext)).toEqual({
      stage: "scrape",
      body: "Compost is the heart of the garden.",
      summary: "Compost keeps soil alive",
      mediaSuggestions: ["Hands holding compost"],
      qualityScore: null,
    });
  });

  it("wraps unstructured text in a minimal article shell", () => {
    const parsed = parseRemoteResponse("Just some plain words about mulch.", blogContext);

    expect(parsed).toEqual({
      stage: "shell",
      body: [
        "<h1>Mulch Matters</h1>",
        "<p>Just some plain words about mulch.</p>",
        "<p>Here's to a great fall in the garden from everyone at Rootwell.</p>",
      ].join("\n"),
      summary: null,
      mediaSuggestions: [],
      qualityScore: 85,
    });
  });

  it("falls through to the shell when the JSON is broken", () => {
    expect(parseRemoteResponse("{not json at all}", blogContext).stage).toBe("shell");
    expect(parseRemoteResponse('{"summary":"no content field"}', blogContext).stage).toBe("shell");
  });

  it("keeps a JSON reply whose advisory fields are malformed", () => {
    const nullMeta = JSON.stringify({
      content: "<p>Mulch early.</p>",
      meta_description: null,
      image_suggestions: ["Bed"],
      quality_score: 92,
    });
    expect(parseRemoteResponse(nullMeta, blogContext)).toEqual({
      stage: "json",
      body: "<p>Mulch early.</p>",
      summary: null,
      mediaSuggestions: ["Bed"],
      qualityScore: 92,
    });

    const oddScore = JSON.stringify({
      content: "<p>Mulch early.</p>",
      meta_description: 42,
      image_suggestions: ["Bed", 7, null, { url: "x" }, "  "],
      quality_score: "95/100",
    });
    expect(parseRemoteResponse(oddScore, blogContext)).toEqual({
      stage: "json",
      body: "<p>Mulch early.</p>",
      summary: null,
      mediaSuggestions: ["Bed"],
      qualityScore: null,
    });
  });

  it("still requires non-empty content", () => {
    expect(parseRemoteResponse('{"content":"   ","quality_score":80}', blogContext).stage).toBe("shell");
  });
});
