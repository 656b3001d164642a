import { readFileSync } from "node:fs";
import { z } from "zod";
import { fillTemplate, titleCase, type TemplateValues } from "../../common/src/template.js";
import { WEEKDAYS } from "../../planner/src/config.js";
import type { GenerationDraft } from "./contract.js";
import { escapeHtml } from "./markdown.js";
import type { GenerationRequest } from "./prompt.js";

export const FALLBACK_QUALITY_SCORE = 82;

const TEMPLATE_PATH = new URL("../templates/fallback.json", import.meta.url);

const mediaList = z.array(z.string().min(1)).min(4).max(5);
const perSeason = <T extends z.ZodTypeAny>(value: T) =>
  z.object({ spring: value, summer: value, fall: value, winter: value });

const perPostType = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    educational_tip: value,
    product_spotlight: value,
    community_question: value,
    seasonal_advice: value,
    behind_scenes: value,
  });

const perWeekday = <T extends z.ZodTypeAny>(value: T) =>
  z.object({
    Monday: value,
    Tuesday: value,
    Wednesday: value,
    Thursday: value,
    Friday: value,
    Saturday: value,
    Sunday: value,
  });

const FallbackTemplatesSchema = z.object({
  blog: z.object({
    seasons: perSeason(
      z.object({
        intro: z.string(),
        why: z.string(),
        tasks: z.array(z.string()).min(1),
        challenge: z.string(),
      }),
    ),
    productBlurbs: z.record(z.string()),
    actionPlan: z.array(z.string()).min(1),
    closing: z.string(),
    summary: z.string(),
    media: mediaList,
  }),
  social: z.object({
    instagram: perPostType(z.string()),
    facebook: perPostType(z.string()),
    summary: z.string(),
    media: mediaList,
  }),
  tiktok: z.object({
    days: perWeekday(z.object({ hook: z.string(), content: z.string(), cta: z.string() })),
    tips: perSeason(z.string()),
    visualNotes: z.array(z.string()),
    summary: z.string(),
    media: mediaList,
  }),
  linkedin: z.object({
    openers: z.record(z.enum(WEEKDAYS), z.string()),
    defaultOpener: z.string(),
    seasonal: perSeason(z.string()),
    takeaways: z.array(z.string()),
    question: z.string(),
    summary: z.string(),
    media: mediaList,
  }),
  youtube: z.object({
    sections: z.array(z.object({ heading: z.string(), bullets: z.array(z.string()) })).min(1),
    summary: z.string(),
    media: mediaList,
  }),
});

export type FallbackTemplates = z.infer<typeof FallbackTemplatesSchema>;

let cachedTemplates: FallbackTemplates | null = null;

export function loadFallbackTemplates(): FallbackTemplates {
  if (cachedTemplates) {
    return cachedTemplates;
  }

  const raw: unknown = JSON.parse(readFileSync(TEMPLATE_PATH, "utf8"));
  cachedTemplates = FallbackTemplatesSchema.parse(raw);
  return cachedTemplates;
}

function templateValues(request: GenerationRequest): TemplateValues {
  const keyword = request.keywords[0] ?? "organic gardening";
  return {
    season: request.season,
    Season: titleCase(request.season),
    day: request.dayName,
    context: request.holidayContext,
    brand: request.brand.name,
    product: request.featuredProduct,
    theme: request.theme,
    dailyTheme: request.dailyTheme,
    keyword,
    Keyword: titleCase(keyword),
    title: request.title,
    platform: titleCase(request.platform),
    postType: titleCase(request.postType ?? "educational_tip").toLowerCase(),
  };
}

function escapeValues(values: TemplateValues): TemplateValues {
  return Object.fromEntries(
    Object.entries(values).map(([key, value]) => [key, escapeHtml(value)]),
  );
}

function fillAll(templates: readonly string[], values: TemplateValues): string[] {
  return templates.map((template) => fillTemplate(template, values));
}

function renderBlog(templates: FallbackTemplates, request: GenerationRequest, values: TemplateValues): string {
  const html = escapeValues(values);
  const seasonal = templates.blog.seasons[request.season];
  const products = request.brand.products
    .map((product) => {
      const blurb = templates.blog.productBlurbs[product];
      return blurb
        ? `<li><strong>${escapeHtml(product)}</strong> ${escapeHtml(blurb)}</li>`
        : `<li><strong>${escapeHtml(product)}</strong></li>`;
    })
    .join("\n");

  return [
    `<h1>${html.title}</h1>`,
    `<p>${fillTemplate(escapeHtml(seasonal.intro), html)}</p>`,
    `<h2>Understanding ${html.Keyword} for ${html.Season} Success</h2>`,
    `<p>${escapeHtml(seasonal.why)}</p>`,
    `<h2>Essential ${html.Season} Tasks</h2>`,
    `<ul>\n${seasonal.tasks.map((task) => `<li>${escapeHtml(task)}</li>`).join("\n")}\n</ul>`,
    `<h2>The ${html.brand} Approach</h2>`,
    `<ul>\n${products}\n</ul>`,
    `<h2>Solving Common ${html.Season} Challenges</h2>`,
    `<p>${escapeHtml(seasonal.challenge)}</p>`,
    `<h2>Your ${html.Season} Action Plan</h2>`,
    `<ol>\n${templates.blog.actionPlan.map((step) => `<li>${escapeHtml(step)}</li>`).join("\n")}\n</ol>`,
    `<p><strong>${fillTemplate(escapeHtml(templates.blog.closing), html)}</strong></p>`,
  ].join("\n");
}

function renderTiktok(templates: FallbackTemplates, request: GenerationRequest, values: TemplateValues): string {
  const day = templates.tiktok.days[request.dayName];
  const scriptValues = { ...values, tip: templates.tiktok.tips[request.season] };

  return [
    `TikTok Video Script - ${request.dayName} ${request.dailyTheme}`,
    "",
    "HOOK (0-3 seconds):",
    fillTemplate(day.hook, scriptValues),
    "",
    "CONTENT (3-45 seconds):",
    fillTemplate(day.content, scriptValues),
    "",
    "CALL TO ACTION (45-60 seconds):",
    fillTemplate(day.cta, scriptValues),
    "",
    "VISUAL NOTES:",
    ...templates.tiktok.visualNotes.map((note) => `- ${note}`),
  ].join("\n");
}

function renderLinkedin(templates: FallbackTemplates, request: GenerationRequest, values: TemplateValues): string {
  const opener = templates.linkedin.openers[request.dayName] ?? templates.linkedin.defaultOpener;
  const seasonal = templates.linkedin.seasonal[request.season];

  return [
    opener,
    "",
    seasonal,
    "",
    `Key takeaways from this ${request.season} season:`,
    ...templates.linkedin.takeaways.map((takeaway) => `• ${takeaway}`),
    "",
    fillTemplate(templates.linkedin.question, values),
  ].join("\n");
}

function renderYoutube(templates: FallbackTemplates, request: GenerationRequest, values: TemplateValues): string {
  const sections = templates.youtube.sections.flatMap((section) => [
    "",
    section.heading,
    ...fillAll(section.bullets, values).map((bullet) => `• ${bullet}`),
  ]);

  return [
    "YouTube Video Outline - 60 Minutes",
    `Title: ${request.title}`,
    ...sections,
    "",
    "RESOURCES MENTIONED:",
    ...request.brand.products.map((product) => `• ${request.brand.name} ${product}`),
    "",
    `KEYWORDS: ${request.keywords.join(", ")}`,
  ].join("\n");
}

function renderSocial(
  templates: FallbackTemplates,
  request: GenerationRequest,
  platform: "instagram" | "facebook",
  values: TemplateValues,
): string {
  const postType = request.postType ?? "educational_tip";
  return fillTemplate(templates.social[platform][postType], values);
}

/** Deterministic local rendering; the same request always yields the same draft. */
export function renderFallback(request: GenerationRequest): GenerationDraft {
  const templates = loadFallbackTemplates();
  const values = templateValues(request);

  switch (request.platform) {
    case "blog":
      return {
        body: renderBlog(templates, request, values),
        summary: fillTemplate(templates.blog.summary, values),
        mediaSuggestions: fillAll(templates.blog.media, values),
        qualityScore: FALLBACK_QUALITY_SCORE,
        source: "fallback",
      };
    case "instagram":
    case "facebook":
      return {
        body: renderSocial(templates, request, request.platform, values),
        summary: fillTemplate(templates.social.summary, values),
        mediaSuggestions: fillAll(templates.social.media, values),
        qualityScore: FALLBACK_QUALITY_SCORE,
        source: "fallback",
      };
    case "tiktok":
      return {
        body: renderTiktok(templates, request, values),
        summary: fillTemplate(templates.tiktok.summary, values),
        mediaSuggestions: fillAll(templates.tiktok.media, values),
        qualityScore: FALLBACK_QUALITY_SCORE,
        source: "fallback",
      };
    case "linkedin":
      return {
        body: renderLinkedin(templates, request, values),
        summary: fillTemplate(templates.linkedin.summary, values),
        mediaSuggestions: fillAll(templates.linkedin.media, values),
        qualityScore: FALLBACK_QUALITY_SCORE,
        source: "fallback",
      };
    case "youtube":
      return {
        body: renderYoutube(templates, request, values),
        summary: fillTemplate(templates.youtube.summary, values),
        mediaSuggestions: fillAll(templates.youtube.media, values),
        qualityScore: FALLBACK_QUALITY_SCORE,
        source: "fallback",
      };
  }
}
