import type {
  ContentType,
  Platform,
  PostType,
  Season,
} from "../../common/src/types.js";
import { titleCase } from "../../common/src/template.js";
import type { CalendarConfig, Weekday } from "../../planner/src/config.js";
import type { PlannedItem, WordCountBand } from "../../planner/src/plan.js";

export interface BrandVoice {
  name: string;
  voice: string;
  audience: string;
  products: string[];
}

export interface GenerationRequest {
  platform: Platform;
  contentType: ContentType;
  title: string;
  keywords: string[];
  season: Season;
  dayName: Weekday;
  theme: string;
  dailyTheme: string;
  holidayContext: string;
  postType: PostType | null;
  wordCount: WordCountBand;
  featuredProduct: string;
  brand: BrandVoice;
}

export const SELF_TEST_PROMPT = 'Reply with the single word "ready".';

export function requestFromPlannedItem(
  config: CalendarConfig,
  item: PlannedItem,
): GenerationRequest {
  return {
    platform: item.platform,
    contentType: item.contentType,
    title: item.title,
    keywords: [...item.keywords],
    season: item.context.season,
    dayName: item.context.dayName,
    theme: item.context.theme,
    dailyTheme: item.context.dailyTheme,
    holidayContext: item.holidayContext,
    postType: item.context.postType,
    wordCount: item.context.wordCount,
    featuredProduct: item.context.featuredProduct,
    brand: {
      name: config.brand.name,
      voice: config.brand.voice,
      audience: config.brand.audience,
      products: [...config.brand.products],
    },
  };
}

function formatInstructions(request: GenerationRequest): string[] {
  switch (request.platform) {
    case "blog":
      return [
        "Write the article as clean HTML suitable for a storefront blog (h1, h2, p, ul, li, strong, em).",
        "Start with an h1 holding the title, then 3-4 h2 sections, an introduction and a conclusion with a call to action.",
        `Use the primary keyword "${request.keywords[0] ?? request.season}" 5-7 times and work in the secondary keywords naturally.`,
      ];
    case "youtube":
      return [
        "Write a 60-minute video outline in plain text with timestamped sections and bullet points.",
        "Finish with a short list of resources mentioned.",
      ];
    case "tiktok":
      return [
        "Write a 60-second video script in plain text with HOOK (0-3s), CONTENT (3-45s) and CALL TO ACTION (45-60s) blocks, plus short visual notes.",
      ];
    case "linkedin":
      return [
        "Write a professional LinkedIn post in plain text for growers and agriculture professionals.",
        "End with a question that invites discussion.",
      ];
    case "instagram":
    case "facebook":
      return [
        `Write a single ${titleCase(request.platform)} post in plain text.`,
        `Post type: ${titleCase(request.postType ?? "educational_tip")}.`,
        "Do not include hashtags; they are added separately.",
      ];
  }
}

/** Input of `prompts/content.prompt`; every field is rendered verbatim. */
export interface ContentPromptInput {
  brandName: string;
  brandVoice: string;
  audience: string;
  title: string;
  platform: Platform;
  season: Season;
  dayName: string;
  dailyTheme: string;
  theme: string;
  holidayContext: string;
  keywords: string;
  minWords: number;
  maxWords: number;
  products: string;
  featuredProduct: string;
  instructions: string;
}

export const CONTENT_PROMPT_NAME = "content";

export function contentPromptInput(request: GenerationRequest): ContentPromptInput {
  return {
    brandName: request.brand.name,
    brandVoice: request.brand.voice,
    audience: request.brand.audience,
    title: request.title,
    platform: request.platform,
    season: request.season,
    dayName: request.dayName,
    dailyTheme: request.dailyTheme,
    theme: request.theme,
    holidayContext: request.holidayContext,
    keywords: request.keywords.join(", "),
    minWords: request.wordCount.min,
    maxWords: request.wordCount.max,
    products: request.brand.products.join(", "),
    featuredProduct: request.featuredProduct,
    instructions: formatInstructions(request).join("\n"),
  };
}
