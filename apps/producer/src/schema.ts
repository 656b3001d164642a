import { z } from "genkit";

// Advisory fields never reject a reply: bad values read as absent.
const advisoryScore = z.unknown().transform((value): number | null => {
  const score = typeof value === "string" && value.trim() !== "" ? Number(value) : value;
  return typeof score === "number" && Number.isFinite(score) ? score : null;
});

const advisoryText = z.unknown().transform((value) => (typeof value === "string" ? value : null));

const suggestionList = z.unknown().transform((value): string[] => {
  if (typeof value === "string") {
    return value
      .split(/\s*\|\s*|\n+/)
      .map((entry) => entry.trim())
      .filter((entry) => entry.length > 0);
  }
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .filter((entry): entry is string => typeof entry === "string")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
});

export const RemoteContentSchema = z.object({
  content: z.string().trim().min(1),
  meta_description: advisoryText,
  image_suggestions: suggestionList,
  quality_score: advisoryScore,
});

export type RemoteContent = z.infer<typeof RemoteContentSchema>;
