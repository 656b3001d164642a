const MAX_HANDLE_LENGTH = 255;

/** URL handle for a storefront article: "Spring Tips & Tricks!" becomes "spring-tips-tricks". */
export function toHandle(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^a-z0-9\s-]/g, "")
    .trim()
    .replace(/\s+/g, "-")
    .replace(/-{2,}/g, "-")
    .replace(/^-+|-+$/g, "")
    .slice(0, MAX_HANDLE_LENGTH)
    .replace(/-+$/, "");
}
