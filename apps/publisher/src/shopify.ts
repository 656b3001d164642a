import { getEnv } from "../../common/src/env.js";
import { normalizeError } from "../../common/src/errors.js";
import { logger } from "../../common/src/logger.js";

export interface ArticleDraft {
  title: string;
  bodyHtml: string;
  tags: string[];
  summary: string | null;
  author: string;
}

export type PublishArticleResult =
  | { success: true; externalId: string }
  | { success: false; error: string };

export interface Publisher {
  readonly name: string;
  publishArticle(article: ArticleDraft): Promise<PublishArticleResult>;
}

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface ShopifyPublisherOptions {
  storeUrl?: string;
  accessToken?: string;
  blogId?: string;
  apiVersion: string;
  fetch?: FetchLike;
}

function storeHost(storeUrl: string): string {
  return storeUrl.trim().replace(/^https?:\/\//i, "").replace(/\/+$/, "");
}

export function articlesEndpoint(storeUrl: string, apiVersion: string, blogId: string): string {
  return `https://${storeHost(storeUrl)}/admin/api/${apiVersion}/blogs/${encodeURIComponent(blogId)}/articles.json`;
}

function readArticleId(payload: unknown): string | null {
  if (typeof payload !== "object" || payload === null || !("article" in payload)) {
    return null;
  }
  const article = payload.article;
  if (typeof article !== "object" || article === null || !("id" in article)) {
    return null;
  }
  const id = article.id;
  return typeof id === "number" || typeof id === "string" ? String(id) : null;
}

export function createShopifyPublisher(options: ShopifyPublisherOptions): Publisher {
  const fetchImpl: FetchLike = options.fetch ?? ((input, init) => fetch(input, init));

  return {
    name: "shopify",
    async publishArticle(article) {
      const { storeUrl, accessToken, blogId } = options;
      if (!storeUrl || !accessToken || !blogId) {
        return {
          success: false,
          error:
            "shopify is not configured: SHOPIFY_STORE_URL, SHOPIFY_ACCESS_TOKEN and SHOPIFY_BLOG_ID are required",
        };
      }

      const url = articlesEndpoint(storeUrl, options.apiVersion, blogId);
      let response: Response;
      try {
        response = await fetchImpl(url, {
          method: "POST",
          headers: {
            "Content-Type": "application/json",
            "X-Shopify-Access-Token": accessToken,
          },
          body: JSON.stringify({
            article: {
              title: article.title,
              body_html: article.bodyHtml,
              tags: article.tags.join(", "),
              summary_html: article.summary ?? "",
              author: article.author,
              published: true,
            },
          }),
        });
      } catch (error) {
        return { success: false, error: `shopify request failed: ${normalizeError(error)}` };
      }

      const text = await response.text();
      if (!response.ok) {
        logger.warn("shopify rejected article", { status: response.status, title: article.title });
        return { success: false, error: `shopify ${response.status}: ${text}` };
      }

      let payload: unknown = null;
      try {
        payload = JSON.parse(text);
      } catch (error) {
        return {
          success: false,
          error: `shopify returned invalid JSON: ${normalizeError(error)}`,
        };
      }

      const externalId = readArticleId(payload);
      if (!externalId) {
        return { success: false, error: "shopify response did not include an article id" };
      }

      return { success: true, externalId };
    },
  };
}

export function createShopifyPublisherFromEnv(fetchImpl?: FetchLike): Publisher {
  const env = getEnv();
  return createShopifyPublisher({
    storeUrl: env.SHOPIFY_STORE_URL,
    accessToken: env.SHOPIFY_ACCESS_TOKEN,
    blogId: env.SHOPIFY_BLOG_ID,
    apiVersion: env.SHOPIFY_API_VERSION,
    fetch: fetchImpl,
  });
}
