import { failure, normalizeError, type ServiceResult } from "../../common/src/errors.js";
import { checkTransition } from "../../common/src/lifecycle.js";
import { logger } from "../../common/src/logger.js";
import { getContentItem, updateContentStatus } from "../../common/src/repository.js";
import type { ContentItem, ContentStatus } from "../../common/src/types.js";
import type { Publisher } from "./shopify.js";

export interface PublishStore {
  getContentItem(id: string): Promise<ContentItem | null>;
  updateContentStatus(id: string, status: ContentStatus, updatedAt: Date): Promise<ContentItem | null>;
}

export interface PublishDeps {
  publisher: Publisher;
  author: string;
  store?: PublishStore;
  now?: () => Date;
}

const defaultStore: PublishStore = { getContentItem, updateContentStatus };

/**
 * Pushes a blog item to the storefront. A rejected publish leaves the stored
 * status untouched and returns the platform's message as the error.
 */
export async function publishContent(
  id: string,
  deps: PublishDeps,
): Promise<ServiceResult<{ item: ContentItem; externalId: string }>> {
  const store = deps.store ?? defaultStore;

  let item: ContentItem | null;
  try {
    item = await store.getContentItem(id);
  } catch (error) {
    return failure("persistence", `get content failed: ${normalizeError(error)}`);
  }
  if (!item) {
    return failure("not_found", `content not found: ${id}`);
  }

  if (item.platform !== "blog") {
    return failure("not_implemented", `publishing to ${item.platform} is not implemented`);
  }

  const check = checkTransition(item.status, "published");
  if (!check.allowed) {
    return failure("conflict", check.reason);
  }
  if (check.noop) {
    return failure("conflict", "content is already published");
  }

  const published = await deps.publisher.publishArticle({
    title: item.title,
    bodyHtml: item.body,
    tags: item.keywords,
    summary: item.summary,
    author: deps.author,
  });

  if (!published.success) {
    logger.warn("publish failed", { id, publisher: deps.publisher.name, error: published.error });
    return failure("upstream", published.error);
  }

  try {
    const updated = await store.updateContentStatus(id, "published", (deps.now ?? (() => new Date()))());
    if (!updated) {
      return failure("not_found", `content not found: ${id}`);
    }

    logger.info("content published", {
      id,
      publisher: deps.publisher.name,
      externalId: published.externalId,
    });
    return { success: true, item: updated, externalId: published.externalId };
  } catch (error) {
    const message = normalizeError(error);
    logger.error("publish status update failed", { id, externalId: published.externalId, error: message });
    return failure("persistence", `update status failed: ${message}`);
  }
}
