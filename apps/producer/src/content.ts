import { failure, normalizeError, type ServiceResult } from "../../common/src/errors.js";
import { checkTransition } from "../../common/src/lifecycle.js";
import { logger } from "../../common/src/logger.js";
import {
  getContentItem,
  getWeeklyPackage,
  listContentByRange,
  listContentByWeek,
  updateContentStatus,
} from "../../common/src/repository.js";
import {
  CONTENT_STATUSES,
  isContentStatus,
  type ContentItem,
  type LocalDateTime,
  type WeeklyPackage,
} from "../../common/src/types.js";
import { parseRangeBound } from "../../planner/src/calendar.js";

function persistenceFailure(action: string, error: unknown) {
  const message = normalizeError(error);
  logger.error("content store call failed", { action, error: message });
  return failure("persistence", `${action} failed: ${message}`);
}

export async function findContent(id: string): Promise<ServiceResult<{ item: ContentItem }>> {
  try {
    const item = await getContentItem(id);
    if (!item) {
      return failure("not_found", `content not found: ${id}`);
    }
    return { success: true, item };
  } catch (error) {
    return persistenceFailure("get content", error);
  }
}

export async function findWeekContent(
  weekId: string,
): Promise<ServiceResult<{ items: ContentItem[]; weeklyPackage: WeeklyPackage | null }>> {
  try {
    const items = await listContentByWeek(weekId);
    const weeklyPackage = await getWeeklyPackage(weekId);
    return { success: true, items, weeklyPackage };
  } catch (error) {
    return persistenceFailure("list week content", error);
  }
}

export async function findContentInRange(
  startInput: string,
  endInput: string,
): Promise<ServiceResult<{ start: LocalDateTime; end: LocalDateTime; items: ContentItem[] }>> {
  const start = parseRangeBound(startInput, "start");
  const end = parseRangeBound(endInput, "end");
  if (!start || !end) {
    return failure("invalid_input", "start and end must be dates (YYYY-MM-DD or YYYY-MM-DDTHH:mm:ss)");
  }
  if (start > end) {
    return failure("invalid_input", "start must not be after end");
  }

  try {
    const items = await listContentByRange(start, end);
    return { success: true, start, end, items };
  } catch (error) {
    return persistenceFailure("list content range", error);
  }
}

/**
 * Applies a lifecycle move. Unknown names are input errors, disallowed moves
 * are conflicts, and re-applying the current status changes nothing.
 */
export async function changeContentStatus(
  id: string,
  statusName: unknown,
  now: Date = new Date(),
): Promise<ServiceResult<{ item: ContentItem; changed: boolean }>> {
  if (typeof statusName !== "string" || !isContentStatus(statusName)) {
    return failure(
      "invalid_input",
      `status must be one of: ${CONTENT_STATUSES.join(", ")}`,
    );
  }

  const found = await findContent(id);
  if (!found.success) {
    return found;
  }

  const check = checkTransition(found.item.status, statusName);
  if (!check.allowed) {
    return failure("conflict", check.reason);
  }
  if (check.noop) {
    return { success: true, item: found.item, changed: false };
  }

  try {
    const updated = await updateContentStatus(id, statusName, now);
    if (!updated) {
      return failure("not_found", `content not found: ${id}`);
    }
    logger.info("content status changed", { id, from: found.item.status, to: statusName });
    return { success: true, item: updated, changed: true };
  } catch (error) {
    return persistenceFailure("update status", error);
  }
}
