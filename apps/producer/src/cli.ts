import { runMigration } from "../../../db/migrate.js";
import { logger } from "../../common/src/logger.js";
import { getCalendarConfig } from "../../planner/src/config.js";
import { formatDate } from "../../planner/src/calendar.js";
import { createDefaultGenerator } from "./generator.js";
import { generateForDate, generateWeekForInput } from "./producer.js";

function getArg(name: string): string | undefined {
  const index = process.argv.findIndex((arg) => arg === `--${name}`);
  if (index === -1) {
    return undefined;
  }
  return process.argv[index + 1];
}

function hasFlag(name: string): boolean {
  return process.argv.includes(`--${name}`);
}

async function main(): Promise<void> {
  const date = getArg("date") ?? formatDate(new Date());
  const weekly = hasFlag("weekly");

  await runMigration();

  const generator = createDefaultGenerator();
  const status = await generator.initialize();
  logger.info("producer starting", { date, weekly, mode: status.mode, model: status.model });

  const deps = { config: getCalendarConfig(), generator };
  const result = weekly
    ? await generateWeekForInput(date, deps)
    : await generateForDate(date, deps);

  if (!result.success) {
    throw new Error(result.error);
  }

  process.stdout.write(
    `${JSON.stringify(
      {
        mode: result.mode,
        weekId: result.weekId,
        date: result.date,
        season: result.season,
        theme: result.theme,
        holidays: result.holidays.map((holiday) => holiday.name),
        contentPieces: result.contentPieces,
        contentBreakdown: result.contentBreakdown,
        generationSource: result.generationSource,
        failedCount: result.failedCount,
      },
      null,
      2,
    )}\n`,
  );
}

main().catch((error) => {
  logger.error("producer failed", {
    message: error instanceof Error ? error.message : String(error),
  });
  process.exitCode = 1;
});
