import "dotenv/config";

import { loadSchedulerConfig, type SchedulerConfig } from "./config/index.js";
import { logger } from "./logger.js";
import { runPostOnce } from "./runner.js";

export function currentDateParts(
  timezone: string,
  now: Date = new Date(),
): {
  dateKey: string;
  hour: number;
  minute: number;
} {
  const formatter = new Intl.DateTimeFormat("en-CA", {
    timeZone: timezone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  });

  const parts = formatter.formatToParts(now);
  const map = new Map(parts.map((item) => [item.type, item.value]));

  const year = map.get("year") ?? "0000";
  const month = map.get("month") ?? "01";
  const day = map.get("day") ?? "01";
  const hour = Number(map.get("hour") ?? "0");
  const minute = Number(map.get("minute") ?? "0");

  return {
    dateKey: `${year}-${month}-${day}`,
    hour,
    minute,
  };
}

/**
 * Slot keys (`date@HH:MM`) that are due at `now` and not yet in `done`.
 * A slot is due from its time until the end of that day.
 */
export function dueSlots(
  times: SchedulerConfig["times"],
  now: { dateKey: string; hour: number; minute: number },
  done: ReadonlySet<string>,
): string[] {
  return times
    .filter(
      (slot) => now.hour > slot.hour || (now.hour === slot.hour && now.minute >= slot.minute),
    )
    .map((slot) => `${now.dateKey}@${slot.label}`)
    .filter((key) => !done.has(key));
}

/** Drops slot keys from earlier days so the set only ever holds today's slots. */
export function pruneCompleted(done: Set<string>, dateKey: string): void {
  for (const key of done) {
    if (!key.startsWith(`${dateKey}@`)) {
      done.delete(key);
    }
  }
}

export async function runSchedulerDaemon(): Promise<void> {
  const scheduler = loadSchedulerConfig();

  logger.info(
    {
      timezone: scheduler.timezone,
      times: scheduler.times.map((slot) => slot.label),
      tickSeconds: scheduler.tickSeconds,
      runOnStart: scheduler.runOnStart,
    },
    "Scheduler daemon started",
  );

  let isRunning = false;
  const completed = new Set<string>();

  const markAllDue = (): void => {
    const now = currentDateParts(scheduler.timezone);
    pruneCompleted(completed, now.dateKey);
    for (const key of dueSlots(scheduler.times, now, completed)) {
      completed.add(key);
    }
  };

  const executeDueRun = async (): Promise<void> => {
    if (isRunning) {
      logger.warn("Skip scheduler tick because previous run is still in progress");
      return;
    }

    const now = currentDateParts(scheduler.timezone);
    pruneCompleted(completed, now.dateKey);
    const due = dueSlots(scheduler.times, now, completed);
    if (due.length === 0) {
      return;
    }

    isRunning = true;
    try {
      // Slots missed while the process was busy collapse into one run.
      await runPostOnce(`scheduled-${due[due.length - 1]}`);
    } catch (error) {
      logger.error({ err: error }, "Scheduled post run failed");
    } finally {
      for (const key of due) {
        completed.add(key);
      }
      isRunning = false;
    }
  };

  if (scheduler.runOnStart) {
    isRunning = true;
    try {
      await runPostOnce("startup");
    } catch (error) {
      logger.error({ err: error }, "Startup post run failed");
    } finally {
      markAllDue();
      isRunning = false;
    }
  } else {
    // Slots already past at boot belong to earlier runs.
    markAllDue();
  }

  setInterval(() => {
    void executeDueRun();
  }, scheduler.tickSeconds * 1000);

  await executeDueRun();
}

if (import.meta.url === `file://${process.argv[1]}`) {
  runSchedulerDaemon().catch((error) => {
    logger.error({ err: error }, "Scheduler daemon crashed");
    process.exit(1);
  });
}
