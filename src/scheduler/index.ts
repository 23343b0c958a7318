import cron, { type ScheduledTask as CronTask } from "node-cron";
import { logger } from "../logger";
import { errorMessage } from "../errors";
import { runScout, runSharedPool, type PipelineDeps } from "../pipeline";
import type { ScheduleConfig } from "../config";

export interface ScheduledJob {
  name: string;
  cronExpression: string;
  run: () => Promise<void>;
}

export interface Scheduler {
  start: () => void;
  stop: () => void;
  /** Runs a job now, honouring its overlap lock. Returns false if it was already running. */
  trigger: (name: string) => Promise<boolean>;
  jobs: readonly ScheduledJob[];
}

/** Pool refreshes and the owner's daily on-demand run. */
export function buildScheduledJobs(schedule: ScheduleConfig, deps: PipelineDeps): ScheduledJob[] {
  const jobs: ScheduledJob[] = schedule.poolRuns.map((cronExpression, i) => ({
    name: `pool-run-${i + 1}`,
    cronExpression,
    run: async () => {
      const summary = await runSharedPool(deps);
      logger.info(
        `[CRON] Pool run complete: ${summary.inserted} new, ${summary.matchesCreated} matches, ${summary.errors.length} errors`,
      );
    },
  }));

  if (deps.config.env.ownerUserId !== null) {
    jobs.push({
      name: "owner-scout",
      cronExpression: schedule.ownerScout,
      run: async () => {
        const summary = await runScout(null, deps);
        logger.info(
          `[CRON] Owner scout complete: fetched=${summary.totalFetched}, promoted=${summary.promotedToPipeline}, review=${summary.savedForReview}`,
        );
      },
    });
  } else {
    logger.warn("[CRON] OWNER_USER_ID not set — owner scout not scheduled");
  }

  return jobs;
}

export function createScheduler(jobs: ScheduledJob[], timezone: string): Scheduler {
  const running = new Set<string>();
  const tasks: CronTask[] = [];

  for (const job of jobs) {
    if (!cron.validate(job.cronExpression)) {
      throw new Error(`Invalid cron expression for ${job.name}: ${job.cronExpression}`);
    }
  }

  async function runGuarded(job: ScheduledJob): Promise<boolean> {
    if (running.has(job.name)) {
      logger.warn(`[LOCK] ${job.name} already running — skipping`);
      return false;
    }
    running.add(job.name);
    logger.info(`[CRON] Starting ${job.name}...`);
    try {
      await job.run();
    } catch (error) {
      logger.error(`[CRON] ${job.name} failed: ${errorMessage(error)}`);
    } finally {
      running.delete(job.name);
    }
    return true;
  }

  return {
    jobs,
    start: () => {
      logger.info("Starting scheduler...");
      for (const job of jobs) {
        tasks.push(
          cron.schedule(
            job.cronExpression,
            () => {
              void runGuarded(job);
            },
            { timezone },
          ),
        );
        logger.info(`  ✓ ${job.name}: ${job.cronExpression} (${timezone})`);
      }
      logger.info(`Scheduler started with ${jobs.length} jobs.`);
    },
    stop: () => {
      for (const task of tasks) task.stop();
      tasks.length = 0;
    },
    trigger: async (name) => {
      const job = jobs.find((j) => j.name === name);
      if (!job) throw new Error(`Unknown scheduled job: ${name}`);
      return runGuarded(job);
    },
  };
}
