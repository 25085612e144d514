import { Queue, type WorkerOptions, Worker } from "bullmq";
import type { RedisOptions } from "ioredis";
import type { NewsletterSchedulerPort } from "../../core/ports/outboundPorts";

/**
 * Uses a hyphen-only queue name because BullMQ uses colon as an internal Redis key separator.
 */
export const NEWSLETTER_QUEUE_NAME = "newsletter-weekly";

const WEEKLY_SCHEDULE_ID = "weekly-newsletter";

export type NewsletterJobPayload = {
  trigger: "schedule" | "manual";
  requestedAt: string;
};

export type NewsletterQueueCounts = {
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
};

// Delivery retries live inside the job; a failed job is retried once as a whole.
export const newsletterJobOptions = {
  attempts: 2,
  removeOnComplete: 50,
  removeOnFail: 100,
  backoff: {
    type: "exponential",
    delay: 60_000,
  },
} as const;

/**
 * Parses a redis:// URL into the connection options BullMQ hands to ioredis.
 */
export const redisConfigFromUrl = (url: string): RedisOptions => {
  const parsed = new URL(url);
  return {
    host: parsed.hostname,
    port: Number(parsed.port || 6379),
    username: parsed.username || undefined,
    password: parsed.password || undefined,
    maxRetriesPerRequest: null,
  };
};

/**
 * Wraps BullMQ so the CLI depends on scheduling intent rather than queue vendor details.
 */
export class BullMqNewsletterScheduler implements NewsletterSchedulerPort {
  private readonly queue: Queue<NewsletterJobPayload>;

  constructor(
    connection: RedisOptions,
    private readonly now: () => Date = () => new Date(),
  ) {
    this.queue = new Queue<NewsletterJobPayload>(NEWSLETTER_QUEUE_NAME, {
      connection,
      defaultJobOptions: newsletterJobOptions,
    });
  }

  /**
   * Registers the repeatable weekly job under a fixed id so repeated calls keep a single schedule.
   */
  async scheduleWeekly(cron: string): Promise<void> {
    await this.queue.add(
      WEEKLY_SCHEDULE_ID,
      { trigger: "schedule", requestedAt: this.now().toISOString() },
      { repeat: { pattern: cron, tz: "UTC" }, jobId: WEEKLY_SCHEDULE_ID },
    );
  }

  async enqueueNow(): Promise<void> {
    await this.queue.add("manual-newsletter", {
      trigger: "manual",
      requestedAt: this.now().toISOString(),
    });
  }

  async getQueueCounts(): Promise<NewsletterQueueCounts> {
    const counts = await this.queue.getJobCounts(
      "waiting",
      "active",
      "completed",
      "failed",
      "delayed",
    );

    return {
      waiting: counts.waiting ?? 0,
      active: counts.active ?? 0,
      completed: counts.completed ?? 0,
      failed: counts.failed ?? 0,
      delayed: counts.delayed ?? 0,
    };
  }

  async close(): Promise<void> {
    await this.queue.close();
  }
}

/**
 * Consumes newsletter jobs one at a time; sends are never run in parallel.
 */
export const createNewsletterWorker = (
  connection: RedisOptions,
  processor: (payload: NewsletterJobPayload) => Promise<void>,
) => {
  const options: WorkerOptions = {
    connection,
    concurrency: 1,
  };

  return new Worker<NewsletterJobPayload>(
    NEWSLETTER_QUEUE_NAME,
    async (job) => {
      await processor(job.data);
    },
    options,
  );
};
