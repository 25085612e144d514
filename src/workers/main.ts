import { createMailingRuntime } from "../application/bootstrap/runtimeFactory";
import {
  createNewsletterWorker,
  redisConfigFromUrl,
} from "../infra/queue/newsletterQueue";
import { env } from "../shared/config/env";
import { logger, toErrorDetails } from "../shared/logger/logger";

const run = async (): Promise<void> => {
  const runtime = createMailingRuntime();
  const newsletterService = runtime.createNewsletterService();
  const startedAtByJobId = new Map<string, number>();

  logger.info(
    {
      brevoBaseUrl: env.BREVO_BASE_URL,
      brevoApiKeyConfigured: env.BREVO_API_KEY.trim().length > 0,
      newsletterCron: env.NEWSLETTER_CRON,
      redisUrl: env.REDIS_URL,
      postgresUrl: env.POSTGRES_URL,
    },
    "Worker runtime configuration",
  );

  const worker = createNewsletterWorker(
    redisConfigFromUrl(env.REDIS_URL),
    async (payload) => {
      const summary = await newsletterService.sendWeekly();
      logger.info({ trigger: payload.trigger, summary }, "Newsletter run finished");

      // Let BullMQ retry the job when the subscriber list itself was unreachable
      if (summary.status === "error") {
        throw new Error(summary.message);
      }
    },
  );

  worker.on("active", (job) => {
    if (!job.id) {
      return;
    }

    startedAtByJobId.set(job.id, Date.now());
    logger.info(
      { jobId: job.id, trigger: job.data.trigger, requestedAt: job.data.requestedAt },
      "Worker job started",
    );
  });

  worker.on("failed", (job, error) => {
    const startedAt = job?.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job?.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.error(
      {
        jobId: job?.id,
        trigger: job?.data.trigger,
        attemptsMade: job?.attemptsMade,
        durationMs,
        error: toErrorDetails(error),
      },
      "Worker job failed",
    );
  });

  worker.on("completed", (job) => {
    const startedAt = job.id ? startedAtByJobId.get(job.id) : undefined;
    const durationMs = startedAt ? Date.now() - startedAt : undefined;

    if (job.id) {
      startedAtByJobId.delete(job.id);
    }

    logger.info({ jobId: job.id, durationMs }, "Worker job completed");
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, "Worker shutting down");
    await worker.close();
    await runtime.close();
    process.exit(0);
  };

  for (const signal of ["SIGINT", "SIGTERM"] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error) => {
        logger.error({ error: toErrorDetails(error) }, "Worker shutdown failed");
        process.exit(1);
      });
    });
  }

  logger.info("Newsletter worker online");
};

run().catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "Worker bootstrap failed");
  process.exit(1);
});
