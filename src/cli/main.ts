import { Command } from "commander";
import {
  configuredQuoteProviders,
  createMailingRuntime,
  createQuoteRuntime,
  resolveQuoteSources,
} from "../application/bootstrap/runtimeFactory";
import type { ComparisonRequest } from "../application/services/priceComparisonService";
import type { NormalizedQuote } from "../core/entities/quote";
import {
  BullMqNewsletterScheduler,
  redisConfigFromUrl,
} from "../infra/queue/newsletterQueue";
import {
  appCryptoSymbols,
  appSymbols,
  env,
  fallbackQuoteProvider,
  parseSymbolList,
  primaryQuoteProvider,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { formatComparisonReport, formatQuoteReport } from "./reports";

type SymbolOptions = { symbols?: string; crypto?: string };

const stockSymbolsFrom = (opts: SymbolOptions): string[] =>
  opts.symbols === undefined ? appSymbols() : parseSymbolList(opts.symbols);

const cryptoSymbolsFrom = (opts: SymbolOptions): string[] =>
  opts.crypto === undefined ? appCryptoSymbols() : parseSymbolList(opts.crypto);

/**
 * Runs a mailing-list command and always releases the Postgres pool.
 */
const withMailingRuntime = async (
  action: (runtime: ReturnType<typeof createMailingRuntime>) => Promise<void>,
): Promise<void> => {
  const runtime = createMailingRuntime();
  try {
    await action(runtime);
  } finally {
    await runtime.close();
  }
};

/**
 * Defines a single command surface so every command goes through the same resilience policies.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("market-digest")
    .description("Market quotes and weekly newsletter CLI");

  cli
    .command("quotes")
    .description("Fetch quotes with retries and provider fallback")
    .option("--symbols <list>", "Comma-separated stock tickers")
    .option("--crypto <list>", "Comma-separated crypto tickers")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: SymbolOptions & { prettify?: boolean }) => {
      const { fetcher } = createQuoteRuntime();
      const quotes: NormalizedQuote[] = [];

      const batches = [
        { assetClass: "stock", symbols: stockSymbolsFrom(opts) },
        { assetClass: "crypto", symbols: cryptoSymbolsFrom(opts) },
      ] as const;

      for (const batch of batches) {
        if (batch.symbols.length === 0) continue;

        const sources = resolveQuoteSources(batch.assetClass);
        const results = await fetcher.fetchBatch({
          entityKeys: batch.symbols,
          primary: sources.primary,
          fallback: sources.fallback,
          rateLimitDelayMs: env.FETCH_RATE_LIMIT_DELAY_MS,
          continueOnFailure: env.FETCH_CONTINUE_ON_FAILURE,
        });
        quotes.push(...results.values());
      }

      fetcher.logSummary();

      if (opts.prettify) {
        console.log(
          formatQuoteReport(
            quotes,
            fetcher.getFailures(),
            fetcher.getStats(),
            fetcher.getSuccessRate(),
          ),
        );
      } else {
        logger.info(
          {
            quotes: quotes.map(({ rawPayload: _raw, ...quote }) => quote),
            failures: fetcher.getFailures(),
          },
          "Quotes fetched",
        );
      }

      if (fetcher.hasFailures()) {
        process.exitCode = 1;
      }
    });

  cli
    .command("compare")
    .description("Query every configured provider once and compare prices")
    .option("--symbols <list>", "Comma-separated stock tickers")
    .option("--crypto <list>", "Comma-separated crypto tickers")
    .option("--stocks-only", "Skip crypto symbols")
    .option("--crypto-only", "Skip stock symbols")
    .action(
      async (
        opts: SymbolOptions & { stocksOnly?: boolean; cryptoOnly?: boolean },
      ) => {
        if (opts.stocksOnly && opts.cryptoOnly) {
          throw new Error("--stocks-only and --crypto-only cannot be combined.");
        }

        const { comparisonService } = createQuoteRuntime();
        const requests: ComparisonRequest[] = [];

        if (!opts.cryptoOnly) {
          const providers = configuredQuoteProviders("stock");
          stockSymbolsFrom(opts).forEach((symbol) =>
            requests.push({ symbol, assetClass: "stock", providers }),
          );
        }

        if (!opts.stocksOnly) {
          const providers = configuredQuoteProviders("crypto");
          cryptoSymbolsFrom(opts).forEach((symbol) =>
            requests.push({ symbol, assetClass: "crypto", providers }),
          );
        }

        const report = await comparisonService.compareAll(requests);
        console.log(formatComparisonReport(report));
      },
    );

  cli
    .command("subscribe")
    .description("Add an email address to the mailing list")
    .requiredOption("--email <email>", "Subscriber email address")
    .action(async (opts: { email: string }) => {
      await withMailingRuntime(async ({ subscriptions }) => {
        const result = await subscriptions.subscribe(opts.email);
        if (result.isErr()) {
          logger.error({ error: result.error }, "Subscribe failed");
          process.exitCode = 1;
          return;
        }

        console.log(result.value.message);
      });
    });

  cli
    .command("unsubscribe")
    .description("Deactivate an email address on the mailing list")
    .requiredOption("--email <email>", "Subscriber email address")
    .action(async (opts: { email: string }) => {
      await withMailingRuntime(async ({ subscriptions }) => {
        const result = await subscriptions.unsubscribe(opts.email);
        if (result.isErr()) {
          logger.error({ error: result.error }, "Unsubscribe failed");
          process.exitCode = 1;
          return;
        }

        console.log(result.value.message);
      });
    });

  const newsletter = cli
    .command("newsletter")
    .description("Send or schedule the weekly newsletter");

  newsletter
    .command("send")
    .description("Send the weekly newsletter to every active subscriber now")
    .action(async () => {
      await withMailingRuntime(async ({ createNewsletterService }) => {
        const summary = await createNewsletterService().sendWeekly();
        logger.info({ summary }, "Newsletter run finished");

        if (summary.status === "error" || summary.failed > 0) {
          process.exitCode = 1;
        }
      });
    });

  newsletter
    .command("schedule")
    .description("Register the weekly newsletter job with the worker queue")
    .option("--cron <pattern>", "Cron pattern in UTC", env.NEWSLETTER_CRON)
    .option("--now", "Also enqueue one send immediately")
    .action(async (opts: { cron: string; now?: boolean }) => {
      const scheduler = new BullMqNewsletterScheduler(
        redisConfigFromUrl(env.REDIS_URL),
      );
      try {
        await scheduler.scheduleWeekly(opts.cron);
        if (opts.now) {
          await scheduler.enqueueNow();
        }
        logger.info(
          { cron: opts.cron, enqueuedNow: Boolean(opts.now) },
          "Weekly newsletter scheduled",
        );
      } finally {
        await scheduler.close();
      }
    });

  cli
    .command("status")
    .description("Report provider configuration and newsletter queue state")
    .action(async () => {
      const scheduler = new BullMqNewsletterScheduler(
        redisConfigFromUrl(env.REDIS_URL),
      );
      try {
        const queueCounts = await scheduler.getQueueCounts();

        logger.info(
          {
            symbols: appSymbols(),
            cryptoSymbols: appCryptoSymbols(),
            primaryProvider: primaryQuoteProvider(),
            fallbackProvider: fallbackQuoteProvider() ?? "none",
            apiKeysConfigured: {
              alphavantage: env.ALPHA_VANTAGE_API_KEY.trim().length > 0,
              finnhub: env.FINNHUB_API_KEY.trim().length > 0,
              marketstack: env.MARKETSTACK_API_KEY.trim().length > 0,
              brevo: env.BREVO_API_KEY.trim().length > 0,
            },
            retry: {
              maxRetries: env.FETCH_MAX_RETRIES,
              backoffBase: env.FETCH_BACKOFF_BASE,
              initialDelayMs: env.FETCH_INITIAL_DELAY_MS,
              timeoutMs: env.FETCH_TIMEOUT_MS,
            },
            newsletterCron: env.NEWSLETTER_CRON,
            redis: env.REDIS_URL,
            postgres: env.POSTGRES_URL,
            queueCounts,
            startupWorkflow: [
              "npm run db:generate && npm run db:migrate",
              "npm run worker",
              "npm run cli -- newsletter schedule",
            ],
          },
          "Runtime status",
        );
      } finally {
        await scheduler.close();
      }
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
