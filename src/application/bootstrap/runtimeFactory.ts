import type { AssetClass } from "../../core/entities/quote";
import type { QuoteProviderPort } from "../../core/ports/inboundPorts";
import { createDb } from "../../infra/db/client";
import { PostgresSubscriberRepository } from "../../infra/db/repositories";
import { BrevoMailer } from "../../infra/mail/brevoMailer";
import { AlphaVantageQuoteProvider } from "../../infra/providers/alphavantage/alphaVantageQuoteProvider";
import { FinnhubQuoteProvider } from "../../infra/providers/finnhub/finnhubQuoteProvider";
import { MarketstackQuoteProvider } from "../../infra/providers/marketstack/marketstackQuoteProvider";
import { MockQuoteProvider } from "../../infra/providers/mocks/mockQuoteProvider";
import { SystemClock, SystemSleeper } from "../../infra/system/systemPorts";
import { FileNewsletterTemplate } from "../../infra/templates/fileNewsletterTemplate";
import {
  env,
  fallbackQuoteProvider,
  primaryQuoteProvider,
  type QuoteProviderName,
} from "../../shared/config/env";
import { RateLimiter } from "../resilience/rateLimiter";
import { ResilientFetcher } from "../resilience/resilientFetcher";
import { RetryExecutor } from "../resilience/retryExecutor";
import { createRetryPolicy, type RetryPolicy } from "../resilience/retryPolicy";
import { NewsletterService } from "../services/newsletterService";
import { PriceComparisonService } from "../services/priceComparisonService";
import { SubscriptionService } from "../services/subscriptionService";

export type QuoteSources = {
  primary: QuoteProviderPort;
  fallback?: QuoteProviderPort;
};

const retryPolicyFromEnv = (): RetryPolicy =>
  createRetryPolicy({
    maxRetries: env.FETCH_MAX_RETRIES,
    backoffBase: env.FETCH_BACKOFF_BASE,
    initialDelayMs: env.FETCH_INITIAL_DELAY_MS,
    minDelayMs: env.FETCH_MIN_DELAY_MS,
  });

/**
 * Builds one adapter for the asset class, or null when the provider does not quote that class.
 */
export const createQuoteProvider = (
  name: QuoteProviderName,
  assetClass: AssetClass,
): QuoteProviderPort | null => {
  switch (name) {
    case "alphavantage":
      return new AlphaVantageQuoteProvider(
        env.ALPHA_VANTAGE_BASE_URL,
        env.ALPHA_VANTAGE_API_KEY,
        assetClass,
        env.ALPHA_VANTAGE_MIN_INTERVAL_MS,
        env.FETCH_TIMEOUT_MS,
      );
    case "finnhub":
      return new FinnhubQuoteProvider(
        env.FINNHUB_BASE_URL,
        env.FINNHUB_API_KEY,
        assetClass,
        env.FINNHUB_MIN_INTERVAL_MS,
        env.FETCH_TIMEOUT_MS,
      );
    case "marketstack":
      return assetClass === "stock"
        ? new MarketstackQuoteProvider(
            env.MARKETSTACK_BASE_URL,
            env.MARKETSTACK_API_KEY,
            env.MARKETSTACK_MIN_INTERVAL_MS,
            env.FETCH_TIMEOUT_MS,
          )
        : null;
    case "mock":
      return new MockQuoteProvider(assetClass);
  }
};

/**
 * Resolves primary and fallback for one asset class; a stocks-only primary hands crypto to the fallback.
 */
export const resolveQuoteSources = (assetClass: AssetClass): QuoteSources => {
  const primary = createQuoteProvider(primaryQuoteProvider(), assetClass);
  const fallbackName = fallbackQuoteProvider();
  const fallback = fallbackName
    ? createQuoteProvider(fallbackName, assetClass)
    : null;

  if (primary) {
    return fallback ? { primary, fallback } : { primary };
  }

  if (fallback) {
    return { primary: fallback };
  }

  throw new Error(
    `No configured quote provider serves ${assetClass} quotes; set QUOTE_FALLBACK_PROVIDER.`,
  );
};

/**
 * Every real provider with an API key that quotes the asset class; the mock stands in when none is keyed.
 */
export const configuredQuoteProviders = (
  assetClass: AssetClass,
): QuoteProviderPort[] => {
  const keyed: QuoteProviderName[] = [];
  if (env.ALPHA_VANTAGE_API_KEY.trim()) keyed.push("alphavantage");
  if (env.FINNHUB_API_KEY.trim()) keyed.push("finnhub");
  if (env.MARKETSTACK_API_KEY.trim()) keyed.push("marketstack");

  const names: QuoteProviderName[] = keyed.length > 0 ? keyed : ["mock"];

  return names.flatMap((name) => {
    const provider = createQuoteProvider(name, assetClass);
    return provider ? [provider] : [];
  });
};

/**
 * Composition root for quote commands; one rate limiter is shared by every provider call in the process.
 */
export const createQuoteRuntime = () => {
  const clock = new SystemClock();
  const sleeper = new SystemSleeper();
  const policy = retryPolicyFromEnv();
  const rateLimiter = new RateLimiter(clock, sleeper);
  const executor = new RetryExecutor(sleeper);

  return {
    fetcher: new ResilientFetcher(policy, rateLimiter, sleeper),
    comparisonService: new PriceComparisonService(executor, rateLimiter),
  };
};

/**
 * Composition root for the mailing list; callers must `close()` so the Postgres pool lets the process exit.
 */
export const createMailingRuntime = () => {
  const { db, sql } = createDb(env.POSTGRES_URL);

  const clock = new SystemClock();
  const sleeper = new SystemSleeper();
  const policy = retryPolicyFromEnv();
  const executor = new RetryExecutor(sleeper);

  const subscriptions = new SubscriptionService(
    new PostgresSubscriberRepository(db),
    executor,
    policy,
    clock,
  );

  const createNewsletterService = () =>
    new NewsletterService(
      subscriptions,
      new BrevoMailer(env.BREVO_BASE_URL, env.BREVO_API_KEY, {
        name: env.BREVO_FROM_NAME,
        email: env.BREVO_FROM_EMAIL,
      }),
      new ResilientFetcher(policy, new RateLimiter(clock, sleeper), sleeper),
      new FileNewsletterTemplate(env.NEWSLETTER_SUBJECT, env.NEWSLETTER_SITE_URL),
      env.BREVO_MIN_INTERVAL_MS,
    );

  return {
    subscriptions,
    createNewsletterService,
    close: async () => {
      await sql.end({ timeout: 5 });
    },
  };
};
