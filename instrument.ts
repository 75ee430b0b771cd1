import * as Sentry from "@sentry/node";
import { getConfig } from "@/lib/config";

const config = getConfig();

Sentry.init({
  dsn: config.sentryDsn,
  environment: config.env,

  // Enable structured logging
  enableLogs: true,

  integrations: [
    // Console integration - captures console.log, console.warn, console.error
    Sentry.consoleLoggingIntegration({
      levels: ["log", "warn", "error"],
    }),
    // Vercel AI SDK integration - tracks LLM calls, tokens, latency
    Sentry.vercelAIIntegration({
      recordInputs: false,
      recordOutputs: false,
    }),
  ],

  tracesSampler: ({ name, parentSampled }) => {
    // Health checks
    if (name === "GET /") {
      return 0;
    }
    if (name.includes("check_compliance") || name.includes("report") || name.includes("inngest")) {
      return 1.0;
    }
    if (typeof parentSampled === "boolean") {
      return parentSampled;
    }
    return config.env === "production" ? 0.1 : 1.0;
  },

  debug: false,
});
