import { readFileSync, writeFileSync } from "node:fs";
import Anthropic from "@anthropic-ai/sdk";
import * as core from "@actions/core";
import { classifyUrl } from "./classifier/adapter.js";
import { LlmClassifier } from "./classifier/llm.js";
import { loadConfig, type FinderConfig } from "./config.js";
import { crawlWebsite } from "./discovery/website.js";
import { extractContent } from "./extract/content.js";
import { BrowserPageFetcher } from "./fetch/browser.js";
import { HttpPageFetcher, download } from "./fetch/http.js";
import { closeFetcher } from "./fetch/lifecycle.js";
import type { PageFetcher } from "./fetch/types.js";
import { actionsLogger, type Logger } from "./logger.js";
import { formatCsv, readOrganizations } from "./output/csv.js";
import { runPipeline } from "./pipeline.js";
import { resolveRubric } from "./scoring/rubric.js";
import { GoogleSearchProvider } from "./search/google.js";

async function createFetcher(config: FinderConfig, logger: Logger): Promise<PageFetcher> {
  const { fetch: fetchConfig } = config;
  if (fetchConfig.mode === "browser" && fetchConfig.browser.executable_path) {
    return BrowserPageFetcher.launch({
      executablePath: fetchConfig.browser.executable_path,
      poolSize: fetchConfig.browser.pool_size,
      timeoutMs: fetchConfig.timeout_ms,
      settleDelayMs: fetchConfig.settle_delay_ms,
      userAgent: fetchConfig.user_agent,
      logger,
    });
  }
  return new HttpPageFetcher({
    timeoutMs: fetchConfig.timeout_ms,
    userAgent: fetchConfig.user_agent,
    logger,
  });
}

async function run(): Promise<void> {
  const logger = actionsLogger;
  let fetcher: PageFetcher | undefined;

  try {
    const configPath = core.getInput("config_path") || "finder.yml";
    const inputCsv = core.getInput("input_csv") || "discovery.csv";
    const outputCsv = core.getInput("output_csv") || "discovery_output.csv";

    core.info(`Loading config from ${configPath}`);
    const config = loadConfig(configPath);
    const organizations = readOrganizations(readFileSync(inputCsv, "utf-8"));

    const search = new GoogleSearchProvider({
      apiKey: core.getInput("google_api_key", { required: true }),
      engineId: core.getInput("google_cse_id", { required: true }),
      minIntervalMs: config.search.request_delay_ms,
      logger,
    });
    const classifier = new LlmClassifier(
      new Anthropic({ apiKey: core.getInput("anthropic_api_key", { required: true }) }),
      { model: config.classification.model, maxTokens: config.classification.max_tokens }
    );
    const pageFetcher = await createFetcher(config, logger);
    fetcher = pageFetcher;

    const scoring = {
      targetYears: config.target_years,
      currentYear: new Date().getFullYear(),
      rubric: resolveRubric(config.rubric),
    };

    const result = await runPipeline(organizations, {
      config,
      search,
      logger,
      crawl: (name) =>
        crawlWebsite(name, {
          search,
          fetcher: pageFetcher,
          scoring,
          requestDelayMs: config.search.request_delay_ms,
          resultsToCheck: config.website_discovery.results_to_check,
          logger,
        }),
      classify: (url) =>
        classifyUrl(url, {
          download: (target) =>
            download(target, {
              timeoutMs: config.fetch.timeout_ms,
              userAgent: config.fetch.user_agent,
            }),
          extract: extractContent,
          classifier,
          maxAttempts: config.classification.max_attempts,
          retryDelayMs: config.classification.retry_delay_ms,
          timeoutMs: config.classification.timeout_ms,
          logger,
        }),
    });

    writeFileSync(outputCsv, formatCsv(result.rows), "utf-8");
    core.info(`Output written to ${outputCsv}`);

    core.setOutput("organizations_processed", result.organizationsProcessed);
    core.setOutput("reports_found", result.reportsFound);
  } catch (error) {
    if (error instanceof Error) {
      core.setFailed(error.message);
    } else {
      core.setFailed("An unexpected error occurred");
    }
  } finally {
    await closeFetcher(fetcher, logger);
  }
}

void run();
