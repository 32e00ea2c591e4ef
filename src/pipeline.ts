import type { FinderConfig } from "./config.js";
import { mapWithConcurrency } from "./concurrency.js";
import { buildSearchQueries } from "./discovery/queries.js";
import {
  emptyResult,
  errorDocument,
  type ClassifiedDocument,
  type Organization,
  type OrganizationResult,
} from "./documents/types.js";
import { NoCandidatesFound, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { toOutputRows, type OutputRow } from "./output/csv.js";
import type { SearchProvider } from "./search/google.js";
import { selectEvidence } from "./selection/engine.js";

export interface PipelineResult {
  rows: OutputRow[];
  organizationsProcessed: number;
  reportsFound: number;
}

export interface PipelineDeps {
  config: FinderConfig;
  search: SearchProvider;
  crawl?: (name: string) => Promise<Set<string>>;
  classify: (url: string) => Promise<ClassifiedDocument>;
  logger: Logger;
}

export async function discoverCandidates(
  org: Organization,
  deps: PipelineDeps
): Promise<Set<string>> {
  const { config, logger } = deps;
  const urls = new Set<string>();
  const queries = buildSearchQueries(org.name, config);

  for (const [i, query] of queries.entries()) {
    logger.info(`Search ${i + 1}/${queries.length} for '${org.name}'`);
    const hits = await deps.search.search(query, config.search.results_per_query);
    for (const hit of hits) urls.add(hit.link);
  }

  if (deps.crawl && config.website_discovery.enabled) {
    try {
      const fromWebsite = await deps.crawl(org.name);
      for (const url of fromWebsite) urls.add(url);
      logger.info(`Added ${fromWebsite.size} URLs from the website of '${org.name}'`);
    } catch (error) {
      logger.error(`Website crawl failed for '${org.name}': ${errorMessage(error)}`);
    }
  }

  return urls;
}

async function classifySafely(url: string, deps: PipelineDeps): Promise<ClassifiedDocument> {
  try {
    return await deps.classify(url);
  } catch (error) {
    return errorDocument(url, `ClassificationFailure: ${errorMessage(error)}`);
  }
}

export async function processOrganization(
  org: Organization,
  deps: PipelineDeps
): Promise<OrganizationResult> {
  const { config, logger } = deps;
  logger.info(`Processing organization: ${org.name} (ID: ${org.id})`);

  const urls = await discoverCandidates(org, deps);
  if (urls.size === 0) {
    logger.warning(new NoCandidatesFound(org.name).message);
    return emptyResult();
  }

  logger.info(`Classifying ${urls.size} unique URLs for '${org.name}'`);
  const documents = await mapWithConcurrency(
    [...urls],
    config.concurrency.urls_per_organization,
    (url) => classifySafely(url, deps)
  );

  const result = selectEvidence(documents);
  logger.info(
    `Selected for '${org.name}': primary ${result.primary?.url ?? "none"}, ` +
      `${result.alternates.filter((doc) => doc !== null).length} alternates`
  );
  return result;
}

export async function runPipeline(
  organizations: Organization[],
  deps: PipelineDeps
): Promise<PipelineResult> {
  const { config, logger } = deps;
  logger.info(`Processing ${organizations.length} organizations`);

  const results = await mapWithConcurrency(
    organizations,
    config.concurrency.organizations,
    async (org) => {
      try {
        return await processOrganization(org, deps);
      } catch (error) {
        logger.error(`Processing failed for '${org.name}': ${errorMessage(error)}`);
        return emptyResult();
      }
    }
  );

  return {
    rows: organizations.flatMap((org, i) => toOutputRows(org, results[i])),
    organizationsProcessed: organizations.length,
    reportsFound: results.filter((result) => result.primary !== null).length,
  };
}
