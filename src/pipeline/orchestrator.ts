import { resolveConfig, type ConfigOverrides, type ResolvedConfig } from "../config/index.js";
import { createChannels, dispatch, type ChannelFactoryOptions, type DeliveryChannel } from "../delivery/index.js";
import { renderText, type DigestEntry } from "../digest/index.js";
import { errorMessage } from "../errors.js";
import { ContentExtractor, type ContentSource, type ExtractedContent } from "../extract/index.js";
import { HNClient, type FetchResult, type Story } from "../hn/index.js";
import { createLogger } from "../lib/logger.js";
import { mapOrdered } from "../lib/pool.js";
import { sleep } from "../lib/retry.js";
import { createProvider, Summarizer, type Summary } from "../summarize/index.js";
import { aggregateStatus, type RunReport, type RunStage, type RunStatus } from "./report.js";

const log = createLogger("pipeline");

export interface StorySource {
  fetchTopStories(limit: number, signal?: AbortSignal): Promise<FetchResult>;
}

export interface StorySummarizer {
  summarize(story: Story, text: string, maxLength?: number, signal?: AbortSignal): Promise<Summary>;
}

export interface PipelineComponents {
  fetcher: StorySource;
  extractor: ContentSource;
  summarizer: StorySummarizer;
  channels: DeliveryChannel[];
}

export function createComponents(
  config: ResolvedConfig,
  options: ChannelFactoryOptions = {}
): PipelineComponents {
  return {
    fetcher: new HNClient(config.fetcher),
    extractor: new ContentExtractor(config.extractor),
    summarizer: new Summarizer(createProvider(config.summarizer), {
      maxLength: config.summarizer.maxLength,
      timeoutMs: config.summarizer.timeoutMs,
    }),
    channels: createChannels(config, options),
  };
}

export interface OrchestratorOptions {
  configPath?: string;
  overrides?: ConfigOverrides;
  /** Replaces reading config.yaml + environment + secret store */
  resolve?: () => Promise<ResolvedConfig>;
  /** Replaces the real HN client, extractor, provider and channels */
  components?: (config: ResolvedConfig) => PipelineComponents;
  /** Run everything except sending */
  dryRun?: boolean;
  signal?: AbortSignal;
  sleep?: (ms: number) => Promise<void>;
}

class RunAborted extends Error {
  constructor() {
    super("aborted");
  }
}

/**
 * One digest run: configuring -> fetching -> processing -> delivering.
 * `run()` always resolves with a report; it never throws.
 */
export class Orchestrator {
  private stage: RunStage = "init";

  constructor(private readonly options: OrchestratorOptions = {}) {}

  async run(): Promise<RunReport> {
    this.stage = "init";
    const startedAt = new Date().toISOString();
    const report: RunReport = {
      status: "failed",
      stage: "init",
      startedAt,
      finishedAt: startedAt,
      dryRun: this.options.dryRun ?? false,
      storiesRequested: 0,
      dropped: [],
      entries: [],
      delivery: [],
      disabledChannels: [],
    };

    const finish = (status: RunStatus, error?: string): RunReport => {
      report.status = status;
      report.stage = this.stage;
      report.finishedAt = new Date().toISOString();
      if (error) report.error = error;
      const summary = `Run finished: ${status} at ${this.stage}${error ? ` (${error})` : ""}`;
      if (status === "success") log.info(summary);
      else log.warn(summary);
      return report;
    };

    try {
      this.enter("configuring");
      let config: ResolvedConfig;
      let components: PipelineComponents;
      try {
        config = await (this.options.resolve?.() ??
          resolveConfig({ configPath: this.options.configPath, overrides: this.options.overrides }));
        report.disabledChannels = [...config.disabledChannels];
        report.storiesRequested = config.pipeline.topStories;
        components = (this.options.components ?? createComponents)(config);
      } catch (error) {
        return finish("failed", `configuration: ${errorMessage(error)}`);
      }

      this.enter("fetching");
      let fetched: FetchResult;
      try {
        fetched = await components.fetcher.fetchTopStories(config.pipeline.topStories, this.options.signal);
      } catch (error) {
        return finish("failed", `fetch: ${errorMessage(error)}`);
      }
      report.dropped = fetched.dropped;
      this.checkAborted();

      if (fetched.stories.length === 0) {
        return finish("failed", "no stories fetched");
      }

      this.enter("processing");
      report.entries = await this.process(fetched.stories, config, components);
      this.checkAborted();

      this.enter("delivering");
      if (report.dryRun) {
        log.info(`Dry run, not sending:\n${renderText(report.entries, new Date())}`);
        return finish("success");
      }

      if (components.channels.length === 0) {
        return finish("failed", "no delivery channel enabled");
      }

      report.delivery = await dispatch(components.channels, report.entries, {
        parallel: config.pipeline.parallelDelivery,
        signal: this.options.signal,
      });
      return finish(aggregateStatus(report.delivery));
    } catch (error) {
      if (error instanceof RunAborted) return finish("failed", "aborted");
      return finish("failed", errorMessage(error));
    }
  }

  private enter(stage: RunStage): void {
    this.checkAborted();
    log.debug(`${this.stage} -> ${stage}`);
    this.stage = stage;
  }

  private checkAborted(): void {
    if (this.options.signal?.aborted) throw new RunAborted();
  }

  /**
   * Extract and summarize every story, recording an outcome for each.
   * Results keep ranking order even when stories run concurrently.
   */
  private async process(
    stories: Story[],
    config: ResolvedConfig,
    components: PipelineComponents
  ): Promise<DigestEntry[]> {
    const entries = await mapOrdered(stories, config.pipeline.concurrency, (story, index) =>
      this.processStory(story, index + 1, config, components)
    );
    const degraded = entries.filter((e) => e.summary.status === "failed").length;
    log.info(`Processed ${entries.length} stories (${degraded} without summary)`);
    return entries;
  }

  private async processStory(
    story: Story,
    rank: number,
    config: ResolvedConfig,
    { extractor, summarizer }: PipelineComponents
  ): Promise<DigestEntry> {
    const signal = this.options.signal;
    if (signal?.aborted) {
      return {
        rank,
        story,
        extraction: { storyId: story.id, text: "", status: "failed", error: "aborted" },
        summary: { storyId: story.id, text: "", status: "failed", error: "aborted", retryable: false },
      };
    }

    let extraction: ExtractedContent;
    try {
      extraction = await extractor.extract(story, signal);
    } catch (error) {
      extraction = { storyId: story.id, text: "", status: "failed", error: errorMessage(error) };
    }

    const wait = this.options.sleep ?? sleep;
    let summary: Summary = { storyId: story.id, text: "", status: "failed", error: "not attempted" };
    for (let attempt = 0; attempt <= config.pipeline.summarizeRetries; attempt++) {
      if (attempt > 0) {
        const delayMs = config.pipeline.retryDelayMs * 2 ** (attempt - 1);
        log.warn(`Retrying summary for story ${story.id} in ${delayMs}ms: ${summary.error ?? ""}`);
        await wait(delayMs);
      }
      try {
        summary = await summarizer.summarize(story, extraction.text, config.summarizer.maxLength, signal);
      } catch (error) {
        summary = { storyId: story.id, text: "", status: "failed", error: errorMessage(error), retryable: false };
      }
      if (summary.status === "success" || !summary.retryable || signal?.aborted) break;
    }

    return { rank, story, extraction, summary };
  }
}

export function runDigest(options: OrchestratorOptions = {}): Promise<RunReport> {
  return new Orchestrator(options).run();
}
