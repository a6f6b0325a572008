import { parse, type HTMLElement } from "node-html-parser";
import type { ExtractorSettings } from "../config/index.js";
import { errorMessage, ExtractionError, isTransientStatus } from "../errors.js";
import type { Story } from "../hn/index.js";
import { createLogger } from "../lib/logger.js";
import { timeoutSignal, withRetry } from "../lib/retry.js";

const log = createLogger("extract");

export type ExtractionStatus = "success" | "failed" | "skipped";

export interface ExtractedContent {
  storyId: number;
  /** Plain text; empty when extraction failed */
  text: string;
  status: ExtractionStatus;
  error?: string;
}

/** URL -> plain text. Implementations report failure in the result. */
export interface ContentSource {
  extract(story: Story, signal?: AbortSignal): Promise<ExtractedContent>;
}

const STRIP_SELECTORS = "script, style, noscript, nav, header, footer, aside, form, iframe, svg";
const CONTAINER_NAMES = ["content", "main", "article", "post", "entry"];
const CLASS_NAMES = ["content", "article", "post", "entry", "story"];

function decodeEntities(text: string): string {
  return text
    .replace(/&nbsp;/g, " ")
    .replace(/&lt;/g, "<")
    .replace(/&gt;/g, ">")
    .replace(/&quot;/g, '"')
    .replace(/&#39;|&#x27;/g, "'")
    .replace(/&amp;/g, "&");
}

function normalize(text: string): string {
  return decodeEntities(text).replace(/\s+/g, " ").trim();
}

function matchesName(value: string | undefined, names: string[]): boolean {
  if (!value) return false;
  const lower = value.toLowerCase();
  return names.some((name) => lower === name || lower === `main-${name}`);
}

/**
 * Pick the element most likely to hold the article: a well-known id, then a
 * well-known class, then <article>, then <body>.
 */
function findMainContainer(root: HTMLElement): HTMLElement {
  for (const name of CONTAINER_NAMES) {
    const byId = root
      .querySelectorAll("[id]")
      .find((el) => matchesName(el.getAttribute("id"), [name]));
    if (byId) return byId;
  }

  for (const name of CLASS_NAMES) {
    const byClass = root
      .querySelectorAll("[class]")
      .find((el) => (el.getAttribute("class") ?? "").split(/\s+/).some((c) => matchesName(c, [name])));
    if (byClass) return byClass;
  }

  return root.querySelector("article") ?? root.querySelector("body") ?? root;
}

/** Readable text from an HTML document. */
export function htmlToText(html: string): string {
  const root = parse(html);
  for (const el of root.querySelectorAll(STRIP_SELECTORS)) {
    el.remove();
  }
  return normalize(findMainContainer(root).structuredText);
}

export class ContentExtractor implements ContentSource {
  constructor(private readonly settings: ExtractorSettings) {}

  async extract(story: Story, signal?: AbortSignal): Promise<ExtractedContent> {
    if (!story.url) {
      // Ask HN and similar posts carry their body inline
      const text = story.text ? normalize(parse(story.text).structuredText) : "";
      return { storyId: story.id, text, status: "skipped" };
    }

    try {
      log.debug(`Fetching ${story.url}`);
      const text = await withRetry(() => this.fetchText(story.url ?? "", signal), {
        attempts: this.settings.attempts,
        baseDelayMs: this.settings.baseDelayMs,
        signal,
        onRetry: (error, attempt) =>
          log.warn(`${story.url} failed (attempt ${attempt}): ${errorMessage(error)}`),
      });

      if (text.length < this.settings.minChars) {
        throw new ExtractionError(`access restricted or empty page (${text.length} chars)`);
      }

      log.info(`Extracted ${text.length} characters from ${story.url}`);
      return { storyId: story.id, text: text.slice(0, this.settings.maxChars), status: "success" };
    } catch (error) {
      log.error(`Error extracting ${story.url}: ${errorMessage(error)}`);
      return { storyId: story.id, text: "", status: "failed", error: errorMessage(error) };
    }
  }

  private async fetchText(url: string, signal?: AbortSignal): Promise<string> {
    const response = await fetch(url, {
      redirect: "follow",
      headers: {
        "User-Agent": this.settings.userAgent,
        Accept: "text/html,application/xhtml+xml,text/plain;q=0.9,*/*;q=0.5",
      },
      signal: timeoutSignal(this.settings.timeoutMs, signal),
    });

    if (!response.ok) {
      throw new ExtractionError(`HTTP ${response.status}`, {
        transient: isTransientStatus(response.status),
      });
    }

    const contentType = (response.headers.get("content-type") ?? "text/html").toLowerCase();
    const body = await response.text();

    if (contentType.includes("html") || contentType.includes("xml")) {
      return htmlToText(body);
    }
    if (contentType.startsWith("text/")) {
      return normalize(body);
    }
    throw new ExtractionError(`unsupported content type ${contentType.split(";")[0]}`);
  }
}
