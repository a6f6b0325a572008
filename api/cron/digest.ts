import type { VercelRequest } from "@vercel/node";
import { exitCode, formatRunReport, runDigest, type OrchestratorOptions } from "../../src/pipeline/index.js";
import { loadEnv, verifyCronSecret } from "../lib/init.js";

export const config = {
  maxDuration: 300,
};

type CronRequest = Pick<VercelRequest, "method" | "headers">;

/** The part of VercelResponse the handler writes to. */
interface CronResponse {
  status(code: number): { json(body: unknown): unknown };
}

export function createHandler(options: OrchestratorOptions = {}) {
  return async function handler(req: CronRequest, res: CronResponse): Promise<void> {
    // Only allow GET requests
    if (req.method !== "GET") {
      res.status(405).json({ error: "Method not allowed" });
      return;
    }

    loadEnv();

    if (!verifyCronSecret(req)) {
      res.status(401).json({ error: "Unauthorized" });
      return;
    }

    console.log("Digest cron triggered");
    const report = await runDigest({ configPath: process.env.HN_DIGEST_CONFIG ?? "config.yaml", ...options });
    console.log(formatRunReport(report));

    res.status(report.status === "failed" ? 500 : 200).json({
      status: report.status,
      exitCode: exitCode(report.status),
      stage: report.stage,
      startedAt: report.startedAt,
      finishedAt: report.finishedAt,
      stories: report.entries.map((entry) => ({
        rank: entry.rank,
        id: entry.story.id,
        title: entry.story.title,
        summary: entry.summary.status,
      })),
      dropped: report.dropped,
      delivery: report.delivery,
      disabledChannels: report.disabledChannels,
      error: report.error,
    });
  };
}

export default createHandler();
