import { describe, expect, it } from "vitest";
import type { DeliveryResult } from "../delivery/index.js";
import type { DigestEntry } from "../digest/index.js";
import { aggregateStatus, exitCode, formatRunReport, type RunReport } from "./report.js";

function result(channel: string, status: DeliveryResult["status"]): DeliveryResult {
  return { channel, itemsAttempted: 1, itemsDelivered: status === "failed" ? 0 : 1, messagesSent: 1, messagesTotal: 1, status };
}

const entries: DigestEntry[] = [
  {
    rank: 1,
    story: { id: 1, title: "Story 1" },
    extraction: { storyId: 1, text: "Article", status: "success" },
    summary: { storyId: 1, text: "Summary.", status: "success" },
  },
  {
    rank: 2,
    story: { id: 2, title: "Story 2" },
    extraction: { storyId: 2, text: "", status: "failed", error: "HTTP 403" },
    summary: { storyId: 2, text: "", status: "failed", error: "no article text", retryable: false },
  },
];

function report(overrides: Partial<RunReport>): RunReport {
  return {
    status: "success",
    stage: "delivering",
    startedAt: "2024-03-05T08:00:00.000Z",
    finishedAt: "2024-03-05T08:01:00.000Z",
    dryRun: false,
    storiesRequested: 3,
    dropped: [],
    entries: [],
    delivery: [],
    disabledChannels: [],
    ...overrides,
  };
}

describe("aggregateStatus", () => {
  it("is success only when every channel succeeded", () => {
    expect(aggregateStatus([result("email", "success"), result("slack", "success")])).toBe("success");
  });

  it("is partial when channels disagree", () => {
    expect(aggregateStatus([result("email", "success"), result("slack", "failed")])).toBe("partial");
    expect(aggregateStatus([result("email", "partial")])).toBe("partial");
  });

  it("is failed when every channel failed or none ran", () => {
    expect(aggregateStatus([result("email", "failed"), result("slack", "failed")])).toBe("failed");
    expect(aggregateStatus([])).toBe("failed");
  });
});

describe("exitCode", () => {
  it("maps each status to its exit code", () => {
    expect([exitCode("success"), exitCode("failed"), exitCode("partial")]).toEqual([0, 1, 2]);
  });
});

describe("formatRunReport", () => {
  it("lists degraded stories, drops and channel results", () => {
    const text = formatRunReport(
      report({
        status: "partial",
        entries,
        dropped: [{ id: 9, reason: "item deleted" }],
        delivery: [
          { channel: "email", itemsAttempted: 2, itemsDelivered: 2, messagesSent: 1, messagesTotal: 1, status: "success" },
          {
            channel: "slack",
            itemsAttempted: 2,
            itemsDelivered: 1,
            messagesSent: 1,
            messagesTotal: 2,
            status: "partial",
            error: "slack message 2/2: Webhook responded 500: oops",
          },
        ],
      })
    );

    expect(text.split("\n")).toEqual([
      'Run partial at stage "delivering"',
      "Stories: 2 in digest, 1 dropped, 1 degraded",
      "  #2 Story 2: article could not be extracted (HTTP 403)",
      "  dropped 9: item deleted",
      "Channels:",
      "  email: success (2/2 stories, 1/1 messages)",
      "  slack: partial (1/2 stories, 1/2 messages) - slack message 2/2: Webhook responded 500: oops",
    ]);
  });

  it("shows disabled channels and the fatal error", () => {
    const text = formatRunReport(
      report({
        status: "failed",
        stage: "fetching",
        disabledChannels: [{ channel: "slack", reason: "no webhook" }],
        error: "fetch: ranking unavailable",
      })
    );

    expect(text.split("\n")).toEqual([
      'Run failed at stage "fetching"',
      "Stories: 0 in digest, 0 dropped, 0 degraded",
      "Disabled channels:",
      "  slack: no webhook",
      "Error: fetch: ranking unavailable",
    ]);
  });

  it("marks a dry run", () => {
    expect(formatRunReport(report({ dryRun: true })).split("\n")[0]).toBe('Run success (dry run) at stage "delivering"');
  });
});
