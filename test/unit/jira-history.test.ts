import { describe, it, expect } from "vitest";
import {
  buildSameLabelDoneJql,
  buildSameLabelHistory,
  escapeJql,
  parseHistoryTickets,
} from "../../src/context/jira-history.js";
import { FakeTracker, silentLogger } from "../helpers/fakes.js";

describe("escapeJql", () => {
  it("escapes quotes and backslashes", () => {
    expect(escapeJql('say "hi"\\')).toBe('say \\"hi\\"\\\\');
  });
});

describe("buildSameLabelDoneJql", () => {
  it("targets completed tickets with the label, newest first", () => {
    expect(buildSameLabelDoneJql("LEADS", "backend", "LEADS-9")).toBe(
      'project = "LEADS" AND labels = "backend" AND statusCategory = Done AND key != "LEADS-9" ORDER BY resolutiondate DESC',
    );
  });
});

describe("parseHistoryTickets", () => {
  it("skips keyless rows and fills defaults", () => {
    const rows = parseHistoryTickets(
      [
        { fields: { summary: "no key" } },
        { key: "LEADS-2", fields: { summary: " Add paging ", description: "Used cursor paging.", resolutiondate: "2026-02-01" } },
        { key: "LEADS-3", fields: { status: { name: "Closed" } } },
      ],
      10,
    );
    expect(rows).toEqual([
      {
        key: "LEADS-2",
        summary: "Add paging",
        descriptionExcerpt: "Used cursor paging.",
        status: "Done",
        resolutionDate: "2026-02-01",
      },
      {
        key: "LEADS-3",
        summary: "",
        descriptionExcerpt: "No implementation notes provided.",
        status: "Closed",
        resolutionDate: "",
      },
    ]);
  });
});

describe("buildSameLabelHistory", () => {
  const logger = silentLogger();

  it("needs both a project and a label", async () => {
    const tracker = new FakeTracker();
    await expect(
      buildSameLabelHistory(tracker, { projectKey: "LEADS", label: "", excludeKey: "LEADS-1" }, logger),
    ).resolves.toBe("No comparable label history available.");
    expect(tracker.searches).toEqual([]);
  });

  it("reports lookup failures inline", async () => {
    const tracker = new FakeTracker();
    tracker.searchError = new Error("401 Unauthorized");
    await expect(
      buildSameLabelHistory(tracker, { projectKey: "LEADS", label: "backend", excludeKey: "LEADS-1" }, logger),
    ).resolves.toBe("History retrieval unavailable: 401 Unauthorized");
  });

  it("reports when nothing matched", async () => {
    const tracker = new FakeTracker();
    await expect(
      buildSameLabelHistory(tracker, { projectKey: "LEADS", label: "backend", excludeKey: "LEADS-1" }, logger),
    ).resolves.toBe("No completed same-label tickets found.");
  });

  it("lists completed tickets", async () => {
    const tracker = new FakeTracker();
    tracker.searchResults = [
      {
        key: "LEADS-2",
        fields: { summary: "Add paging", description: "Cursor paging.", status: { name: "Done" }, resolutiondate: "2026-02-01" },
      },
    ];
    await expect(
      buildSameLabelHistory(tracker, { projectKey: "LEADS", label: "backend", excludeKey: "LEADS-1" }, logger),
    ).resolves.toBe(
      "Same-label completed tickets (latest 1):\n" +
        "- LEADS-2 [Done] (2026-02-01): Add paging | Completed details: Cursor paging.",
    );
  });
});
