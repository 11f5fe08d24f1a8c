import { describe, it, expect } from "vitest";
import {
  areaForPath,
  digestLabel,
  digestLockKey,
  fallbackBlocks,
  formatDigestMessage,
  groupCommitsByArea,
  hourBucketStart,
  parseDigestBlocks,
} from "../../src/digest/blocks.js";
import { commit, file } from "../helpers/fakes.js";

describe("areaForPath", () => {
  it("uses the second segment under source roots", () => {
    expect(areaForPath("src/memory/db.ts")).toBe("memory");
    expect(areaForPath("packages/ui/button.tsx")).toBe("ui");
  });

  it("falls back to the first segment or root", () => {
    expect(areaForPath("docs/setup.md")).toBe("docs");
    expect(areaForPath("src/index.ts")).toBe("src");
    expect(areaForPath("README.md")).toBe("root");
  });
});

describe("groupCommitsByArea", () => {
  it("files each commit under its dominant area in first-seen order", () => {
    const a = commit("a1", "store", ["src/memory/db.ts", "src/memory/query.ts", "README.md"]);
    const b = commit("b1", "docs", ["README.md"]);
    const c = commit("c1", "more store", ["src/memory/recorder.ts"]);
    expect(groupCommitsByArea([a, b, c])).toEqual([
      { area: "memory", commits: [a, c] },
      { area: "root", commits: [b] },
    ]);
  });
});

describe("parseDigestBlocks", () => {
  it("reads delimited blocks and skips incomplete ones", () => {
    const text = [
      "---",
      "AREA: memory",
      "AUTHORS: dev-one, dev-two",
      "COMMITS: 2",
      "FILES: src/memory/db.ts (M), src/memory/query.ts (A)",
      "CHANGES:",
      "- Enabled WAL journaling",
      "- Indexed created_at",
      "SUMMARY: Store hardening.",
      "DECISIONS: None.",
      "---",
      "AREA: broken",
      "---",
    ].join("\n");
    expect(parseDigestBlocks(text)).toEqual([
      {
        area: "memory",
        authors: ["dev-one", "dev-two"],
        commits: 2,
        files: ["src/memory/db.ts (M)", "src/memory/query.ts (A)"],
        changes: ["Enabled WAL journaling", "Indexed created_at"],
        summary: "Store hardening.",
        decisions: "None.",
      },
    ]);
  });

  it("keeps at most eight blocks", () => {
    const text = Array.from({ length: 10 }, (_, i) => `AREA: area-${i}\nSUMMARY: s${i}`).join("\n---\n");
    expect(parseDigestBlocks(text)).toHaveLength(8);
  });

  it("returns nothing for free text", () => {
    expect(parseDigestBlocks("Lots happened today.")).toEqual([]);
  });
});

describe("fallbackBlocks", () => {
  it("summarizes each group from its commits", () => {
    const added = { ...commit("a1", "Add recorder\n\nbody", []), files: [file("src/memory/recorder.ts", "", "added")] };
    const [block] = fallbackBlocks([
      { area: "memory", commits: [added, commit("b1", "Tune query", ["src/memory/query.ts"], "dev-two")] },
    ]);
    expect(block).toEqual({
      area: "memory",
      authors: ["dev-one", "dev-two"],
      commits: 2,
      files: ["src/memory/recorder.ts (A)", "src/memory/query.ts (M)"],
      changes: ["Add recorder", "Tune query"],
      summary: "2 commit(s) touching memory.",
      decisions: "None.",
    });
  });
});

describe("formatDigestMessage", () => {
  it("renders a header and one section per block", () => {
    const message = formatDigestMessage({
      windowMinutes: 60,
      repo: "acme/shop",
      blocks: [
        {
          area: "memory",
          authors: ["dev-one"],
          commits: 1,
          files: ["src/memory/db.ts (M)"],
          changes: ["Enabled WAL journaling"],
          summary: "Store hardening.",
          decisions: "Keep a single writer.",
        },
      ],
    });
    expect(message.split("\n")).toEqual([
      "*[LeadSync Hourly Digest — acme/shop]*",
      "",
      "*memory* (1 commits by dev-one)",
      "Store hardening.",
      "• Enabled WAL journaling",
      "Key files: `src/memory/db.ts (M)`",
      "_Decisions: Keep a single writer._",
    ]);
  });
});

describe("bucket helpers", () => {
  it("truncates to the UTC hour", () => {
    expect(hourBucketStart(new Date("2026-03-02T10:59:59.999Z"))).toBe("2026-03-02T10:00:00Z");
  });

  it("builds lock keys from bucket, window and source", () => {
    expect(digestLockKey("2026-03-02T10:00:00Z", 60, "scheduled")).toBe(
      "digest:2026-03-02T10:00:00Z:window=60:source=scheduled",
    );
  });

  it("labels day-long windows as daily", () => {
    expect(digestLabel(1440)).toBe("Daily");
    expect(digestLabel(60)).toBe("Hourly");
  });
});
