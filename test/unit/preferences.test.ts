import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { writeFileSync } from "node:fs";
import { join } from "node:path";
import {
  appendLeaderRules,
  isPreferenceCategory,
  loadPreferences,
  loadRuleset,
  resolvePreferenceCategory,
  rulesetFileName,
} from "../../src/context/preferences.js";
import { ConfigurationError, ExecutionError } from "../../src/workflows/errors.js";
import type { MemoryItem } from "../../src/memory/types.js";
import { FakeDocs, makeTempDir } from "../helpers/fakes.js";

function rule(summary: string): MemoryItem {
  return {
    id: 1,
    workflow: "leader_rules",
    itemType: "leader_rule",
    ticketKey: null,
    projectKey: null,
    label: "general",
    component: null,
    repoKey: null,
    teamKey: null,
    summary,
    decision: null,
    rulesApplied: null,
    context: null,
    createdAt: "2026-03-01T00:00:00.000Z",
  };
}

describe("resolvePreferenceCategory", () => {
  it("maps labels and components to categories", () => {
    expect(resolvePreferenceCategory(["frontend"], [])).toBe("frontend");
    expect(resolvePreferenceCategory(["UI-polish"], [])).toBe("frontend");
    expect(resolvePreferenceCategory([], ["Postgres Schema"])).toBe("database");
    expect(resolvePreferenceCategory(["api"], [])).toBe("backend");
  });

  it("prefers frontend, then database, then backend", () => {
    expect(resolvePreferenceCategory(["api", "db"], [])).toBe("database");
    expect(resolvePreferenceCategory(["db", "react"], [])).toBe("frontend");
  });

  it("defaults to backend", () => {
    expect(resolvePreferenceCategory([], [])).toBe("backend");
    expect(resolvePreferenceCategory(["billing"], ["payments"])).toBe("backend");
  });
});

describe("rulesets", () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = makeTempDir("leadsync-rules-"));
  });

  afterEach(() => cleanup());

  it("names one ruleset file per category", () => {
    expect(rulesetFileName("frontend")).toBe("frontend-ruleset.md");
    expect(rulesetFileName("backend")).toBe("backend-ruleset.md");
    expect(rulesetFileName("database")).toBe("db-ruleset.md");
  });

  it("reads the ruleset or answers empty when missing", () => {
    writeFileSync(join(dir, "db-ruleset.md"), "- no drops\n");
    expect(loadRuleset(dir, "database")).toBe("- no drops\n");
    expect(loadRuleset(dir, "frontend")).toBe("");
  });
});

describe("loadPreferences", () => {
  it("returns the trimmed document text", async () => {
    const docs = new FakeDocs();
    docs.documents.set("doc-1", "  Use the service layer.  \n");
    await expect(loadPreferences(docs, { backend: "doc-1" }, "backend")).resolves.toBe("Use the service layer.");
  });

  it("fails with a configuration error when no document is configured", async () => {
    await expect(loadPreferences(new FakeDocs(), {}, "frontend")).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("fails with an execution error when the document cannot be read or is empty", async () => {
    const docs = new FakeDocs();
    docs.documents.set("blank", "   ");
    await expect(loadPreferences(docs, { backend: "missing" }, "backend")).rejects.toBeInstanceOf(ExecutionError);
    await expect(loadPreferences(docs, { backend: "blank" }, "backend")).rejects.toThrow(
      "Preferences document for backend is empty",
    );
  });
});

describe("appendLeaderRules", () => {
  it("leaves preferences alone without rules", () => {
    expect(appendLeaderRules("prefs", [])).toBe("prefs");
  });

  it("appends rules as a bullet list", () => {
    expect(appendLeaderRules("prefs", [rule("a"), rule("b")])).toBe("prefs\n\nTech lead rules:\n- a\n- b");
  });
});

describe("isPreferenceCategory", () => {
  it("accepts only the three categories", () => {
    expect(isPreferenceCategory("database")).toBe(true);
    expect(isPreferenceCategory("general")).toBe(false);
  });
});
