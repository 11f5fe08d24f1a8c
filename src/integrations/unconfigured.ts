import { ConfigurationError } from "../workflows/errors.js";
import type { ModelClient } from "../model/types.js";
import type { ChatClient, CodeHostClient, CommitFile, CommitSummary, DocumentClient, TrackerClient, TrackerComment, TrackerTransition } from "./types.js";
import type { JsonRecord } from "../utils/text.js";

function missing(service: string, settings: string): Promise<never> {
  return Promise.reject(new ConfigurationError(`${service} is not configured. Set ${settings}.`));
}

const JIRA_SETTINGS = "jira.baseUrl, jira.email and jira.apiToken";
const GITHUB_SETTINGS = "github.token";

/*
 * Stand-ins used when credentials are absent. The server still starts, and
 * any workflow that reaches one of these fails with a 400 naming the setting.
 */

export class UnconfiguredTracker implements TrackerClient {
  getIssue(): Promise<JsonRecord> {
    return missing("Jira", JIRA_SETTINGS);
  }
  editIssue(): Promise<unknown> {
    return missing("Jira", JIRA_SETTINGS);
  }
  addComment(): Promise<unknown> {
    return missing("Jira", JIRA_SETTINGS);
  }
  addAttachment(): Promise<unknown> {
    return missing("Jira", JIRA_SETTINGS);
  }
  searchIssues(): Promise<JsonRecord[]> {
    return missing("Jira", JIRA_SETTINGS);
  }
  listComments(): Promise<TrackerComment[]> {
    return missing("Jira", JIRA_SETTINGS);
  }
  listTransitions(): Promise<TrackerTransition[]> {
    return missing("Jira", JIRA_SETTINGS);
  }
  transitionIssue(): Promise<unknown> {
    return missing("Jira", JIRA_SETTINGS);
  }
}

export class UnconfiguredCodeHost implements CodeHostClient {
  listCommits(): Promise<CommitSummary[]> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  listPullFiles(): Promise<CommitFile[]> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  compareCommits(): Promise<CommitFile[]> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  listPullCommits(): Promise<string[]> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  getCommit(): Promise<CommitSummary> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  getPullDiff(): Promise<string> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  updatePullRequest(): Promise<unknown> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
  addIssueComment(): Promise<unknown> {
    return missing("GitHub", GITHUB_SETTINGS);
  }
}

export class UnconfiguredChat implements ChatClient {
  postMessage(): Promise<unknown> {
    return missing("Slack", "slack.botToken and slack.signingSecret");
  }
}

export class UnconfiguredDocs implements DocumentClient {
  getDocumentText(): Promise<string> {
    return missing("Google Docs", "docs.accessToken");
  }
}

export class UnconfiguredModel implements ModelClient {
  generate(): Promise<string | null> {
    return missing("The model provider", "model.apiKey");
  }
}
