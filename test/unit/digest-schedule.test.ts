import { describe, it, expect } from "vitest";
import { DigestSchedule } from "../../src/cron/digest-schedule.js";
import type { DigestRequest } from "../../src/workflows/digest.js";
import type { WorkflowResult } from "../../src/workflows/types.js";
import { silentLogger } from "../helpers/fakes.js";

class RecordingDigest {
  readonly requests: DigestRequest[] = [];

  async run(request: DigestRequest): Promise<WorkflowResult> {
    this.requests.push(request);
    return { status: "processed", model: null, result: {} };
  }
}

describe("DigestSchedule", () => {
  it("runs a scheduled digest for the current hour bucket", async () => {
    const digest = new RecordingDigest();
    const schedule = new DigestSchedule(
      digest,
      { schedule: "0 * * * *", timezone: "UTC", windowMinutes: 60, now: () => new Date("2026-03-02T10:42:17Z") },
      silentLogger(),
    );

    const outcome = await schedule.execute();

    expect(outcome.status).toBe("processed");
    expect(digest.requests).toEqual([
      { runSource: "scheduled", bucketStartUtc: "2026-03-02T10:00:00Z", windowMinutes: 60 },
    ]);
  });

  it("starts and stops the cron job", () => {
    const schedule = new DigestSchedule(
      new RecordingDigest(),
      { schedule: "0 * * * *", timezone: "UTC", windowMinutes: 60 },
      silentLogger(),
    );

    schedule.start();
    expect(schedule.running).toBe(true);
    schedule.stop();
    expect(schedule.running).toBe(false);
  });

  it("rejects an invalid cron pattern", () => {
    const schedule = new DigestSchedule(
      new RecordingDigest(),
      { schedule: "every hour", timezone: "UTC", windowMinutes: 60 },
      silentLogger(),
    );
    expect(() => schedule.start()).toThrow();
    expect(schedule.running).toBe(false);
  });
});
