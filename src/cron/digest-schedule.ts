import { Cron } from "croner";
import type { Logger } from "../logging/logger.js";
import { hourBucketStart } from "../digest/blocks.js";
import type { DigestRequest } from "../workflows/digest.js";
import type { WorkflowResult } from "../workflows/types.js";

interface DigestRunner {
  run(request: DigestRequest): Promise<WorkflowResult>;
}

export interface DigestScheduleOptions {
  readonly schedule: string;
  readonly timezone: string;
  readonly windowMinutes: number;
  readonly now?: () => Date;
}

/**
 * In-process replacement for an external scheduler hitting `/digest/trigger`.
 * Each tick claims the current hour bucket, so overlapping triggers post once.
 */
export class DigestSchedule {
  private job: Cron | null = null;
  private readonly logger: Logger;

  constructor(
    private readonly digest: DigestRunner,
    private readonly options: DigestScheduleOptions,
    logger: Logger,
  ) {
    this.logger = logger.child({ component: "digest-schedule" });
  }

  start(): void {
    this.stop();
    this.job = new Cron(this.options.schedule, { timezone: this.options.timezone }, () => {
      this.execute().catch((err: unknown) => {
        this.logger.error({ err }, "Scheduled digest failed");
      });
    });
    this.logger.info(
      { schedule: this.options.schedule, next: this.job.nextRun()?.toISOString() ?? null },
      "Digest schedule started",
    );
  }

  stop(): void {
    if (this.job) {
      this.job.stop();
      this.job = null;
    }
  }

  get running(): boolean {
    return this.job !== null;
  }

  async execute(): Promise<WorkflowResult> {
    const now = this.options.now ? this.options.now() : new Date();
    const bucketStartUtc = hourBucketStart(now);
    const outcome = await this.digest.run({
      runSource: "scheduled",
      bucketStartUtc,
      windowMinutes: this.options.windowMinutes,
    });
    this.logger.info({ bucketStartUtc, status: outcome.status }, "Scheduled digest finished");
    return outcome;
  }
}
