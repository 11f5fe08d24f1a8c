import { App } from "@slack/bolt";
import type { ChatClient } from "./types.js";

export interface SlackClientConfig {
  readonly botToken: string;
  readonly signingSecret: string;
}

/** Posts through the bolt web client; inbound events arrive on the HTTP routes, not through bolt. */
export class SlackChatClient implements ChatClient {
  private readonly app: App;

  constructor(config: SlackClientConfig) {
    this.app = new App({
      token: config.botToken,
      signingSecret: config.signingSecret,
      tokenVerificationEnabled: false,
    });
  }

  async postMessage(params: { channel: string; text: string; threadTs?: string }): Promise<unknown> {
    const result = await this.app.client.chat.postMessage({
      channel: params.channel,
      text: params.text,
      thread_ts: params.threadTs,
    });
    return { ok: result.ok, error: result.error, ts: result.ts ?? "", channel: result.channel ?? params.channel };
  }
}
