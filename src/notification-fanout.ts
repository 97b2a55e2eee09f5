/**
 * Room-wide broadcasts. Each recipient is delivered independently; one blocked
 * or failing chat never stops the others.
 */

import { debug, warn } from "./logger";
import type { MessageSink } from "./types";

export interface MemberDirectory {
  listMembers(roomCode: string): Promise<string[]>;
}

export interface BroadcastOptions {
  excludeUserId?: string;
}

export interface BroadcastResult {
  delivered: string[];
  failed: string[];
}

export class NotificationFanout {
  constructor(
    private readonly members: MemberDirectory,
    private readonly sink: MessageSink
  ) {}

  async broadcast(roomCode: string, text: string, options: BroadcastOptions = {}): Promise<BroadcastResult> {
    const recipients = (await this.members.listMembers(roomCode)).filter(
      (userId) => userId !== options.excludeUserId
    );

    const outcomes = await Promise.allSettled(
      recipients.map((userId) => this.sink.sendMessage(userId, text))
    );

    const result: BroadcastResult = { delivered: [], failed: [] };
    outcomes.forEach((outcome, index) => {
      const userId = recipients[index];
      if (outcome.status === "fulfilled") {
        result.delivered.push(userId);
        return;
      }
      result.failed.push(userId);
      warn("fanout", "delivery_failed", {
        roomCode,
        userId,
        error: outcome.reason instanceof Error ? outcome.reason.message : String(outcome.reason),
      });
    });

    debug("fanout", "broadcast_complete", {
      roomCode,
      delivered: result.delivered.length,
      failed: result.failed.length,
    });
    return result;
  }
}
