import { DialogueEngine } from "../src/dialogue-engine";
import { DialogueSessions } from "../src/dialogue-state";
import { reminderNotification, Reply } from "../src/dialogue-views";
import { NotificationFanout } from "../src/notification-fanout";
import { ReminderScheduler } from "../src/reminder-scheduler";
import { RoomStore } from "../src/room-store";
import { InMemoryStore } from "../src/storage";
import { TodoStore } from "../src/todo-store";
import type { MessageSink, ReminderPayload } from "../src/types";

export interface SentMessage {
  userId: string;
  text: string;
}

/** Message sink that records deliveries; users in `blocked` reject like a blocked chat. */
export class RecordingSink implements MessageSink {
  readonly sent: SentMessage[] = [];
  readonly blocked = new Set<string>();

  async sendMessage(userId: string, text: string): Promise<void> {
    if (this.blocked.has(userId)) {
      throw new Error(`Forbidden: bot was blocked by user ${userId}`);
    }
    this.sent.push({ userId, text });
  }

  messagesFor(userId: string): string[] {
    return this.sent.filter((message) => message.userId === userId).map((message) => message.text);
  }
}

/** Hands out the given codes in order, then fails loudly. */
export function codeSequence(...codes: string[]): () => string {
  const queue = [...codes];
  return () => {
    const next = queue.shift();
    if (next === undefined) throw new Error("code sequence exhausted");
    return next;
  };
}

export function createHarness(options: { store?: InMemoryStore; roomCodes?: string[] } = {}) {
  const store = options.store ?? new InMemoryStore();
  const sink = new RecordingSink();
  const rooms = new RoomStore(store, {
    generateCode: options.roomCodes ? codeSequence(...options.roomCodes) : undefined,
  });
  const fanout = new NotificationFanout(rooms, sink);
  const todos = new TodoStore(store, fanout);
  const reminders = new ReminderScheduler<ReminderPayload>((payload) =>
    sink.sendMessage(payload.userId, reminderNotification(payload))
  );
  const sessions = new DialogueSessions();
  const engine = new DialogueEngine({ rooms, todos, reminders, sessions });
  return { store, sink, rooms, fanout, todos, reminders, sessions, engine };
}

export function textsOf(replies: Reply[]): string[] {
  return replies.map((reply) => reply.text);
}

export function tokensOf(reply: Reply): string[] {
  if (reply.keyboard?.kind !== "inline") return [];
  return reply.keyboard.rows.flat().map((button) => button.token);
}
