/**
 * Per-user pending dialogue state, held in process memory only.
 */

import type { Category } from "./constants";
import type { CalendarDate } from "./reminder-time";

export type RoomOperation = "add" | "list" | "delete";

export interface ReminderDraft {
  todoId: number;
  roomCode: string;
  category: Category;
  task: string;
}

export type DialogueState =
  | { kind: "idle" }
  | { kind: "selecting_room_for_operation"; operation: RoomOperation }
  | { kind: "choosing_category"; roomCode: string }
  | { kind: "entering_task"; roomCode: string; category: Category }
  | { kind: "deciding_reminder"; draft: ReminderDraft }
  | { kind: "entering_reminder_date"; draft: ReminderDraft }
  | { kind: "entering_reminder_time"; draft: ReminderDraft; date: CalendarDate }
  | { kind: "choosing_list_category"; roomCode: string }
  | { kind: "choosing_todo_to_delete"; roomCode: string }
  | { kind: "entering_room_name" }
  | { kind: "entering_room_password"; roomName: string }
  | { kind: "entering_room_code" }
  | { kind: "entering_join_password"; roomCode: string };

export type DialogueStateKind = DialogueState["kind"];

export const IDLE: DialogueState = { kind: "idle" };

const TEXT_STATES: ReadonlySet<DialogueStateKind> = new Set<DialogueStateKind>([
  "entering_task",
  "entering_reminder_date",
  "entering_reminder_time",
  "entering_room_name",
  "entering_room_password",
  "entering_room_code",
  "entering_join_password",
]);

/** States whose next expected input is free text rather than a button. */
export function expectsText(state: DialogueState): boolean {
  return TEXT_STATES.has(state.kind);
}

interface DialogueSession {
  state: DialogueState;
  /** Room last picked in a room picker; listed first next time. */
  selectedRoomCode?: string;
  updatedAt: number;
}

export class DialogueSessions {
  private readonly sessions = new Map<string, DialogueSession>();

  getState(userId: string): DialogueState {
    return this.sessions.get(userId)?.state ?? IDLE;
  }

  setState(userId: string, state: DialogueState): void {
    const session = this.sessions.get(userId);
    if (session) {
      session.state = state;
      session.updatedAt = Date.now();
      return;
    }
    this.sessions.set(userId, { state, updatedAt: Date.now() });
  }

  reset(userId: string): void {
    const session = this.sessions.get(userId);
    if (!session) return;
    if (session.selectedRoomCode === undefined) {
      this.sessions.delete(userId);
      return;
    }
    session.state = IDLE;
    session.updatedAt = Date.now();
  }

  getSelectedRoom(userId: string): string | undefined {
    return this.sessions.get(userId)?.selectedRoomCode;
  }

  selectRoom(userId: string, roomCode: string): void {
    const session = this.sessions.get(userId);
    if (session) {
      session.selectedRoomCode = roomCode;
      return;
    }
    this.sessions.set(userId, { state: IDLE, selectedRoomCode: roomCode, updatedAt: Date.now() });
  }

  /** Drops the cached selection only when it points at `roomCode`. */
  clearSelectedRoom(userId: string, roomCode: string): void {
    const session = this.sessions.get(userId);
    if (session?.selectedRoomCode === roomCode) {
      session.selectedRoomCode = undefined;
    }
  }

  /**
   * Resets every non-idle state untouched for longer than `maxIdleMs`.
   * Returns the user ids that were reset.
   */
  sweepIdle(maxIdleMs: number, now: number = Date.now()): string[] {
    const expired: string[] = [];
    for (const [userId, session] of this.sessions.entries()) {
      if (session.state.kind === "idle" || now - session.updatedAt <= maxIdleMs) continue;
      expired.push(userId);
      this.reset(userId);
    }
    return expired;
  }

  size(): number {
    return this.sessions.size;
  }
}
