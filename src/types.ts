/**
 * Type definitions for the room todo bot
 */

import type { Category } from "./constants";

export interface User {
  userId: string;
  language: string;
  createdAt: string;
}

export interface Room {
  roomCode: string;
  roomName: string;
  passwordHash: string;
  ownerId: string;
  createdAt: string;
}

export interface RoomSummary {
  roomCode: string;
  roomName: string;
}

export interface RoomMembership {
  roomCode: string;
  userId: string;
  joinedAt: string;
}

export interface TodoItem {
  id: number;
  /** null for personal (single-user) todos */
  roomCode: string | null;
  userId: string;
  category: Category;
  task: string;
  reminderTime: string | null;
  createdAt: string;
}

export interface NewTodo {
  userId: string;
  category: Category;
  task: string;
  createdAt: string;
}

export type JoinRoomResult =
  | { ok: true; room: RoomSummary; alreadyMember: boolean }
  | { ok: false; reason: "not_found" | "wrong_password" };

export type LeaveRoomResult =
  | { ok: true; room: RoomSummary }
  | { ok: false; reason: "not_found" | "not_a_member" };

export interface ReminderPayload {
  todoId: number;
  userId: string;
  roomCode: string | null;
  roomName: string | null;
  category: Category;
  task: string;
}

/** Outbound side of the messaging transport. */
export interface MessageSink {
  sendMessage(userId: string, text: string): Promise<void>;
}
