/**
 * Persistent store contract shared by RoomStore and TodoStore, plus the
 * in-memory implementation used for tests and STORAGE_DRIVER=memory.
 */

import { Category, categoryRank, DEFAULT_LANGUAGE } from "./constants";
import { ConfigurationError } from "./errors";
import { PostgresStore } from "./postgres-storage";
import type { NewTodo, Room, RoomMembership, RoomSummary, TodoItem, User } from "./types";

export type StoreKind = "memory" | "postgres";

export interface DataStore {
  init(): Promise<void>;
  close(): Promise<void>;

  /** Insert-if-absent; users are created lazily on their first write. */
  ensureUser(userId: string, language?: string): Promise<void>;

  getRoom(roomCode: string): Promise<Room | undefined>;
  /** Atomically inserts the room and the owner's membership. False when the code is taken. */
  createRoomWithOwner(room: Room): Promise<boolean>;

  /** Idempotent. Resolves true when a new membership row was inserted. */
  addMember(roomCode: string, userId: string, joinedAt: string): Promise<boolean>;
  removeMember(roomCode: string, userId: string): Promise<boolean>;
  /** Most recently joined first. */
  listRoomsForUser(userId: string): Promise<RoomSummary[]>;
  listMembers(roomCode: string): Promise<string[]>;

  /** Inserts only if the room exists and the author is a member at commit time. */
  insertRoomTodo(roomCode: string, todo: NewTodo): Promise<TodoItem | undefined>;
  insertPersonalTodo(todo: NewTodo): Promise<TodoItem>;
  /** Ordered by category rank, creation time, id. */
  listRoomTodos(roomCode: string, category?: Category): Promise<TodoItem[]>;
  listPersonalTodos(userId: string): Promise<TodoItem[]>;
  /** When actorId is given, the actor must currently be a member of the room. */
  deleteRoomTodo(roomCode: string, todoId: number, actorId?: string): Promise<TodoItem | undefined>;
  deletePersonalTodo(userId: string, todoId: number): Promise<TodoItem | undefined>;
  setReminderTime(todoId: number, reminderTime: string): Promise<boolean>;
}

export function compareTodos(a: TodoItem, b: TodoItem): number {
  return (
    categoryRank(a.category) - categoryRank(b.category) ||
    a.createdAt.localeCompare(b.createdAt) ||
    a.id - b.id
  );
}

interface StoredMembership extends RoomMembership {
  seq: number;
}

function membershipKey(roomCode: string, userId: string): string {
  return `${roomCode}:${userId}`;
}

export class InMemoryStore implements DataStore {
  users = new Map<string, User>();
  rooms = new Map<string, Room>();
  memberships = new Map<string, StoredMembership>();
  todos = new Map<number, TodoItem>();

  private nextTodoId = 1;
  private membershipSeq = 0;

  async init(): Promise<void> {}

  async close(): Promise<void> {}

  async ensureUser(userId: string, language: string = DEFAULT_LANGUAGE): Promise<void> {
    if (this.users.has(userId)) return;
    this.users.set(userId, { userId, language, createdAt: new Date().toISOString() });
  }

  async getRoom(roomCode: string): Promise<Room | undefined> {
    const room = this.rooms.get(roomCode);
    return room ? { ...room } : undefined;
  }

  async createRoomWithOwner(room: Room): Promise<boolean> {
    if (this.rooms.has(room.roomCode)) {
      return false;
    }
    this.rooms.set(room.roomCode, { ...room });
    this.insertMembership(room.roomCode, room.ownerId, room.createdAt);
    return true;
  }

  async addMember(roomCode: string, userId: string, joinedAt: string): Promise<boolean> {
    if (!this.rooms.has(roomCode) || this.memberships.has(membershipKey(roomCode, userId))) {
      return false;
    }
    this.insertMembership(roomCode, userId, joinedAt);
    return true;
  }

  async removeMember(roomCode: string, userId: string): Promise<boolean> {
    return this.memberships.delete(membershipKey(roomCode, userId));
  }

  async listRoomsForUser(userId: string): Promise<RoomSummary[]> {
    const joined = [...this.memberships.values()]
      .filter((m) => m.userId === userId)
      .sort((a, b) => b.joinedAt.localeCompare(a.joinedAt) || b.seq - a.seq);

    const result: RoomSummary[] = [];
    for (const membership of joined) {
      const room = this.rooms.get(membership.roomCode);
      if (room) {
        result.push({ roomCode: room.roomCode, roomName: room.roomName });
      }
    }
    return result;
  }

  async listMembers(roomCode: string): Promise<string[]> {
    return [...this.memberships.values()]
      .filter((m) => m.roomCode === roomCode)
      .sort((a, b) => a.seq - b.seq)
      .map((m) => m.userId);
  }

  async insertRoomTodo(roomCode: string, todo: NewTodo): Promise<TodoItem | undefined> {
    if (!this.rooms.has(roomCode) || !this.memberships.has(membershipKey(roomCode, todo.userId))) {
      return undefined;
    }
    return this.insertTodo(roomCode, todo);
  }

  async insertPersonalTodo(todo: NewTodo): Promise<TodoItem> {
    return this.insertTodo(null, todo);
  }

  async listRoomTodos(roomCode: string, category?: Category): Promise<TodoItem[]> {
    return [...this.todos.values()]
      .filter((t) => t.roomCode === roomCode && (category === undefined || t.category === category))
      .sort(compareTodos)
      .map((t) => ({ ...t }));
  }

  async listPersonalTodos(userId: string): Promise<TodoItem[]> {
    return [...this.todos.values()]
      .filter((t) => t.roomCode === null && t.userId === userId)
      .sort(compareTodos)
      .map((t) => ({ ...t }));
  }

  async deleteRoomTodo(roomCode: string, todoId: number, actorId?: string): Promise<TodoItem | undefined> {
    const todo = this.todos.get(todoId);
    if (!todo || todo.roomCode !== roomCode) {
      return undefined;
    }
    if (actorId !== undefined && !this.memberships.has(membershipKey(roomCode, actorId))) {
      return undefined;
    }
    this.todos.delete(todoId);
    return { ...todo };
  }

  async deletePersonalTodo(userId: string, todoId: number): Promise<TodoItem | undefined> {
    const todo = this.todos.get(todoId);
    if (!todo || todo.roomCode !== null || todo.userId !== userId) {
      return undefined;
    }
    this.todos.delete(todoId);
    return { ...todo };
  }

  async setReminderTime(todoId: number, reminderTime: string): Promise<boolean> {
    const todo = this.todos.get(todoId);
    if (!todo) return false;
    todo.reminderTime = reminderTime;
    return true;
  }

  private insertMembership(roomCode: string, userId: string, joinedAt: string): void {
    this.memberships.set(membershipKey(roomCode, userId), {
      roomCode,
      userId,
      joinedAt,
      seq: this.membershipSeq++,
    });
  }

  private insertTodo(roomCode: string | null, todo: NewTodo): TodoItem {
    const item: TodoItem = {
      id: this.nextTodoId++,
      roomCode,
      userId: todo.userId,
      category: todo.category,
      task: todo.task,
      reminderTime: null,
      createdAt: todo.createdAt,
    };
    this.todos.set(item.id, item);
    return { ...item };
  }
}

export function createStorage(params: { kind: StoreKind; databaseUrl?: string }): DataStore {
  if (params.kind === "memory") {
    return new InMemoryStore();
  }
  if (!params.databaseUrl) {
    throw new ConfigurationError("DATABASE_URL is required when using the postgres store");
  }
  return new PostgresStore(params.databaseUrl);
}
