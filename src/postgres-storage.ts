import { Pool, PoolClient } from "pg";
import { CATEGORIES, Category, DEFAULT_LANGUAGE, isCategory } from "./constants";
import { StoreError } from "./errors";
import { warn } from "./logger";
import type { DataStore } from "./storage";
import type { NewTodo, Room, RoomSummary, TodoItem } from "./types";

interface RoomRow {
  room_code: string;
  room_name: string;
  password_hash: string;
  owner_id: string;
  created_at: Date;
}

interface TodoRow {
  id: number;
  room_code: string | null;
  user_id: string;
  category: string;
  task: string;
  reminder_time: Date | null;
  created_at: Date;
}

const CATEGORY_ORDER_SQL = `CASE category ${CATEGORIES.map((c, i) => `WHEN '${c}' THEN ${i}`).join(" ")} END`;

const TODO_COLUMNS = "id, room_code, user_id, category, task, reminder_time, created_at";

function rowToRoom(row: RoomRow): Room {
  return {
    roomCode: row.room_code,
    roomName: row.room_name,
    passwordHash: row.password_hash,
    ownerId: row.owner_id,
    createdAt: row.created_at.toISOString(),
  };
}

function rowToTodo(row: TodoRow): TodoItem {
  if (!isCategory(row.category)) {
    throw new StoreError("read_todo", `todo ${row.id} has unknown category "${row.category}"`);
  }
  return {
    id: row.id,
    roomCode: row.room_code,
    userId: row.user_id,
    category: row.category,
    task: row.task,
    reminderTime: row.reminder_time ? row.reminder_time.toISOString() : null,
    createdAt: row.created_at.toISOString(),
  };
}

export class PostgresStore implements DataStore {
  private readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = new Pool({ connectionString: databaseUrl });
  }

  async init(): Promise<void> {
    await this.run("init_schema", () =>
      this.pool.query(`
        CREATE TABLE IF NOT EXISTS users (
          user_id TEXT PRIMARY KEY,
          language TEXT NOT NULL DEFAULT '${DEFAULT_LANGUAGE}',
          created_at TIMESTAMPTZ NOT NULL DEFAULT now()
        );

        CREATE TABLE IF NOT EXISTS rooms (
          room_code TEXT PRIMARY KEY,
          room_name TEXT NOT NULL,
          password_hash TEXT NOT NULL,
          owner_id TEXT NOT NULL REFERENCES users(user_id),
          created_at TIMESTAMPTZ NOT NULL
        );

        CREATE TABLE IF NOT EXISTS room_members (
          room_code TEXT NOT NULL REFERENCES rooms(room_code),
          user_id TEXT NOT NULL REFERENCES users(user_id),
          joined_at TIMESTAMPTZ NOT NULL,
          UNIQUE (room_code, user_id)
        );
        CREATE INDEX IF NOT EXISTS idx_room_members_user ON room_members(user_id, joined_at);

        CREATE TABLE IF NOT EXISTS todos (
          id SERIAL PRIMARY KEY,
          room_code TEXT REFERENCES rooms(room_code),
          user_id TEXT NOT NULL REFERENCES users(user_id),
          category TEXT NOT NULL,
          task TEXT NOT NULL,
          reminder_time TIMESTAMPTZ,
          created_at TIMESTAMPTZ NOT NULL
        );
        CREATE INDEX IF NOT EXISTS idx_todos_room ON todos(room_code, created_at);
        CREATE INDEX IF NOT EXISTS idx_todos_personal ON todos(user_id) WHERE room_code IS NULL;
      `)
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }

  async ensureUser(userId: string, language: string = DEFAULT_LANGUAGE): Promise<void> {
    await this.run("ensure_user", () =>
      this.pool.query(
        "INSERT INTO users(user_id, language, created_at) VALUES ($1,$2,now()) ON CONFLICT (user_id) DO NOTHING",
        [userId, language]
      )
    );
  }

  async getRoom(roomCode: string): Promise<Room | undefined> {
    const { rows } = await this.run("get_room", () =>
      this.pool.query<RoomRow>("SELECT * FROM rooms WHERE room_code = $1", [roomCode])
    );
    return rows[0] ? rowToRoom(rows[0]) : undefined;
  }

  async createRoomWithOwner(room: Room): Promise<boolean> {
    return this.transaction("create_room", async (client) => {
      const inserted = await client.query(
        `INSERT INTO rooms(room_code, room_name, password_hash, owner_id, created_at)
         VALUES ($1,$2,$3,$4,$5)
         ON CONFLICT (room_code) DO NOTHING`,
        [room.roomCode, room.roomName, room.passwordHash, room.ownerId, room.createdAt]
      );
      if (inserted.rowCount === 0) {
        return false;
      }
      await client.query(
        "INSERT INTO room_members(room_code, user_id, joined_at) VALUES ($1,$2,$3)",
        [room.roomCode, room.ownerId, room.createdAt]
      );
      return true;
    });
  }

  async addMember(roomCode: string, userId: string, joinedAt: string): Promise<boolean> {
    const result = await this.run("add_member", () =>
      this.pool.query(
        `INSERT INTO room_members(room_code, user_id, joined_at)
         VALUES ($1,$2,$3)
         ON CONFLICT (room_code, user_id) DO NOTHING`,
        [roomCode, userId, joinedAt]
      )
    );
    return (result.rowCount ?? 0) > 0;
  }

  async removeMember(roomCode: string, userId: string): Promise<boolean> {
    const result = await this.run("remove_member", () =>
      this.pool.query("DELETE FROM room_members WHERE room_code = $1 AND user_id = $2", [roomCode, userId])
    );
    return (result.rowCount ?? 0) > 0;
  }

  async listRoomsForUser(userId: string): Promise<RoomSummary[]> {
    const { rows } = await this.run("list_user_rooms", () =>
      this.pool.query<{ room_code: string; room_name: string }>(
        `SELECT r.room_code, r.room_name
         FROM room_members m JOIN rooms r ON r.room_code = m.room_code
         WHERE m.user_id = $1
         ORDER BY m.joined_at DESC`,
        [userId]
      )
    );
    return rows.map((row) => ({ roomCode: row.room_code, roomName: row.room_name }));
  }

  async listMembers(roomCode: string): Promise<string[]> {
    const { rows } = await this.run("list_members", () =>
      this.pool.query<{ user_id: string }>(
        "SELECT user_id FROM room_members WHERE room_code = $1 ORDER BY joined_at",
        [roomCode]
      )
    );
    return rows.map((row) => row.user_id);
  }

  async insertRoomTodo(roomCode: string, todo: NewTodo): Promise<TodoItem | undefined> {
    return this.transaction("add_todo", async (client) => {
      // Room row lock serializes todo mutations per room; the membership row is
      // share-locked so a concurrent leave waits for this insert to commit.
      const room = await client.query("SELECT 1 FROM rooms WHERE room_code = $1 FOR UPDATE", [roomCode]);
      if (room.rows.length === 0) return undefined;
      if (!(await this.lockMembership(client, roomCode, todo.userId))) return undefined;

      const { rows } = await client.query<TodoRow>(
        `INSERT INTO todos(room_code, user_id, category, task, created_at)
         VALUES ($1,$2,$3,$4,$5)
         RETURNING ${TODO_COLUMNS}`,
        [roomCode, todo.userId, todo.category, todo.task, todo.createdAt]
      );
      return rowToTodo(rows[0]);
    });
  }

  async insertPersonalTodo(todo: NewTodo): Promise<TodoItem> {
    const { rows } = await this.run("add_personal_todo", () =>
      this.pool.query<TodoRow>(
        `INSERT INTO todos(room_code, user_id, category, task, created_at)
         VALUES (NULL,$1,$2,$3,$4)
         RETURNING ${TODO_COLUMNS}`,
        [todo.userId, todo.category, todo.task, todo.createdAt]
      )
    );
    return rowToTodo(rows[0]);
  }

  async listRoomTodos(roomCode: string, category?: Category): Promise<TodoItem[]> {
    const { rows } = await this.run("list_todos", () =>
      this.pool.query<TodoRow>(
        `SELECT ${TODO_COLUMNS} FROM todos
         WHERE room_code = $1 AND ($2::text IS NULL OR category = $2)
         ORDER BY ${CATEGORY_ORDER_SQL}, created_at, id`,
        [roomCode, category ?? null]
      )
    );
    return rows.map(rowToTodo);
  }

  async listPersonalTodos(userId: string): Promise<TodoItem[]> {
    const { rows } = await this.run("list_personal_todos", () =>
      this.pool.query<TodoRow>(
        `SELECT ${TODO_COLUMNS} FROM todos
         WHERE room_code IS NULL AND user_id = $1
         ORDER BY ${CATEGORY_ORDER_SQL}, created_at, id`,
        [userId]
      )
    );
    return rows.map(rowToTodo);
  }

  async deleteRoomTodo(roomCode: string, todoId: number, actorId?: string): Promise<TodoItem | undefined> {
    return this.transaction("delete_todo", async (client) => {
      const room = await client.query("SELECT 1 FROM rooms WHERE room_code = $1 FOR UPDATE", [roomCode]);
      if (room.rows.length === 0) return undefined;
      if (actorId !== undefined && !(await this.lockMembership(client, roomCode, actorId))) {
        return undefined;
      }
      const { rows } = await client.query<TodoRow>(
        `DELETE FROM todos WHERE id = $1 AND room_code = $2 RETURNING ${TODO_COLUMNS}`,
        [todoId, roomCode]
      );
      return rows[0] ? rowToTodo(rows[0]) : undefined;
    });
  }

  async deletePersonalTodo(userId: string, todoId: number): Promise<TodoItem | undefined> {
    const { rows } = await this.run("delete_personal_todo", () =>
      this.pool.query<TodoRow>(
        `DELETE FROM todos WHERE id = $1 AND user_id = $2 AND room_code IS NULL RETURNING ${TODO_COLUMNS}`,
        [todoId, userId]
      )
    );
    return rows[0] ? rowToTodo(rows[0]) : undefined;
  }

  async setReminderTime(todoId: number, reminderTime: string): Promise<boolean> {
    const result = await this.run("set_reminder_time", () =>
      this.pool.query("UPDATE todos SET reminder_time = $2 WHERE id = $1", [todoId, reminderTime])
    );
    return (result.rowCount ?? 0) > 0;
  }

  private async lockMembership(client: PoolClient, roomCode: string, userId: string): Promise<boolean> {
    const { rows } = await client.query(
      "SELECT 1 FROM room_members WHERE room_code = $1 AND user_id = $2 FOR SHARE",
      [roomCode, userId]
    );
    return rows.length > 0;
  }

  private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (err) {
      throw err instanceof StoreError ? err : new StoreError(operation, err);
    }
  }

  private async transaction<T>(operation: string, fn: (client: PoolClient) => Promise<T>): Promise<T> {
    const client = await this.run(operation, () => this.pool.connect());
    try {
      await client.query("BEGIN");
      const result = await fn(client);
      await client.query("COMMIT");
      return result;
    } catch (err) {
      try {
        await client.query("ROLLBACK");
      } catch (rollbackErr) {
        warn("storage", "rollback_failed", {
          operation,
          error: rollbackErr instanceof Error ? rollbackErr.message : String(rollbackErr),
        });
      }
      throw err instanceof StoreError ? err : new StoreError(operation, err);
    } finally {
      client.release();
    }
  }
}
