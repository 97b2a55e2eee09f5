import { Category, CATEGORY_LABELS, DEFAULT_PERSONAL_CATEGORY, ICONS } from "./constants";
import { error, info } from "./logger";
import type { NotificationFanout } from "./notification-fanout";
import type { DataStore } from "./storage";
import type { TodoItem } from "./types";

/**
 * Todo items scoped to a room (shared) or to a single user (personal).
 *
 * Room membership is re-checked by the store on every mutation, inside the same
 * transaction as the write. Successful room mutations are announced to the other
 * members without waiting for delivery.
 */
export class TodoStore {
  constructor(
    private readonly store: DataStore,
    private readonly fanout: NotificationFanout
  ) {}

  /** Resolves undefined when the room is gone or the user is no longer a member. */
  async addTodo(roomCode: string, userId: string, category: Category, task: string): Promise<TodoItem | undefined> {
    await this.store.ensureUser(userId);
    const todo = await this.store.insertRoomTodo(roomCode, {
      userId,
      category,
      task,
      createdAt: new Date().toISOString(),
    });
    if (!todo) {
      info("todos", "add_refused", { roomCode, userId });
      return undefined;
    }

    info("todos", "todo_added", { roomCode, userId, todoId: todo.id, category });
    this.announce(roomCode, userId, (roomName) =>
      `${ICONS.bell} [${roomName}] New ${CATEGORY_LABELS[category]} todo: ${task}`
    );
    return todo;
  }

  listTodos(roomCode: string, category?: Category): Promise<TodoItem[]> {
    return this.store.listRoomTodos(roomCode, category);
  }

  async deleteTodo(roomCode: string, todoId: number, actorId?: string): Promise<boolean> {
    const removed = await this.store.deleteRoomTodo(roomCode, todoId, actorId);
    if (!removed) {
      return false;
    }

    info("todos", "todo_deleted", { roomCode, todoId, actorId });
    this.announce(roomCode, actorId, (roomName) =>
      `${ICONS.clear} [${roomName}] Removed todo: ${removed.task}`
    );
    return true;
  }

  setReminderTime(todoId: number, at: Date): Promise<boolean> {
    return this.store.setReminderTime(todoId, at.toISOString());
  }

  async addPersonalTodo(userId: string, task: string, category: Category = DEFAULT_PERSONAL_CATEGORY): Promise<TodoItem> {
    await this.store.ensureUser(userId);
    const todo = await this.store.insertPersonalTodo({
      userId,
      category,
      task,
      createdAt: new Date().toISOString(),
    });
    info("todos", "personal_todo_added", { userId, todoId: todo.id });
    return todo;
  }

  listPersonalTodos(userId: string): Promise<TodoItem[]> {
    return this.store.listPersonalTodos(userId);
  }

  /** Removes the todo at a 1-based position of the personal listing. */
  async completePersonalTodo(userId: string, position: number): Promise<TodoItem | undefined> {
    const todos = await this.store.listPersonalTodos(userId);
    const target = todos[position - 1];
    if (!Number.isInteger(position) || !target) {
      return undefined;
    }
    return this.store.deletePersonalTodo(userId, target.id);
  }

  private announce(roomCode: string, actorId: string | undefined, describe: (roomName: string) => string): void {
    this.store
      .getRoom(roomCode)
      .then((room) =>
        this.fanout.broadcast(roomCode, describe(room?.roomName ?? roomCode), { excludeUserId: actorId })
      )
      .catch((err) => {
        error("todos", "broadcast_failed", {
          roomCode,
          error: err instanceof Error ? err.message : String(err),
        });
      });
  }
}
