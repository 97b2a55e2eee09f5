import { Category, MAX_ROOM_NAME_LENGTH } from "./constants";
import { DialogueSessions, DialogueState, expectsText, RoomOperation } from "./dialogue-state";
import * as views from "./dialogue-views";
import type { MenuAction, Reply } from "./dialogue-views";
import { debug, error, info } from "./logger";
import type { ReminderScheduler } from "./reminder-scheduler";
import {
  addDays,
  calendarDateOf,
  ClockTime,
  CalendarDate,
  combineDateAndTime,
  compareDates,
  parseClockTime,
  parseRelativeOffset,
  parseReminderDate,
} from "./reminder-time";
import type { RoomStore } from "./room-store";
import type { TodoStore } from "./todo-store";
import type { ReminderPayload, RoomSummary } from "./types";

const ROOM_CODE_PATTERN = /^\d{4}$/;
const DEFAULT_MAX_TASK_LENGTH = 1000;
const DEFAULT_TIME_PRESETS = ["09:00", "12:00", "18:00", "21:00"];

export interface DialogueEngineOptions {
  rooms: RoomStore;
  todos: TodoStore;
  reminders: ReminderScheduler<ReminderPayload>;
  sessions?: DialogueSessions;
  /** "HH:MM" strings offered as reminder time buttons. */
  timePresets?: string[];
  maxTaskLength?: number;
}

function isToday(date: CalendarDate): boolean {
  return compareDates(date, calendarDateOf(new Date())) === 0;
}

type StateOf<K extends DialogueState["kind"]> = Extract<DialogueState, { kind: K }>;

/**
 * Per-user conversation state machine. Every entry point returns the replies to
 * send back to the user; errors never escape, they reset the user to idle.
 */
export class DialogueEngine {
  readonly sessions: DialogueSessions;
  private readonly rooms: RoomStore;
  private readonly todos: TodoStore;
  private readonly reminders: ReminderScheduler<ReminderPayload>;
  private readonly timePresets: ClockTime[];
  private readonly maxTaskLength: number;

  constructor(options: DialogueEngineOptions) {
    this.rooms = options.rooms;
    this.todos = options.todos;
    this.reminders = options.reminders;
    this.sessions = options.sessions ?? new DialogueSessions();
    this.maxTaskLength = options.maxTaskLength ?? DEFAULT_MAX_TASK_LENGTH;
    this.timePresets = (options.timePresets ?? DEFAULT_TIME_PRESETS)
      .map((preset) => parseClockTime(preset))
      .filter((clock): clock is ClockTime => clock !== undefined);
  }

  handleCommand(userId: string, command: string, args = ""): Promise<Reply[]> {
    return this.guard(userId, `command:${command}`, () => this.dispatchCommand(userId, command, args.trim()));
  }

  handleText(userId: string, text: string): Promise<Reply[]> {
    return this.guard(userId, "text", () => this.dispatchText(userId, text));
  }

  handleCallback(userId: string, token: string): Promise<Reply[]> {
    return this.guard(userId, `callback:${token}`, () => this.dispatchCallback(userId, token));
  }

  private async guard(userId: string, event: string, run: () => Promise<Reply[]>): Promise<Reply[]> {
    try {
      return await run();
    } catch (err) {
      error("dialogue", "event_failed", {
        userId,
        event,
        state: this.sessions.getState(userId).kind,
        error: err instanceof Error ? err.message : String(err),
      });
      this.sessions.reset(userId);
      return [views.failure()];
    }
  }

  // ============ COMMANDS ============

  private async dispatchCommand(userId: string, command: string, args: string): Promise<Reply[]> {
    switch (command) {
      case "start":
        this.sessions.reset(userId);
        return [views.welcome()];
      case "help":
        return [views.help()];
      case "menu":
        return [views.menu()];
      case "cancel":
        this.sessions.reset(userId);
        return [views.cancelled()];
      case "rooms":
        return [await this.describeRooms(userId)];
      case "id":
        return [views.userId(userId)];
      case "add":
        return [await this.addPersonal(userId, args)];
      case "list":
        return [views.personalList(await this.todos.listPersonalTodos(userId))];
      case "done":
        return [await this.completePersonal(userId, args)];
      default:
        return [views.unknownCommand(command)];
    }
  }

  private async addPersonal(userId: string, task: string): Promise<Reply> {
    if (!task) return views.personalAddUsage();
    if (task.length > this.maxTaskLength) return views.taskInvalid(this.maxTaskLength);
    const todo = await this.todos.addPersonalTodo(userId, task);
    return views.personalAdded(todo);
  }

  private async completePersonal(userId: string, args: string): Promise<Reply> {
    const todos = await this.todos.listPersonalTodos(userId);
    if (todos.length === 0) return views.personalDoneEmpty();

    if (args && !/^\d+$/.test(args)) return views.personalDoneUsage();
    const position = args ? Number.parseInt(args, 10) : 1;
    if (position < 1 || position > todos.length) {
      return views.personalDoneUsage();
    }
    const done = await this.todos.completePersonalTodo(userId, position);
    return done ? views.personalDone(done) : views.personalDoneUsage();
  }

  // ============ FREE TEXT ============

  private async dispatchText(userId: string, text: string): Promise<Reply[]> {
    const state = this.sessions.getState(userId);
    if (expectsText(state)) {
      return this.handleStateText(userId, state, text);
    }

    const action = views.parseMenuAction(text);
    if (action) {
      return this.handleMenu(userId, action);
    }
    return [state.kind === "idle" ? views.unknownInput() : views.useButtons()];
  }

  private async handleMenu(userId: string, action: MenuAction): Promise<Reply[]> {
    debug("dialogue", "menu", { userId, action });
    switch (action) {
      case "addTodo":
        return this.startRoomOperation(userId, "add");
      case "listTodos":
        return this.startRoomOperation(userId, "list");
      case "deleteTodo":
        return this.startRoomOperation(userId, "delete");
      case "myRooms":
        this.sessions.reset(userId);
        return [await this.describeRooms(userId)];
      case "createRoom":
        this.sessions.setState(userId, { kind: "entering_room_name" });
        return [views.roomNamePrompt()];
      case "joinRoom":
        this.sessions.setState(userId, { kind: "entering_room_code" });
        return [views.roomCodePrompt()];
      case "leaveRoom":
        this.sessions.reset(userId);
        return [views.leavePicker(await this.rooms.listUserRooms(userId))];
      case "help":
        this.sessions.reset(userId);
        return [views.help()];
    }
  }

  private async handleStateText(userId: string, state: DialogueState, text: string): Promise<Reply[]> {
    switch (state.kind) {
      case "entering_task":
        return this.receiveTask(userId, state, text.trim());
      case "entering_reminder_date":
        return this.receiveReminderDate(userId, state, text);
      case "entering_reminder_time":
        return this.receiveReminderTime(userId, state, text);
      case "entering_room_name":
        return this.receiveRoomName(userId, text.trim());
      case "entering_room_password":
        return this.receiveRoomPassword(userId, state, text.trim());
      case "entering_room_code":
        return this.receiveRoomCode(userId, text.trim());
      case "entering_join_password":
        return this.receiveJoinPassword(userId, state, text.trim());
      default:
        return [views.useButtons()];
    }
  }

  // ============ CALLBACKS ============

  private async dispatchCallback(userId: string, token: string): Promise<Reply[]> {
    const action = views.parseCallbackToken(token);
    if (!action) {
      info("dialogue", "unknown_callback", { userId, token });
      return [views.expired()];
    }

    const state = this.sessions.getState(userId);
    switch (action.type) {
      case "cancel":
        this.sessions.reset(userId);
        return [views.cancelled()];

      case "leave_room":
        return [await this.leave(userId, action.roomCode)];

      case "pick_room":
        if (state.kind !== "selecting_room_for_operation") return this.expired(userId, token);
        return this.pickRoom(userId, state.operation, action.roomCode);

      case "add_category":
        if (state.kind !== "choosing_category") return this.expired(userId, token);
        this.sessions.setState(userId, { kind: "entering_task", roomCode: state.roomCode, category: action.category });
        return [views.taskPrompt(action.category)];

      case "list_category":
        if (state.kind !== "choosing_list_category") return this.expired(userId, token);
        return this.showList(userId, state.roomCode, action.category === "all" ? undefined : action.category);

      case "delete_todo":
        if (state.kind !== "choosing_todo_to_delete") return this.expired(userId, token);
        return this.deleteTodo(userId, state.roomCode, action.todoId);

      case "remind_set":
        if (state.kind !== "deciding_reminder") return this.expired(userId, token);
        this.sessions.setState(userId, { kind: "entering_reminder_date", draft: state.draft });
        return [views.reminderDatePrompt()];

      case "remind_skip":
        if (state.kind !== "deciding_reminder") return this.expired(userId, token);
        this.sessions.reset(userId);
        return [views.reminderSkipped()];

      case "remind_date": {
        if (state.kind !== "entering_reminder_date") return this.expired(userId, token);
        const today = calendarDateOf(new Date());
        const date = action.day === "today" ? today : addDays(today, 1);
        this.sessions.setState(userId, { kind: "entering_reminder_time", draft: state.draft, date });
        return [views.reminderTimePrompt(date, this.timePresets, action.day === "today")];
      }

      case "remind_time":
        if (state.kind !== "entering_reminder_time") return this.expired(userId, token);
        return this.scheduleReminder(userId, state, combineDateAndTime(state.date, action.clock));
    }
  }

  private expired(userId: string, token: string): Reply[] {
    info("dialogue", "expired_callback", { userId, token, state: this.sessions.getState(userId).kind });
    return [views.expired()];
  }

  // ============ ROOM OPERATIONS ============

  private async startRoomOperation(userId: string, operation: RoomOperation): Promise<Reply[]> {
    const rooms = await this.rooms.listUserRooms(userId);
    if (rooms.length === 0) {
      this.sessions.reset(userId);
      return [views.notInRoom()];
    }
    if (rooms.length === 1) {
      return this.beginOperation(userId, operation, rooms[0]);
    }

    const selected = this.sessions.getSelectedRoom(userId);
    const ordered = [
      ...rooms.filter((room) => room.roomCode === selected),
      ...rooms.filter((room) => room.roomCode !== selected),
    ];
    this.sessions.setState(userId, { kind: "selecting_room_for_operation", operation });
    return [views.roomPicker(ordered, operation, selected)];
  }

  private async pickRoom(userId: string, operation: RoomOperation, roomCode: string): Promise<Reply[]> {
    const rooms = await this.rooms.listUserRooms(userId);
    const room = rooms.find((candidate) => candidate.roomCode === roomCode);
    if (!room) {
      this.sessions.reset(userId);
      return [views.noLongerMember()];
    }
    this.sessions.selectRoom(userId, roomCode);
    return this.beginOperation(userId, operation, room);
  }

  private async beginOperation(userId: string, operation: RoomOperation, room: RoomSummary): Promise<Reply[]> {
    switch (operation) {
      case "add":
        this.sessions.setState(userId, { kind: "choosing_category", roomCode: room.roomCode });
        return [views.categoryPicker(room.roomName)];
      case "list":
        this.sessions.setState(userId, { kind: "choosing_list_category", roomCode: room.roomCode });
        return [views.listCategoryPicker(room.roomName)];
      case "delete": {
        const todos = await this.todos.listTodos(room.roomCode);
        if (todos.length === 0) {
          this.sessions.reset(userId);
          return [views.nothingToDelete(room.roomName)];
        }
        this.sessions.setState(userId, { kind: "choosing_todo_to_delete", roomCode: room.roomCode });
        return [views.deletePicker(room.roomName, todos)];
      }
    }
  }

  private async showList(userId: string, roomCode: string, category?: Category): Promise<Reply[]> {
    const todos = await this.todos.listTodos(roomCode, category);
    const roomName = (await this.rooms.getRoomName(roomCode)) ?? roomCode;
    this.sessions.reset(userId);
    return [views.todoList(roomName, todos, category)];
  }

  private async deleteTodo(userId: string, roomCode: string, todoId: number): Promise<Reply[]> {
    const deleted = await this.todos.deleteTodo(roomCode, todoId, userId);
    this.sessions.reset(userId);
    return [deleted ? views.todoDeleted() : views.deleteFailed()];
  }

  private async receiveTask(userId: string, state: StateOf<"entering_task">, task: string): Promise<Reply[]> {
    if (!task || task.length > this.maxTaskLength) {
      return [views.taskInvalid(this.maxTaskLength)];
    }

    const todo = await this.todos.addTodo(state.roomCode, userId, state.category, task);
    if (!todo) {
      this.sessions.reset(userId);
      return [views.addRefused()];
    }

    this.sessions.setState(userId, {
      kind: "deciding_reminder",
      draft: { todoId: todo.id, roomCode: state.roomCode, category: todo.category, task: todo.task },
    });
    const roomName = (await this.rooms.getRoomName(state.roomCode)) ?? state.roomCode;
    return [views.todoAdded(todo, roomName)];
  }

  // ============ REMINDERS ============

  private async receiveReminderDate(userId: string, state: StateOf<"entering_reminder_date">, text: string): Promise<Reply[]> {
    const parsed = parseReminderDate(text, new Date());
    if (!parsed.ok) {
      return [views.reminderDateInvalid(parsed.reason)];
    }
    this.sessions.setState(userId, { kind: "entering_reminder_time", draft: state.draft, date: parsed.date });
    return [views.reminderTimePrompt(parsed.date, this.timePresets, isToday(parsed.date))];
  }

  private async receiveReminderTime(userId: string, state: StateOf<"entering_reminder_time">, text: string): Promise<Reply[]> {
    const offset = parseRelativeOffset(text);
    if (offset !== undefined) {
      if (!isToday(state.date)) return [views.relativeTimeNotToday(state.date)];
      return this.scheduleReminder(userId, state, new Date(Date.now() + offset));
    }
    const clock = parseClockTime(text);
    if (!clock) {
      return [views.reminderTimeInvalid()];
    }
    return this.scheduleReminder(userId, state, combineDateAndTime(state.date, clock));
  }

  private async scheduleReminder(userId: string, state: StateOf<"entering_reminder_time">, at: Date): Promise<Reply[]> {
    if (at.getTime() <= Date.now()) {
      return [views.reminderTimePast()];
    }

    const { draft } = state;
    const roomName = (await this.rooms.getRoomName(draft.roomCode)) ?? null;
    const scheduled = this.reminders.schedule(at, {
      todoId: draft.todoId,
      userId,
      roomCode: draft.roomCode,
      roomName,
      category: draft.category,
      task: draft.task,
    });
    if (!scheduled.ok) {
      if (scheduled.reason === "not_future") return [views.reminderTimePast()];
      this.sessions.reset(userId);
      return [views.reminderUnavailable()];
    }

    let saved: boolean;
    try {
      saved = await this.todos.setReminderTime(draft.todoId, at);
    } catch (err) {
      this.reminders.cancel(scheduled.handle);
      throw err;
    }
    if (!saved) {
      // Another member deleted the todo while this user was picking a time.
      this.reminders.cancel(scheduled.handle);
      this.sessions.reset(userId);
      info("dialogue", "reminder_todo_gone", { userId, todoId: draft.todoId });
      return [views.reminderTodoGone()];
    }

    this.sessions.reset(userId);
    return [views.reminderScheduled(at, draft.task)];
  }

  // ============ ROOM MANAGEMENT ============

  private async receiveRoomName(userId: string, roomName: string): Promise<Reply[]> {
    if (!roomName || roomName.length > MAX_ROOM_NAME_LENGTH) {
      return [views.roomNameInvalid()];
    }
    this.sessions.setState(userId, { kind: "entering_room_password", roomName });
    return [views.roomPasswordPrompt(roomName)];
  }

  private async receiveRoomPassword(userId: string, state: StateOf<"entering_room_password">, password: string): Promise<Reply[]> {
    if (!password) {
      return [views.passwordInvalid()];
    }
    const roomCode = await this.rooms.createRoom(state.roomName, password, userId);
    this.sessions.reset(userId);
    this.sessions.selectRoom(userId, roomCode);
    return [views.roomCreated(roomCode, state.roomName)];
  }

  private async receiveRoomCode(userId: string, roomCode: string): Promise<Reply[]> {
    if (!ROOM_CODE_PATTERN.test(roomCode)) {
      return [views.roomCodeInvalid()];
    }
    this.sessions.setState(userId, { kind: "entering_join_password", roomCode });
    return [views.joinPasswordPrompt(roomCode)];
  }

  private async receiveJoinPassword(userId: string, state: StateOf<"entering_join_password">, password: string): Promise<Reply[]> {
    const result = await this.rooms.joinRoom(state.roomCode, password, userId);
    this.sessions.reset(userId);
    if (!result.ok) {
      return [views.joinFailed(result.reason)];
    }
    return [views.joined(result.room, result.alreadyMember)];
  }

  private async leave(userId: string, roomCode: string): Promise<Reply> {
    const result = await this.rooms.leaveRoom(roomCode, userId);
    if (!result.ok) {
      return views.leaveFailed(result.reason);
    }
    this.sessions.clearSelectedRoom(userId, roomCode);
    return views.left(result.room);
  }

  private async describeRooms(userId: string): Promise<Reply> {
    const rooms = await this.rooms.listUserRooms(userId);
    return views.myRooms(rooms, this.sessions.getSelectedRoom(userId));
  }
}
