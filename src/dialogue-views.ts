/**
 * Reply texts, keyboards and callback tokens produced by the dialogue engine.
 * Transport-neutral: poller.ts renders these into Telegram keyboards.
 */

import { BOT_VERSION, CATEGORIES, Category, CATEGORY_LABELS, ICONS, isCategory, MAX_ROOM_NAME_LENGTH } from "./constants";
import type { RoomOperation } from "./dialogue-state";
import {
  CalendarDate,
  ClockTime,
  formatCalendarDate,
  formatClockTime,
  parseClockTime,
} from "./reminder-time";
import type { ReminderPayload, RoomSummary, TodoItem } from "./types";
import { formatDateTime, truncate } from "./utils";

export interface InlineButton {
  label: string;
  token: string;
}

export type KeyboardSpec =
  | { kind: "menu"; rows: string[][] }
  | { kind: "inline"; rows: InlineButton[][] };

export interface Reply {
  text: string;
  keyboard?: KeyboardSpec;
}

// ============ MAIN MENU ============

export const MENU_LABELS = {
  addTodo: `${ICONS.add} Add todo`,
  listTodos: `${ICONS.list} List todos`,
  deleteTodo: `${ICONS.clear} Delete todo`,
  myRooms: `${ICONS.rooms} My rooms`,
  createRoom: `${ICONS.room} Create room`,
  joinRoom: `${ICONS.key} Join room`,
  leaveRoom: `${ICONS.leave} Leave room`,
  help: `${ICONS.help} Help`,
} as const;

export type MenuAction = keyof typeof MENU_LABELS;

const MENU_ACTIONS: MenuAction[] = [
  "addTodo",
  "listTodos",
  "deleteTodo",
  "myRooms",
  "createRoom",
  "joinRoom",
  "leaveRoom",
  "help",
];

export function parseMenuAction(text: string): MenuAction | undefined {
  const trimmed = text.trim();
  return MENU_ACTIONS.find((action) => MENU_LABELS[action] === trimmed);
}

export function mainMenuKeyboard(): KeyboardSpec {
  return {
    kind: "menu",
    rows: [
      [MENU_LABELS.addTodo, MENU_LABELS.listTodos],
      [MENU_LABELS.deleteTodo, MENU_LABELS.myRooms],
      [MENU_LABELS.createRoom, MENU_LABELS.joinRoom],
      [MENU_LABELS.leaveRoom, MENU_LABELS.help],
    ],
  };
}

// ============ CALLBACK TOKENS ============

export type CallbackAction =
  | { type: "cancel" }
  | { type: "pick_room"; roomCode: string }
  | { type: "add_category"; category: Category }
  | { type: "list_category"; category: Category | "all" }
  | { type: "delete_todo"; todoId: number }
  | { type: "leave_room"; roomCode: string }
  | { type: "remind_set" }
  | { type: "remind_skip" }
  | { type: "remind_date"; day: "today" | "tomorrow" }
  | { type: "remind_time"; clock: ClockTime };

export const CANCEL_TOKEN = "cancel";

export function encodeClockToken(clock: ClockTime): string {
  return `remind_time_${formatClockTime(clock).replace(":", "")}`;
}

function capture(token: string, pattern: RegExp): string | undefined {
  return token.match(pattern)?.[1];
}

export function parseCallbackToken(token: string): CallbackAction | undefined {
  switch (token) {
    case CANCEL_TOKEN:
      return { type: "cancel" };
    case "remind_set":
      return { type: "remind_set" };
    case "remind_skip":
      return { type: "remind_skip" };
    case "remind_date_today":
      return { type: "remind_date", day: "today" };
    case "remind_date_tomorrow":
      return { type: "remind_date", day: "tomorrow" };
  }

  const pickCode = capture(token, /^room_(\d{4})$/);
  if (pickCode) return { type: "pick_room", roomCode: pickCode };

  const leaveCode = capture(token, /^leave_(\d{4})$/);
  if (leaveCode) return { type: "leave_room", roomCode: leaveCode };

  const todoId = capture(token, /^delete_(\d+)$/);
  if (todoId) return { type: "delete_todo", todoId: Number.parseInt(todoId, 10) };

  const addCategory = capture(token, /^add_category_(\w+)$/);
  if (addCategory && isCategory(addCategory)) return { type: "add_category", category: addCategory };

  const listCategory = capture(token, /^list_category_(\w+)$/);
  if (listCategory === "all") return { type: "list_category", category: "all" };
  if (listCategory && isCategory(listCategory)) return { type: "list_category", category: listCategory };

  const time = token.match(/^remind_time_(\d{2})(\d{2})$/);
  if (time) {
    const clock = parseClockTime(`${time[1]}:${time[2]}`);
    if (clock) return { type: "remind_time", clock };
  }

  return undefined;
}

function cancelRow(): InlineButton[] {
  return [{ label: `${ICONS.back} Cancel`, token: CANCEL_TOKEN }];
}

// ============ GENERAL ============

export function welcome(): Reply {
  return {
    text:
      `Hey there! 👋\n\n` +
      `I keep shared todo lists for rooms. Create a room, share its 4-digit code and password, ` +
      `and everyone in it sees (and hears about) new and deleted todos.\n\n` +
      `Use the menu below to get started, or /help for all commands.`,
    keyboard: mainMenuKeyboard(),
  };
}

export function help(): Reply {
  return {
    text: [
      `${ICONS.todo} Room Todo Bot v${BOT_VERSION}`,
      "",
      "Menu buttons:",
      `${MENU_LABELS.addTodo} / ${MENU_LABELS.listTodos} / ${MENU_LABELS.deleteTodo} - todos in your rooms`,
      `${MENU_LABELS.createRoom} / ${MENU_LABELS.joinRoom} / ${MENU_LABELS.leaveRoom} - manage rooms`,
      "",
      "Commands:",
      "/add <task> - add a personal todo",
      "/list - show personal todos",
      "/done <n> - complete personal todo number n",
      "/rooms - rooms you belong to",
      "/cancel - abandon the current step",
      "/id - show your Telegram ID",
    ].join("\n"),
    keyboard: mainMenuKeyboard(),
  };
}

export function menu(): Reply {
  return { text: "What would you like to do?", keyboard: mainMenuKeyboard() };
}

export function cancelled(): Reply {
  return { text: "Okay, cancelled.", keyboard: mainMenuKeyboard() };
}

export function expired(): Reply {
  return { text: `${ICONS.expired} That button has expired. Please start again from the menu.` };
}

export function failure(): Reply {
  return {
    text: `${ICONS.error} Something went wrong on my side. Please try again in a moment.`,
    keyboard: mainMenuKeyboard(),
  };
}

export function useButtons(): Reply {
  return { text: "Please pick one of the buttons above, or send /cancel." };
}

export function unknownInput(): Reply {
  return { text: "I didn't get that. Pick something from the menu below.", keyboard: mainMenuKeyboard() };
}

export function unknownCommand(command: string): Reply {
  return { text: `Unknown command /${command}. Try /help.` };
}

export function userId(id: string): Reply {
  return { text: `Your Telegram ID: ${id}` };
}

// ============ ROOMS ============

export function notInRoom(): Reply {
  return {
    text: `You are not in any room yet. Create one with "${MENU_LABELS.createRoom}" or join with "${MENU_LABELS.joinRoom}".`,
    keyboard: mainMenuKeyboard(),
  };
}

export function noLongerMember(): Reply {
  return { text: `${ICONS.warning} You are no longer a member of that room.`, keyboard: mainMenuKeyboard() };
}

const OPERATION_TITLES: Record<RoomOperation, string> = {
  add: "add a todo to",
  list: "list todos of",
  delete: "delete a todo from",
};

export function roomPicker(rooms: RoomSummary[], operation: RoomOperation, selectedRoomCode?: string): Reply {
  return {
    text: `Which room do you want to ${OPERATION_TITLES[operation]}?`,
    keyboard: {
      kind: "inline",
      rows: [
        ...rooms.map((room) => [
          {
            label: `${room.roomCode === selectedRoomCode ? `${ICONS.star} ` : ""}${room.roomName} (${room.roomCode})`,
            token: `room_${room.roomCode}`,
          },
        ]),
        cancelRow(),
      ],
    },
  };
}

export function myRooms(rooms: RoomSummary[], selectedRoomCode?: string): Reply {
  if (rooms.length === 0) return notInRoom();
  const lines = rooms.map(
    (room) => `${room.roomCode === selectedRoomCode ? ICONS.star : "•"} ${room.roomName} - code ${room.roomCode}`
  );
  return { text: `${ICONS.rooms} Your rooms:\n${lines.join("\n")}`, keyboard: mainMenuKeyboard() };
}

export function roomNamePrompt(): Reply {
  return { text: "What should the new room be called?", keyboard: { kind: "inline", rows: [cancelRow()] } };
}

export function roomNameInvalid(): Reply {
  return { text: `Room names must be 1-${MAX_ROOM_NAME_LENGTH} characters. Try another name.` };
}

export function roomPasswordPrompt(roomName: string): Reply {
  return {
    text: `Choose a password for "${roomName}". Members need it to join.`,
    keyboard: { kind: "inline", rows: [cancelRow()] },
  };
}

export function passwordInvalid(): Reply {
  return { text: "The password can't be empty. Send a password." };
}

export function roomCreated(roomCode: string, roomName: string): Reply {
  return {
    text:
      `${ICONS.success} Room "${roomName}" created!\n\n` +
      `Room code: ${roomCode}\n` +
      `Share the code and password with the people you want to invite.`,
    keyboard: mainMenuKeyboard(),
  };
}

export function roomCodePrompt(): Reply {
  return { text: "Send the 4-digit room code.", keyboard: { kind: "inline", rows: [cancelRow()] } };
}

export function roomCodeInvalid(): Reply {
  return { text: "Room codes are exactly 4 digits, e.g. 0427. Try again." };
}

export function joinPasswordPrompt(roomCode: string): Reply {
  return { text: `Send the password for room ${roomCode}.`, keyboard: { kind: "inline", rows: [cancelRow()] } };
}

export function joined(room: RoomSummary, alreadyMember: boolean): Reply {
  return {
    text: alreadyMember
      ? `You are already a member of "${room.roomName}".`
      : `${ICONS.success} Joined "${room.roomName}" (${room.roomCode}).`,
    keyboard: mainMenuKeyboard(),
  };
}

export function joinFailed(reason: "not_found" | "wrong_password"): Reply {
  return {
    text: reason === "not_found"
      ? `${ICONS.error} There is no room with that code.`
      : `${ICONS.error} Wrong password for that room.`,
    keyboard: mainMenuKeyboard(),
  };
}

export function leavePicker(rooms: RoomSummary[]): Reply {
  if (rooms.length === 0) return notInRoom();
  return {
    text: "Which room do you want to leave?",
    keyboard: {
      kind: "inline",
      rows: [
        ...rooms.map((room) => [{ label: `${ICONS.leave} ${room.roomName} (${room.roomCode})`, token: `leave_${room.roomCode}` }]),
        cancelRow(),
      ],
    },
  };
}

export function left(room: RoomSummary): Reply {
  return { text: `${ICONS.leave} You left "${room.roomName}".`, keyboard: mainMenuKeyboard() };
}

export function leaveFailed(reason: "not_found" | "not_a_member"): Reply {
  return {
    text: reason === "not_found"
      ? `${ICONS.error} That room no longer exists.`
      : `${ICONS.error} You are not a member of that room.`,
    keyboard: mainMenuKeyboard(),
  };
}

// ============ TODOS ============

export function categoryPicker(roomName: string): Reply {
  return {
    text: `Adding to "${roomName}". Pick a category:`,
    keyboard: {
      kind: "inline",
      rows: [
        CATEGORIES.map((category) => ({ label: CATEGORY_LABELS[category], token: `add_category_${category}` })),
        cancelRow(),
      ],
    },
  };
}

export function taskPrompt(category: Category): Reply {
  return {
    text: `${CATEGORY_LABELS[category]} - what needs doing? Send the task text.`,
    keyboard: { kind: "inline", rows: [cancelRow()] },
  };
}

export function taskInvalid(maxLength: number): Reply {
  return { text: `Tasks must be 1-${maxLength} characters. Send the task again.` };
}

export function todoAdded(todo: TodoItem, roomName: string): Reply {
  return {
    text: `${ICONS.success} Added to "${roomName}": ${CATEGORY_LABELS[todo.category]} · ${todo.task}\n\nSet a reminder?`,
    keyboard: {
      kind: "inline",
      rows: [[
        { label: `${ICONS.reminder} Set reminder`, token: "remind_set" },
        { label: "Skip", token: "remind_skip" },
      ]],
    },
  };
}

export function addRefused(): Reply {
  return {
    text: `${ICONS.error} Couldn't add the todo: you are no longer a member of that room.`,
    keyboard: mainMenuKeyboard(),
  };
}

export function listCategoryPicker(roomName: string): Reply {
  return {
    text: `Which todos of "${roomName}" do you want to see?`,
    keyboard: {
      kind: "inline",
      rows: [
        CATEGORIES.map((category) => ({ label: CATEGORY_LABELS[category], token: `list_category_${category}` })),
        [{ label: `${ICONS.list} All`, token: "list_category_all" }],
      ],
    },
  };
}

function describeTodo(todo: TodoItem, index: number): string {
  const reminder = todo.reminderTime ? ` (${ICONS.reminder} ${formatDateTime(new Date(todo.reminderTime))})` : "";
  return `${index + 1}. ${CATEGORY_LABELS[todo.category]} · ${todo.task}${reminder}`;
}

export function todoList(roomName: string, todos: TodoItem[], category?: Category): Reply {
  const scope = category ? CATEGORY_LABELS[category] : "all";
  if (todos.length === 0) {
    return { text: `No todos in "${roomName}" (${scope}) yet.`, keyboard: mainMenuKeyboard() };
  }
  return {
    text: `${ICONS.list} "${roomName}" - ${scope}:\n${todos.map(describeTodo).join("\n")}`,
    keyboard: mainMenuKeyboard(),
  };
}

export function deletePicker(roomName: string, todos: TodoItem[]): Reply {
  return {
    text: `Which todo of "${roomName}" should be deleted?`,
    keyboard: {
      kind: "inline",
      rows: [
        ...todos.map((todo) => [
          { label: `${ICONS.clear} ${truncate(`${CATEGORY_LABELS[todo.category]} ${todo.task}`, 40)}`, token: `delete_${todo.id}` },
        ]),
        cancelRow(),
      ],
    },
  };
}

export function nothingToDelete(roomName: string): Reply {
  return { text: `"${roomName}" has no todos to delete.`, keyboard: mainMenuKeyboard() };
}

export function todoDeleted(): Reply {
  return { text: `${ICONS.success} Todo deleted.`, keyboard: mainMenuKeyboard() };
}

export function deleteFailed(): Reply {
  return { text: `${ICONS.error} That todo is already gone.`, keyboard: mainMenuKeyboard() };
}

// ============ REMINDERS ============

export function reminderDatePrompt(): Reply {
  return {
    text: "Which day? Tap a button or send a date (YYYY-MM-DD).",
    keyboard: {
      kind: "inline",
      rows: [
        [
          { label: "Today", token: "remind_date_today" },
          { label: "Tomorrow", token: "remind_date_tomorrow" },
        ],
        cancelRow(),
      ],
    },
  };
}

export function reminderDateInvalid(reason: "invalid_format" | "invalid_date" | "past_date"): Reply {
  const detail = reason === "past_date"
    ? "That day is already over."
    : reason === "invalid_date"
      ? "That date doesn't exist."
      : "I couldn't read that date.";
  return { text: `${detail} Send a date like 2026-12-24, or "today" / "tomorrow".` };
}

/** Relative phrases count from now, so they are only offered for today. */
export function reminderTimePrompt(date: CalendarDate, presets: ClockTime[], isToday: boolean): Reply {
  const hint = isToday ? `Tap a preset, send HH:MM, or "in 2 hours".` : "Tap a preset or send HH:MM.";
  return {
    text: `What time on ${formatCalendarDate(date)}? ${hint}`,
    keyboard: {
      kind: "inline",
      rows: [
        presets.map((clock) => ({ label: formatClockTime(clock), token: encodeClockToken(clock) })),
        cancelRow(),
      ],
    },
  };
}

export function reminderTimeInvalid(): Reply {
  return { text: `I couldn't read that time. Send HH:MM (e.g. 18:30) or "in 2 hours".` };
}

export function relativeTimeNotToday(date: CalendarDate): Reply {
  return { text: `"in N hours" only works for today. Send a time on ${formatCalendarDate(date)} as HH:MM.` };
}

export function reminderTimePast(): Reply {
  return { text: `${ICONS.warning} That time has already passed. Send a later time.` };
}

export function reminderScheduled(at: Date, task: string): Reply {
  return {
    text: `${ICONS.reminder} Reminder set for ${formatDateTime(at)}: ${task}`,
    keyboard: mainMenuKeyboard(),
  };
}

export function reminderTodoGone(): Reply {
  return { text: `${ICONS.error} That todo was deleted, so no reminder was set.`, keyboard: mainMenuKeyboard() };
}

export function reminderUnavailable(): Reply {
  return { text: `${ICONS.error} Reminders are unavailable right now.`, keyboard: mainMenuKeyboard() };
}

export function reminderSkipped(): Reply {
  return { text: "No reminder. 👍", keyboard: mainMenuKeyboard() };
}

export function reminderNotification(payload: ReminderPayload): string {
  const where = payload.roomName ? ` [${payload.roomName}]` : "";
  return `${ICONS.reminder} Reminder${where}: ${CATEGORY_LABELS[payload.category]} · ${payload.task}`;
}

// ============ PERSONAL TODOS ============

export function personalAddUsage(): Reply {
  return { text: "Please provide a task. Usage: /add Buy groceries" };
}

export function personalAdded(todo: TodoItem): Reply {
  return { text: `Added: ${todo.task}` };
}

export function personalList(todos: TodoItem[]): Reply {
  if (todos.length === 0) return { text: "You have no personal todos!" };
  return { text: `Your todos:\n${todos.map((todo, index) => `${index + 1}. ${todo.task}`).join("\n")}` };
}

export function personalDone(todo: TodoItem): Reply {
  return { text: `Completed: ${todo.task}` };
}

export function personalDoneEmpty(): Reply {
  return { text: "You have no todos to complete!" };
}

export function personalDoneUsage(): Reply {
  return { text: "Please provide a valid todo number. Usage: /done 1" };
}
