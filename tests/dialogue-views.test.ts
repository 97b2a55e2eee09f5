import { describe, expect, it } from "vitest";
import {
  encodeClockToken,
  MENU_LABELS,
  parseCallbackToken,
  parseMenuAction,
  reminderNotification,
  todoList,
} from "../src/dialogue-views";
import type { TodoItem } from "../src/types";

describe("parseCallbackToken", () => {
  it("decodes every button family", () => {
    expect(parseCallbackToken("cancel")).toEqual({ type: "cancel" });
    expect(parseCallbackToken("room_0427")).toEqual({ type: "pick_room", roomCode: "0427" });
    expect(parseCallbackToken("leave_4821")).toEqual({ type: "leave_room", roomCode: "4821" });
    expect(parseCallbackToken("delete_17")).toEqual({ type: "delete_todo", todoId: 17 });
    expect(parseCallbackToken("add_category_movie")).toEqual({ type: "add_category", category: "movie" });
    expect(parseCallbackToken("list_category_all")).toEqual({ type: "list_category", category: "all" });
    expect(parseCallbackToken("remind_date_tomorrow")).toEqual({ type: "remind_date", day: "tomorrow" });
    expect(parseCallbackToken("remind_time_1830")).toEqual({ type: "remind_time", clock: { hour: 18, minute: 30 } });
  });

  it("rejects unknown or malformed tokens", () => {
    for (const token of ["", "room_123", "add_category_all", "list_category_book", "remind_time_2460", "delete_x"]) {
      expect(parseCallbackToken(token)).toBeUndefined();
    }
  });

  it("reads back the clock tokens it writes", () => {
    expect(encodeClockToken({ hour: 9, minute: 5 })).toBe("remind_time_0905");
    expect(parseCallbackToken(encodeClockToken({ hour: 9, minute: 5 }))).toEqual({
      type: "remind_time",
      clock: { hour: 9, minute: 5 },
    });
  });
});

describe("parseMenuAction", () => {
  it("matches menu labels exactly, ignoring surrounding whitespace", () => {
    expect(parseMenuAction(MENU_LABELS.joinRoom)).toBe("joinRoom");
    expect(parseMenuAction(` ${MENU_LABELS.help} `)).toBe("help");
    expect(parseMenuAction("Join room")).toBeUndefined();
  });
});

describe("message texts", () => {
  it("omits the room tag for personal reminders", () => {
    expect(
      reminderNotification({ todoId: 1, userId: "A", roomCode: null, roomName: null, category: "game", task: "chess" })
    ).toBe("⏰ Reminder: 🎮 Game · chess");
  });

  it("shows the reminder time next to a listed todo", () => {
    const todo: TodoItem = {
      id: 3,
      roomCode: "4821",
      userId: "A",
      category: "action",
      task: "book flights",
      reminderTime: new Date(2026, 9, 18, 11, 0).toISOString(),
      createdAt: new Date(2026, 9, 18, 10, 0).toISOString(),
    };

    expect(todoList("Trip", [todo], "action").text).toBe(
      '📋 "Trip" - ⚡ Action:\n1. ⚡ Action · book flights (⏰ 2026-10-18 11:00)'
    );
  });
});
