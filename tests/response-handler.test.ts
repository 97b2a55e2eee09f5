import { InlineKeyboard, Keyboard } from "grammy";
import { describe, expect, it, vi } from "vitest";
import { mainMenuKeyboard } from "../src/dialogue-views";
import {
  buildReplyMarkup,
  clipForTelegram,
  MAX_MESSAGE_LENGTH,
  ReplyMarkup,
  sendReplies,
} from "../src/response-handler";

describe("buildReplyMarkup", () => {
  it("renders inline rows as callback buttons", () => {
    const markup = buildReplyMarkup({
      kind: "inline",
      rows: [
        [
          { label: "Today", token: "remind_date_today" },
          { label: "Tomorrow", token: "remind_date_tomorrow" },
        ],
        [{ label: "Cancel", token: "cancel" }],
      ],
    });

    expect(markup).toBeInstanceOf(InlineKeyboard);
    if (!(markup instanceof InlineKeyboard)) return;
    expect(markup.inline_keyboard).toEqual([
      [
        { text: "Today", callback_data: "remind_date_today" },
        { text: "Tomorrow", callback_data: "remind_date_tomorrow" },
      ],
      [{ text: "Cancel", callback_data: "cancel" }],
    ]);
  });

  it("renders the main menu as a persistent resized reply keyboard", () => {
    const markup = buildReplyMarkup(mainMenuKeyboard());

    expect(markup).toBeInstanceOf(Keyboard);
    if (!(markup instanceof Keyboard)) return;
    expect(markup.keyboard.map((row) => row.length)).toEqual([2, 2, 2, 2]);
    expect(markup.resize_keyboard).toBe(true);
    expect(markup.is_persistent).toBe(true);
  });
});

describe("sendReplies", () => {
  it("sends replies in order and clips oversized text", async () => {
    const sent: string[] = [];
    const send = vi.fn(async (text: string, _markup?: ReplyMarkup) => {
      sent.push(text);
    });

    await sendReplies(send, [{ text: "first" }, { text: "x".repeat(5000) }]);

    expect(sent).toHaveLength(2);
    expect(sent[0]).toBe("first");
    expect(sent[1]).toHaveLength(MAX_MESSAGE_LENGTH);
    expect(sent[1].endsWith("...")).toBe(true);
    expect(send.mock.calls[0][1]).toBeUndefined();
  });

  it("leaves short text untouched", () => {
    expect(clipForTelegram("hello\nworld")).toBe("hello\nworld");
  });
});
