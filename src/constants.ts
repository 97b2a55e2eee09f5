/**
 * Constants for the room todo bot
 */

export const BOT_VERSION = "1.0.0";

export const ICONS = {
  // Status
  success: "✅", error: "❌", warning: "⚠️", expired: "⌛",
  // Domain
  todo: "📝", reminder: "⏰", room: "🏠", key: "🔑",
  rooms: "🏘️", leave: "🚪", star: "⭐", bell: "🔔",
  // Actions
  add: "➕", list: "📋", clear: "🗑️", back: "◀️", help: "❓",
};

/** Closed category set, in listing rank order. */
export const CATEGORIES = ["game", "movie", "action"] as const;

export type Category = (typeof CATEGORIES)[number];

export const CATEGORY_LABELS: Record<Category, string> = {
  game: "🎮 Game",
  movie: "🎬 Movie",
  action: "⚡ Action",
};

export const DEFAULT_PERSONAL_CATEGORY: Category = "action";

export const DEFAULT_LANGUAGE = "en";

export function isCategory(value: string): value is Category {
  return CATEGORIES.some((category) => category === value);
}

export function categoryRank(category: Category): number {
  return CATEGORIES.indexOf(category);
}

export const ROOM_CODE_LENGTH = 4;

export const MAX_ROOM_NAME_LENGTH = 64;
