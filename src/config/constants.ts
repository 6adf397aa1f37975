export const GEMINI_MODEL = 'gemini-2.5-flash';
export const GEMINI_RESPONSE_TIMEOUT_MS = 30000;
export const GEMINI_MAX_RETRIES = 2;

export const MAX_CHAT_HISTORY = 50;
export const MAX_CHAT_MESSAGE_LENGTH = 500;

// Google Material Symbol used when a new category comes without a suggested icon
export const DEFAULT_CATEGORY_ICON = 'category';
export const DEFAULT_EXPENSE_DESCRIPTION = 'Unnamed Expense';

// Largest value a SQLite INTEGER column holds
export const MAX_STORED_AMOUNT_CENTS = 9223372036854775807n;

export const DASHBOARD_WINDOW_DAYS = 30;
export const DASHBOARD_RECENT_LIMIT = 10;
export const DASHBOARD_TOP_LIMIT = 5;

export const SUGGESTED_ICONS = [
  'shopping_cart',
  'restaurant',
  'sports_tennis',
  'medical_services',
  'local_gas_station',
  'flight',
  'home',
  'phone',
  'computer',
  'book',
  'music_note',
  'movie',
  'fitness_center',
];
