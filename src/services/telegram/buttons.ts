import { InlineKeyboard } from 'grammy';

export type MenuAction = 'summary' | 'expenses' | 'categories' | 'groups' | 'history' | 'clear';

export function getMainMenuKeyboard(): InlineKeyboard {
  return new InlineKeyboard()
    .text('📊 Summary', 'summary')
    .text('🧾 Expenses', 'expenses')
    .row()
    .text('🏷️ Categories', 'categories')
    .text('👥 Groups', 'groups')
    .row()
    .text('💬 History', 'history')
    .text('🧹 Clear chat', 'clear');
}

export function isMenuAction(data: string): data is MenuAction {
  return ['summary', 'expenses', 'categories', 'groups', 'history', 'clear'].includes(data);
}
