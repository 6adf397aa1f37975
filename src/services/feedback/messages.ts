/**
 * User-facing texts for the chat surface
 */

export const messages = {
  success: {
    manualExpenseAdded: (description: string, amount: string) => `Added: ${description} - ${amount}`,
    categoryAdded: (name: string, icon: string) => `Category added: ${name} (${icon})`,
    categoryUpdated: (name: string, icon: string) => `Category updated: ${name} (${icon})`,
    categoryDeleted: (name: string) => `Category deleted: ${name}. Its expenses are now uncategorized.`,
    groupCreated: (name: string, id: string) => `Group created: ${name}\nShare this id so others can join: ${id}`,
    groupJoined: (name: string) => `You joined ${name}`,
    groupUpdated: (name: string) => `Group updated: ${name}`,
    groupDeleted: (name: string) => `Group deleted: ${name}. Its expenses were removed with it.`,
    expenseUpdated: (line: string) => `Expense updated: ${line}`,
    expenseDeleted: 'Expense deleted.',
    historyCleared: 'Chat history cleared.',
  },

  error: {
    chatFailed: (reason: string) => `❌ Sorry, I couldn't process that: ${reason}`,
    unknownUser: 'Unable to identify user',
    noData: 'No expenses recorded yet.\n\nType an expense like "spent $12 on lunch" to add it.',
    categoryNotFound: (name: string) => `No category named "${name}".`,
    categoryExists: (name: string, icon: string) => `Category already exists: ${name} (${icon})`,
    groupNotFound: 'Group not found.',
    groupNotJoined: (name: string) => `You are not in a group named "${name}".`,
    notGroupMember: 'You are not a member of this group.',
    notGroupCreator: 'Only the group creator can do that.',
    expenseNotFound: 'Expense not found.',
    alreadyMember: 'You are already a member of this group.',
    unexpected: 'Something went wrong. Please try again.',
  },

  info: {
    welcome: 'Welcome! Type your expenses in plain words, e.g. "spent $50 on groceries and $30 on gas".',
    help: [
      'Type expenses in plain words: "lunch 12.50 with Weekend Trip"',
      '/add 20 coffee - Add an expense manually',
      '/expenses [category=Food] [group=Trip] [from=2026-10-01] [to=2026-10-31] - Recent expenses',
      '/edit <id> amount=15 description=Team lunch category=Food group=none - Edit an expense',
      '/summary - Spending overview',
      '/delete <id> - Delete an expense',
      '/categories - Your categories',
      '/category add <name> [icon] - Add a category',
      '/category rename <name> = <new name> - Rename a category',
      '/category icon <name> <icon> - Change a category icon',
      '/category delete <name> - Delete a category',
      '/groups - Your groups',
      '/group create <name> - Create a group',
      '/group join <id> - Join a group',
      '/group <id> - Group details',
      '/group rename <id> <name> - Rename a group you created',
      '/group describe <id> <text> - Describe a group you created',
      '/group delete <id> - Delete a group you created, with its expenses',
      '/history - Recent chat',
      '/clear - Clear chat history',
    ].join('\n'),
    noCategories: 'No categories yet. They are created as you add expenses.',
    noGroups: 'You are not in any group yet. Create one: /group create Weekend Trip',
    noHistory: 'No chat history yet.',
    noMatchingExpenses: 'No expenses match those filters.',
  },
};

/**
 * Format integer cents as a plain decimal ("45.00") without going through floating point.
 */
export function formatDecimal(amountCents: bigint): string {
  const sign = amountCents < 0n ? '-' : '';
  const abs = amountCents < 0n ? -amountCents : amountCents;
  return `${sign}${abs / 100n}.${(abs % 100n).toString().padStart(2, '0')}`;
}

export function formatAmount(amountCents: bigint): string {
  return amountCents < 0n ? `-$${formatDecimal(-amountCents)}` : `$${formatDecimal(amountCents)}`;
}
