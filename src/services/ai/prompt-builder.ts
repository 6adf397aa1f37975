import { SUGGESTED_ICONS } from '../../config/constants';
import type { PromptCategory, PromptGroup } from '../../types/ai';

/**
 * Build the extraction prompt for a chat message. The output depends only on
 * the arguments, so the same input always yields the same prompt text.
 */
export function buildExpenseParsingPrompt(
  userInput: string,
  groups: PromptGroup[],
  categories: PromptCategory[],
): string {
  const groupsStr = groups.length > 0 ? groups.map(g => g.name).join(', ') : 'No groups';
  const categoriesStr = categories.length > 0
    ? categories.map(c => `${c.name} (${c.icon})`).join(', ')
    : 'No categories';

  return `You are an assistant that extracts expense records from natural language.

User Input: "${userInput}"

Existing User Groups: ${groupsStr}
Existing User Categories: ${categoriesStr}

TASK: Extract ALL expenses mentioned in the user input. One sentence may describe several expenses.

For EACH expense, extract:
1. amount (numeric value only, no currency symbols)
2. description (short description of what was paid for)
3. category_name (an existing category if one fits, otherwise a new category name)
4. group_name (an existing group if the user mentions one, otherwise null)
5. is_new_category (true only if category_name is not in the existing list)
6. suggested_icon (a Google Material Symbol name when is_new_category is true, otherwise null)

RULES:
- Prefer existing categories and groups over inventing new ones
- Match group names case-insensitively against the existing groups
- Amounts are plain numbers such as "500" or "32.75", taken from "$500" or "32.75 dollars"
- Suggested icons should look like: ${SUGGESTED_ICONS.join(', ')}

Return ONLY a JSON object with this exact structure:
{
  "expenses": [
    {
      "amount": "500.00",
      "description": "Dinner at restaurant",
      "category_name": "Food & Dining",
      "group_name": "Trekking Group",
      "is_new_category": false,
      "suggested_icon": null
    },
    {
      "amount": "2000.00",
      "description": "Tent purchase",
      "category_name": "Outdoor Gear",
      "group_name": null,
      "is_new_category": true,
      "suggested_icon": "camping"
    }
  ]
}

Return ONLY the JSON, with no additional text or explanation.`;
}
