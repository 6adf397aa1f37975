export { createBot, type BotDeps } from './bot';
export { getMainMenuKeyboard } from './buttons';
