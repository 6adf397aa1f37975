import { env } from './config/env';
import { createLLMClient } from './services/ai';
import { ChatHistoryStore } from './services/chat/chat-history';
import { closeDatabase, initializeDatabase, SqliteEntityStore } from './services/database';
import { startHealthServer } from './services/health/server';
import { createBot } from './services/telegram';

async function main(): Promise<void> {
  try {
    console.log('Starting chat expense tracker...');

    if (!env.TELEGRAM_BOT_TOKEN) {
      throw new Error('TELEGRAM_BOT_TOKEN is required to start the bot');
    }

    const db = initializeDatabase(env.DB_PATH);
    console.log('Database initialized');

    const bot = createBot(env.TELEGRAM_BOT_TOKEN, {
      db,
      store: new SqliteEntityStore(db),
      llm: createLLMClient(env.GEMINI_API_KEY),
      history: new ChatHistoryStore(),
    });
    console.log('Bot initialized');

    const health = startHealthServer(env.HEALTH_PORT);

    process.on('SIGINT', () => {
      console.log('\nShutting down...');
      health.close();
      bot.stop()
        .catch((error: unknown) => console.error('Error stopping bot:', error))
        .finally(() => {
          closeDatabase();
          process.exit(0);
        });
    });

    await bot.start();
  } catch (error) {
    console.error('Fatal error:', error);
    process.exit(1);
  }
}

void main();
