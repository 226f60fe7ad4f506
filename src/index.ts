import { BotConfig, ConfigError, loadConfig } from './config';
import { ConversationPoller } from './conversation/poller';
import { InstagramClient } from './platform/instagramClient';
import { promptOnTerminal } from './session/challengePrompt';
import { SessionManager } from './session/sessionManager';
import { SessionStore } from './session/sessionStore';
import { createBotState } from './types';

function readConfig(): BotConfig | null {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof ConfigError) {
      error.problems.forEach(problem => console.error(problem));
      console.error('Please set: USERNAME, PASSWORD, TARGET_USERNAME in your .env file');
      return null;
    }
    throw error;
  }
}

async function main(): Promise<number> {
  const config = readConfig();
  if (!config) {
    return 1;
  }

  const client = new InstagramClient();
  const sessionManager = new SessionManager(client, new SessionStore(config.sessionFile), promptOnTerminal);
  const poller = new ConversationPoller(config, { client, sessionManager });
  const state = createBotState();

  console.log('🚀 Starting DM autoresponder...');
  if (!(await poller.start(state))) {
    return 1;
  }

  // Graceful shutdown
  const controller = new AbortController();
  const stop = () => {
    console.log('\n🛑 Bot stopped by user.');
    controller.abort();
  };
  process.once('SIGINT', stop);
  process.once('SIGTERM', stop);

  await poller.run(state, controller.signal);
  return 0;
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    console.error('Unexpected error:', error);
    process.exitCode = 1;
  });
