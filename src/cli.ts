import { Command } from 'commander';
import { authUrlCommand, exchangeCommand } from './commands/auth.js';
import { callCommand } from './commands/call.js';
import { configCommand } from './commands/config.js';
import { loggers } from './lib/logger.js';
import { VERSION } from './version.js';

export const cli = new Command();

cli
  .name('linkedin-api')
  .description('LinkedIn API client: OAuth2 authorization and authenticated API calls')
  .version(VERSION);

// 全域選項
cli
  .option('-v, --verbose', '詳細模式（輸出 debug 日誌到 console）')
  .hook('preAction', (command) => {
    if (command.opts().verbose) {
      for (const logger of Object.values(loggers)) {
        logger.setMinLevel('debug');
      }
    }
  });

// 註冊指令
cli.addCommand(authUrlCommand);
cli.addCommand(exchangeCommand);
cli.addCommand(callCommand);
cli.addCommand(configCommand);
