/**
 * Config Command
 * 設定管理指令 - 只保存 API 認證與網址，不保存 token
 */

import { Command } from 'commander';
import { ValidationError } from '../lib/errors.js';
import { CONFIG_KEYS, ConfigService, isConfigKey } from '../services/config.js';
import { formatJSON, reportError } from './shared.js';
import type { AppConfig, ConfigKey } from '../types/config.js';

function parseKey(key: string): ConfigKey {
  if (!isConfigKey(key)) {
    throw new ValidationError(`Unknown config key: ${key} (expected one of ${CONFIG_KEYS.join(', ')})`);
  }
  return key;
}

/**
 * 遮蔽 clientSecret 以便輸出
 */
export function maskConfig(config: AppConfig): AppConfig {
  if (!config.clientSecret) {
    return config;
  }
  return { ...config, clientSecret: '********' };
}

/**
 * 刪除單一設定值，回傳被刪除的 key
 */
export function runUnset(service: ConfigService, key: string): ConfigKey {
  const configKey = parseKey(key);
  service.delete(configKey);
  return configKey;
}

export const configCommand = new Command('config').description('設定管理');

configCommand
  .command('set')
  .description('設定值')
  .argument('<key>', CONFIG_KEYS.join(' | '))
  .argument('<value>', '值')
  .action((key: string, value: string) => {
    try {
      new ConfigService().set(parseKey(key), value);
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('get')
  .description('取得設定值')
  .argument('<key>', CONFIG_KEYS.join(' | '))
  .action((key: string) => {
    try {
      const value = new ConfigService().get(parseKey(key));
      console.log(value ?? '');
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('unset')
  .description('刪除設定值')
  .argument('<key>', CONFIG_KEYS.join(' | '))
  .action((key: string) => {
    try {
      runUnset(new ConfigService(), key);
    } catch (error) {
      reportError(error);
    }
  });

configCommand
  .command('clear')
  .description('清除所有設定')
  .action(() => {
    new ConfigService().clear();
  });

configCommand
  .command('list')
  .description('列出所有設定（隱藏 secret）')
  .action(() => {
    console.log(formatJSON(maskConfig(new ConfigService().getAll())));
  });

configCommand
  .command('path')
  .description('顯示設定檔路徑')
  .action(() => {
    console.log(new ConfigService().getConfigPath());
  });
