/**
 * Auth Commands
 * 授權指令 - 產生授權網址、以授權碼換取 token
 */

import { Command } from 'commander';
import type { ApiClient } from '../services/api.js';
import { createApiClient, formatJSON, reportError } from './shared.js';
import type { AuthorizationUrlOptions } from '../types/auth.js';

export interface AuthUrlResult {
  url: string;
  state: string | null;
}

export interface ExchangeResult {
  accessToken: string;
  expiresIn: number | null;
}

export function runAuthUrl(client: ApiClient, options: AuthorizationUrlOptions): AuthUrlResult {
  const url = client.buildAuthorizationUrl(options);
  return { url, state: client.getLastAuthState() };
}

export async function runExchange(client: ApiClient, code: string): Promise<ExchangeResult> {
  const accessToken = await client.exchangeCodeForToken(code);
  return { accessToken, expiresIn: client.getAccessTokenExpiration() };
}

export const authUrlCommand = new Command('auth-url')
  .description('產生 OAuth2 授權網址')
  .option('--scope <scope>', '授權範圍（空白分隔）')
  .option('--state <state>', '自訂 state（預設隨機產生）')
  .option('--redirect-uri <url>', '覆蓋設定中的回呼網址')
  .action((options: { scope?: string; state?: string; redirectUri?: string }) => {
    try {
      const client = createApiClient();
      const result = runAuthUrl(client, {
        scope: options.scope,
        state: options.state,
        redirectUri: options.redirectUri,
      });
      console.log(formatJSON(result));
    } catch (error) {
      reportError(error);
    }
  });

export const exchangeCommand = new Command('exchange')
  .description('以授權碼換取 Access Token（不會儲存 token）')
  .argument('<code>', '授權碼')
  .action(async (code: string) => {
    try {
      const client = createApiClient();
      console.log(formatJSON(await runExchange(client, code)));
    } catch (error) {
      reportError(error);
    }
  });
