import type { AppConfig } from '../config';
import { ConfigError } from '../errors';
import { InstagramSource, type ContentSource } from './instagram';
import { TelegramNotifier, type Notifier } from './telegram';
import { ConsoleNotifier, MockSource } from './mockProviders';

// Real provider when configured, mock otherwise.
export function createContentSource(config: AppConfig): ContentSource {
  return config.contentSource === 'mock' ? new MockSource() : new InstagramSource();
}

export function createNotifier(config: AppConfig): Notifier {
  if (config.notifier === 'console') return new ConsoleNotifier();
  if (!config.telegramBotToken) throw new ConfigError('TELEGRAM_BOT_TOKEN is required when NOTIFIER=telegram');
  return new TelegramNotifier(config.telegramBotToken);
}
