import { describe, it, expect } from 'vitest';
import axios, { AxiosError, type InternalAxiosRequestConfig } from 'axios';
import { TelegramNotifier } from './telegram';
import { InstagramSource } from './instagram';
import { MockSource } from './mockProviders';
import { createNotifier } from './providers';
import { parseReels } from './parse';
import { loadConfig } from '../config';
import { DeliveryError } from '../errors';

function stubHttp(status: number, data: unknown, seen: InternalAxiosRequestConfig[] = []) {
  return axios.create({
    adapter: async (config) => {
      seen.push(config);
      const response = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) throw new AxiosError(`status ${status}`, 'ERR_BAD_RESPONSE', config, null, response);
      return response;
    }
  });
}

describe('TelegramNotifier', () => {
  it('posts an html message to the chat', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    await new TelegramNotifier('test-token', stubHttp(200, { ok: true }, seen)).send('chat-1', '<b>hi</b>');

    expect(seen[0].url).toBe('https://api.telegram.org/bottest-token/sendMessage');
    expect(JSON.parse(String(seen[0].data))).toEqual({
      chat_id: 'chat-1',
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: false
    });
  });

  it('wraps a rejected send in a DeliveryError', async () => {
    const notifier = new TelegramNotifier('test-token', stubHttp(502, { ok: false }));
    await expect(notifier.send('chat-1', 'x')).rejects.toThrow(new DeliveryError('telegram-send-failed: status 502'));
  });
});

describe('InstagramSource', () => {
  it('returns status and raw body without throwing on error codes', async () => {
    const seen: InternalAxiosRequestConfig[] = [];
    const ok = await new InstagramSource(stubHttp(200, '{"data":{}}', seen)).request('chef');
    expect(ok).toEqual({ status: 200, body: '{"data":{}}' });
    expect(seen[0].params).toEqual({ username: 'chef' });
  });
});

describe('MockSource', () => {
  it('serves growing counters in the profile format', async () => {
    const source = new MockSource(() => 0);
    const first = parseReels(JSON.parse((await source.request('chef')).body));
    const second = parseReels(JSON.parse((await source.request('chef')).body));

    expect(first.map((item) => item.views)).toEqual([1000, 2000, 3000]);
    expect(second.map((item) => item.views)).toEqual([2000, 4000, 6000]);
    expect(first[0]).toMatchObject({ url: 'https://www.instagram.com/reel/chef-1/', likes: 50, comments: 5 });
  });
});

describe('createNotifier', () => {
  it('picks the configured channel', () => {
    expect(createNotifier(loadConfig({ TELEGRAM_BOT_TOKEN: 'test-token' }))).toBeInstanceOf(TelegramNotifier);
    expect(createNotifier(loadConfig({ NOTIFIER: 'console' }))).not.toBeInstanceOf(TelegramNotifier);
  });
});
