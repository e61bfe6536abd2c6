import axios, { type AxiosInstance } from 'axios';
import { DeliveryError, errorMessage } from '../errors';

export interface Notifier {
  // resolves once the channel accepted the message, throws DeliveryError otherwise
  send(destination: string, message: string): Promise<void>;
}

export class TelegramNotifier implements Notifier {
  constructor(
    private readonly token: string,
    private readonly http: AxiosInstance = axios.create(),
    private readonly timeoutMs = 10_000
  ) {}

  async send(destination: string, message: string): Promise<void> {
    const url = `https://api.telegram.org/bot${this.token}/sendMessage`;
    try {
      await this.http.post(
        url,
        { chat_id: destination, text: message, parse_mode: 'HTML', disable_web_page_preview: false },
        { timeout: this.timeoutMs }
      );
    } catch (err) {
      const status = axios.isAxiosError(err) ? err.response?.status : undefined;
      const detail = status ? `status ${status}` : errorMessage(err);
      throw new DeliveryError(`telegram-send-failed: ${detail}`, { cause: err });
    }
  }
}
