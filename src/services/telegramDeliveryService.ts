import { z } from 'zod';
import { describeError } from '../utils/errors.js';
import { logger as rootLogger } from '../utils/logger.js';

const logger = rootLogger.child('TelegramDelivery');

export interface DeliveryResult {
  success: boolean;
  messageId?: string;
  error?: string;
}

/**
 * Sends one formatted message to one recipient. Implementations report failure
 * in the result and do not retry.
 */
export interface NotificationDelivery {
  send(recipientId: string, text: string): Promise<DeliveryResult>;
}

export interface TelegramDeliveryConfig {
  botToken?: string;
  apiBase: string;
}

// Zod schema for runtime validation of Bot API responses
const TelegramSendMessageResponseSchema = z.object({
  ok: z.boolean(),
  result: z.object({ message_id: z.number() }).optional(),
  error_code: z.number().optional(),
  description: z.string().optional(),
});

/**
 * Delivers notifications through the Telegram Bot API `sendMessage` method
 */
export class TelegramDeliveryService implements NotificationDelivery {
  constructor(
    private readonly config: TelegramDeliveryConfig,
    private readonly fetchImpl: (input: string, init?: RequestInit) => Promise<Response> = (input, init) => fetch(input, init)
  ) {}

  isConfigured(): boolean {
    return !!this.config.botToken;
  }

  async send(recipientId: string, text: string): Promise<DeliveryResult> {
    if (!this.config.botToken) {
      return { success: false, error: 'Telegram delivery not configured' };
    }

    if (!recipientId) {
      return { success: false, error: 'Invalid recipient' };
    }

    try {
      const response = await this.fetchImpl(`${this.config.apiBase}/bot${this.config.botToken}/sendMessage`, {
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          Accept: 'application/json',
        },
        body: JSON.stringify({
          chat_id: recipientId,
          text,
          parse_mode: 'HTML',
          disable_web_page_preview: true,
        }),
      });

      const rawData: unknown = await response.json();
      const parseResult = TelegramSendMessageResponseSchema.safeParse(rawData);

      if (!parseResult.success) {
        logger.error('Invalid Telegram API response format:', parseResult.error.issues);
        return { success: false, error: `Invalid Telegram API response (HTTP ${response.status})` };
      }

      const data = parseResult.data;
      if (!data.ok || !data.result) {
        const error = data.description ?? `HTTP ${response.status}`;
        logger.warn(`Telegram rejected message to ${recipientId}: ${error}`);
        return { success: false, error };
      }

      return { success: true, messageId: String(data.result.message_id) };
    } catch (error) {
      const errorMessage = describeError(error);
      logger.error(`Telegram delivery error for ${recipientId}: ${errorMessage}`);
      return { success: false, error: errorMessage };
    }
  }
}
