export interface WhatsAppSender {
  sendText(phone: string, text: string): Promise<void>;
}

export interface EvolutionConfig {
  baseUrl: string;
  apiKey: string;
  instance: string;
  maxAttempts?: number;
  retryBaseDelayMs?: number;
}
