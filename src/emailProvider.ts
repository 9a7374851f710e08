import type { EmailMessage } from "./types.js";

/**
 * Raised by providers when an operation needs a connection that is not open
 */
export class ConnectionError extends Error {
  constructor(message: string = "Not connected to email provider") {
    super(message);
    this.name = "ConnectionError";
  }
}

export interface GetMessagesOptions {
  fromAddresses?: string[];
  since?: Date;
  limit?: number;
}

/**
 * Mailbox operations the monitor and reporter depend on.
 * Every operation except connect/disconnect/isConnected rejects with
 * ConnectionError while disconnected.
 */
export interface EmailProvider {
  connect(): Promise<boolean>;
  disconnect(): Promise<boolean>;
  isConnected(): boolean;
  getMessages(options?: GetMessagesOptions): Promise<EmailMessage[]>;
  getMessageById(messageId: string): Promise<EmailMessage | null>;
  sendReply(original: EmailMessage, text: string, html?: string): Promise<boolean>;
  archiveMessage(message: EmailMessage): Promise<boolean>;
  applyLabel(message: EmailMessage, label: string): Promise<boolean>;
  sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean>;
}

export const DEFAULT_MESSAGE_LIMIT = 10;
