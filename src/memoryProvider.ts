import type { EmailMessage } from "./types.js";
import type { EmailProvider, GetMessagesOptions } from "./emailProvider.js";
import { ConnectionError, DEFAULT_MESSAGE_LIMIT } from "./emailProvider.js";

export interface SentReply {
  original: EmailMessage;
  text: string;
  html?: string;
}

export interface AppliedLabel {
  message: EmailMessage;
  label: string;
}

export interface SentEmail {
  to: string;
  subject: string;
  text: string;
  html?: string;
  sentAt: Date;
}

/**
 * In-process mailbox that keeps messages in memory and records every mutation.
 * Useful for tests and for trying rules without a real account.
 */
export class InMemoryEmailProvider implements EmailProvider {
  private connected = false;
  messages: EmailMessage[] = [];
  replies: SentReply[] = [];
  archived: EmailMessage[] = [];
  labeled: AppliedLabel[] = [];
  sentEmails: SentEmail[] = [];

  async connect(): Promise<boolean> {
    this.connected = true;
    return true;
  }

  async disconnect(): Promise<boolean> {
    this.connected = false;
    return true;
  }

  isConnected(): boolean {
    return this.connected;
  }

  private ensureConnected(): void {
    if (!this.connected) {
      throw new ConnectionError();
    }
  }

  async getMessages(options: GetMessagesOptions = {}): Promise<EmailMessage[]> {
    this.ensureConnected();

    const { fromAddresses, since, limit = DEFAULT_MESSAGE_LIMIT } = options;
    let found = [...this.messages];

    if (fromAddresses && fromAddresses.length > 0) {
      const wanted = fromAddresses.map((address) => address.toLowerCase());
      found = found.filter((message) => {
        const sender = message.sender.toLowerCase();
        return wanted.some((address) => sender.includes(address));
      });
    }

    if (since) {
      found = found.filter((message) => message.date !== undefined && message.date > since);
    }

    return found.slice(0, limit);
  }

  async getMessageById(messageId: string): Promise<EmailMessage | null> {
    this.ensureConnected();
    return this.messages.find((message) => message.messageId === messageId) ?? null;
  }

  async sendReply(original: EmailMessage, text: string, html?: string): Promise<boolean> {
    this.ensureConnected();
    this.replies.push({ original, text, html });
    return true;
  }

  async archiveMessage(message: EmailMessage): Promise<boolean> {
    this.ensureConnected();
    this.archived.push(message);
    return true;
  }

  async applyLabel(message: EmailMessage, label: string): Promise<boolean> {
    this.ensureConnected();
    this.labeled.push({ message, label });
    return true;
  }

  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean> {
    this.ensureConnected();
    this.sentEmails.push({ to, subject, text, html, sentAt: new Date() });
    return true;
  }

  addMessage(message: EmailMessage): void {
    this.messages.push(message);
  }

  /** Number of mailbox-mutating calls recorded so far */
  mutationCount(): number {
    return this.replies.length + this.archived.length + this.labeled.length;
  }
}
