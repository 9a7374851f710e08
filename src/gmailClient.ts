import { google, gmail_v1 } from "googleapis";
import { OAuth2Client } from "google-auth-library";
import type { Credentials } from "google-auth-library";
import * as fs from "fs/promises";
import * as readline from "readline";
import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import type { EmailMessage, GmailCredentials } from "./types.js";
import type { EmailProvider, GetMessagesOptions } from "./emailProvider.js";
import { ConnectionError, DEFAULT_MESSAGE_LIMIT } from "./emailProvider.js";
import { logger } from "./config.js";

const SCOPES = [
  "https://www.googleapis.com/auth/gmail.modify",
  "https://www.googleapis.com/auth/gmail.send",
];

const OAuthClientSchema = z.object({
  client_id: z.string(),
  client_secret: z.string(),
  redirect_uris: z.array(z.string()).default([]),
});

const CredentialsFileSchema = z.object({
  installed: OAuthClientSchema.optional(),
  web: OAuthClientSchema.optional(),
});

const TokenFileSchema = z.object({
  access_token: z.string().nullish(),
  refresh_token: z.string().nullish(),
  scope: z.string().optional(),
  token_type: z.string().nullish(),
  id_token: z.string().nullish(),
  expiry_date: z.number().nullish(),
});

export interface RawMessageParts {
  to: string;
  subject: string;
  text: string;
  html?: string;
  inReplyTo?: string;
  boundary?: string;
}

/**
 * Build the Gmail search query for monitored senders newer than a watermark
 */
export function buildSearchQuery(fromAddresses: string[] = [], since?: Date): string {
  const parts: string[] = [];

  if (fromAddresses.length > 0) {
    parts.push(`(${fromAddresses.map((address) => `from:${address}`).join(" OR ")})`);
  }

  if (since) {
    // Gmail accepts epoch seconds for after:
    parts.push(`after:${Math.floor(since.getTime() / 1000)}`);
  }

  return parts.join(" ");
}

/**
 * Map Gmail system labels to a message location
 */
export function resolveLocation(labelIds: string[]): string | undefined {
  if (labelIds.includes("SPAM")) {
    return "SPAM";
  }
  if (labelIds.includes("INBOX")) {
    return "INBOX";
  }
  return undefined;
}

export function replySubject(subject: string): string {
  return /^re:/i.test(subject.trim()) ? subject : `Re: ${subject}`;
}

function encodeHeader(value: string): string {
  // eslint-disable-next-line no-control-regex
  return /^[\x00-\x7F]*$/.test(value)
    ? value
    : `=?UTF-8?B?${Buffer.from(value, "utf-8").toString("base64")}?=`;
}

/**
 * Build a base64url-encoded RFC 2822 message for users.messages.send
 */
export function buildRawMessage(parts: RawMessageParts): string {
  const headers = [
    `To: ${parts.to}`,
    `Subject: ${encodeHeader(parts.subject)}`,
    "MIME-Version: 1.0",
  ];

  if (parts.inReplyTo) {
    headers.push(`In-Reply-To: ${parts.inReplyTo}`, `References: ${parts.inReplyTo}`);
  }

  let body: string;
  if (parts.html) {
    const boundary = parts.boundary ?? `mailwarden-${uuidv4()}`;
    headers.push(`Content-Type: multipart/alternative; boundary="${boundary}"`);
    body = [
      `--${boundary}`,
      'Content-Type: text/plain; charset="UTF-8"',
      "",
      parts.text,
      `--${boundary}`,
      'Content-Type: text/html; charset="UTF-8"',
      "",
      parts.html,
      `--${boundary}--`,
    ].join("\r\n");
  } else {
    headers.push('Content-Type: text/plain; charset="UTF-8"');
    body = parts.text;
  }

  const message = `${headers.join("\r\n")}\r\n\r\n${body}`;
  return Buffer.from(message, "utf-8").toString("base64url");
}

function decodeBody(data: string): string {
  return Buffer.from(data, "base64").toString("utf-8");
}

function findPart(
  payload: gmail_v1.Schema$MessagePart | undefined,
  mimeType: string
): string | undefined {
  if (!payload) {
    return undefined;
  }
  if (payload.mimeType === mimeType && payload.body?.data) {
    return decodeBody(payload.body.data);
  }
  for (const part of payload.parts ?? []) {
    const found = findPart(part, mimeType);
    if (found !== undefined) {
      return found;
    }
  }
  return undefined;
}

/**
 * Gmail API mailbox provider
 */
export class GmailProvider implements EmailProvider {
  private oauth2Client: OAuth2Client | null = null;
  private gmail: gmail_v1.Gmail | null = null;
  private credentialsFile: string;
  private tokenFile: string;
  private labelIds = new Map<string, string>();

  constructor(credentialsFile: string, tokenFile: string) {
    this.credentialsFile = credentialsFile;
    this.tokenFile = tokenFile;
  }

  /**
   * Authenticate with OAuth2 and open the Gmail API client
   */
  async connect(): Promise<boolean> {
    logger.info("Connecting to Gmail...");

    try {
      const credentials = await this.loadCredentials();
      const { client_id, client_secret, redirect_uris } =
        credentials.installed || credentials.web || {};

      if (!client_id || !client_secret) {
        throw new Error("Invalid credentials file format");
      }

      this.oauth2Client = new google.auth.OAuth2(
        client_id,
        client_secret,
        redirect_uris?.[0] || "http://localhost"
      );

      const token = await this.getToken(this.oauth2Client);
      this.oauth2Client.setCredentials(token);

      this.gmail = google.gmail({ version: "v1", auth: this.oauth2Client });
      logger.info("Connected to Gmail");
      return true;
    } catch (error) {
      logger.error("Failed to connect to Gmail:", error);
      this.gmail = null;
      this.oauth2Client = null;
      return false;
    }
  }

  async disconnect(): Promise<boolean> {
    this.gmail = null;
    this.oauth2Client = null;
    this.labelIds.clear();
    logger.info("Disconnected from Gmail");
    return true;
  }

  isConnected(): boolean {
    return this.gmail !== null;
  }

  private client(): gmail_v1.Gmail {
    if (!this.gmail) {
      throw new ConnectionError("Not connected to Gmail API");
    }
    return this.gmail;
  }

  private async loadCredentials(): Promise<GmailCredentials> {
    try {
      const content = await fs.readFile(this.credentialsFile, "utf-8");
      return CredentialsFileSchema.parse(JSON.parse(content));
    } catch {
      throw new Error(
        `Failed to load credentials from ${this.credentialsFile}. ` +
          "Please download OAuth 2.0 credentials from Google Cloud Console."
      );
    }
  }

  /**
   * Get OAuth2 token, either from file or by prompting user
   */
  private async getToken(oauth2Client: OAuth2Client): Promise<Credentials> {
    try {
      const content = await fs.readFile(this.tokenFile, "utf-8");
      return TokenFileSchema.parse(JSON.parse(content));
    } catch {
      logger.info("No token found, initiating OAuth flow...");
      return await this.getNewToken(oauth2Client);
    }
  }

  private async getNewToken(oauth2Client: OAuth2Client): Promise<Credentials> {
    const authUrl = oauth2Client.generateAuthUrl({
      access_type: "offline",
      scope: SCOPES,
    });

    console.log("\nAuthorize this app by visiting this URL:\n");
    console.log(authUrl);
    console.log("\n");

    const code = await this.promptForCode();
    const { tokens } = await oauth2Client.getToken(code);

    await fs.writeFile(this.tokenFile, JSON.stringify(tokens, null, 2));
    logger.info("Token saved successfully");

    return tokens;
  }

  private promptForCode(): Promise<string> {
    const rl = readline.createInterface({
      input: process.stdin,
      output: process.stdout,
    });

    return new Promise((resolve) => {
      rl.question("Enter the authorization code: ", (code: string) => {
        rl.close();
        resolve(code.trim());
      });
    });
  }

  async getMessages(options: GetMessagesOptions = {}): Promise<EmailMessage[]> {
    const gmail = this.client();
    const { fromAddresses = [], since, limit = DEFAULT_MESSAGE_LIMIT } = options;
    const query = buildSearchQuery(fromAddresses, since);

    logger.debug(`Fetching up to ${limit} messages (query: ${query || "<none>"})`);

    const response = await gmail.users.messages.list({
      userId: "me",
      q: query,
      maxResults: limit,
      includeSpamTrash: true,
    });

    const emails: EmailMessage[] = [];
    for (const ref of response.data.messages ?? []) {
      if (!ref.id) {
        continue;
      }
      const email = await this.fetchMessage(gmail, ref.id);
      if (!email || email.labels?.includes("TRASH")) {
        continue;
      }
      // after: has second granularity, keep the watermark strict
      if (since && email.date && email.date <= since) {
        continue;
      }
      emails.push(email);
    }

    return emails;
  }

  async getMessageById(messageId: string): Promise<EmailMessage | null> {
    const gmail = this.client();
    try {
      return await this.fetchMessage(gmail, messageId);
    } catch (error) {
      logger.error(`Failed to fetch message ${messageId}:`, error);
      return null;
    }
  }

  private async fetchMessage(
    gmail: gmail_v1.Gmail,
    messageId: string
  ): Promise<EmailMessage | null> {
    const response = await gmail.users.messages.get({
      userId: "me",
      id: messageId,
      format: "full",
    });

    const message = response.data;
    if (!message.id) {
      return null;
    }

    const headers = message.payload?.headers ?? [];
    const getHeader = (name: string): string => {
      const header = headers.find(
        (h: gmail_v1.Schema$MessagePartHeader) => h.name?.toLowerCase() === name.toLowerCase()
      );
      return header?.value ?? "";
    };

    const labels = message.labelIds ?? [];
    const recipients = getHeader("To")
      .split(",")
      .map((address) => address.trim())
      .filter((address) => address.length > 0);

    const bodyHtml = findPart(message.payload, "text/html");
    const email: EmailMessage = {
      messageId: message.id,
      threadId: message.threadId ?? "",
      sender: getHeader("From"),
      recipients,
      subject: getHeader("Subject"),
      bodyText: findPart(message.payload, "text/plain") ?? message.snippet ?? "",
      labels,
    };

    if (bodyHtml !== undefined) {
      email.bodyHtml = bodyHtml;
    }
    if (message.internalDate) {
      email.date = new Date(parseInt(message.internalDate, 10));
    }
    const location = resolveLocation(labels);
    if (location) {
      email.location = location;
    }
    const internetMessageId = getHeader("Message-ID");
    if (internetMessageId) {
      email.internetMessageId = internetMessageId;
    }

    return email;
  }

  async sendReply(original: EmailMessage, text: string, html?: string): Promise<boolean> {
    const gmail = this.client();

    try {
      await gmail.users.messages.send({
        userId: "me",
        requestBody: {
          raw: buildRawMessage({
            to: original.sender,
            subject: replySubject(original.subject),
            text,
            html,
            inReplyTo: original.internetMessageId,
          }),
          threadId: original.threadId || undefined,
        },
      });
      logger.debug(`Sent reply to message: ${original.messageId}`);
      return true;
    } catch (error) {
      logger.error(`Failed to send reply to ${original.messageId}:`, error);
      return false;
    }
  }

  /**
   * Archive a message by removing the INBOX label
   */
  async archiveMessage(message: EmailMessage): Promise<boolean> {
    const gmail = this.client();

    try {
      await gmail.users.messages.modify({
        userId: "me",
        id: message.messageId,
        requestBody: {
          removeLabelIds: ["INBOX"],
        },
      });
      logger.debug(`Archived message: ${message.messageId}`);
      return true;
    } catch (error) {
      logger.error(`Failed to archive message ${message.messageId}:`, error);
      return false;
    }
  }

  async applyLabel(message: EmailMessage, label: string): Promise<boolean> {
    const gmail = this.client();

    try {
      const labelId = await this.getOrCreateLabel(gmail, label);
      await gmail.users.messages.modify({
        userId: "me",
        id: message.messageId,
        requestBody: {
          addLabelIds: [labelId],
        },
      });
      logger.debug(`Applied label ${label} to message: ${message.messageId}`);
      return true;
    } catch (error) {
      logger.error(`Failed to apply label ${label} to ${message.messageId}:`, error);
      return false;
    }
  }

  async sendEmail(to: string, subject: string, text: string, html?: string): Promise<boolean> {
    const gmail = this.client();

    try {
      await gmail.users.messages.send({
        userId: "me",
        requestBody: {
          raw: buildRawMessage({ to, subject, text, html }),
        },
      });
      logger.debug(`Sent email to ${to}: ${subject}`);
      return true;
    } catch (error) {
      logger.error(`Failed to send email to ${to}:`, error);
      return false;
    }
  }

  /**
   * Get or create a Gmail label, caching ids for the connection
   */
  private async getOrCreateLabel(gmail: gmail_v1.Gmail, labelName: string): Promise<string> {
    const cached = this.labelIds.get(labelName);
    if (cached) {
      return cached;
    }

    const response = await gmail.users.labels.list({ userId: "me" });
    const existing = (response.data.labels ?? []).find((l) => l.name === labelName);
    if (existing?.id) {
      this.labelIds.set(labelName, existing.id);
      return existing.id;
    }

    logger.info(`Creating label: ${labelName}`);
    const created = await gmail.users.labels.create({
      userId: "me",
      requestBody: {
        name: labelName,
        labelListVisibility: "labelShow",
        messageListVisibility: "show",
      },
    });

    if (!created.data.id) {
      throw new Error(`Failed to create label: ${labelName}`);
    }

    this.labelIds.set(labelName, created.data.id);
    return created.data.id;
  }
}
