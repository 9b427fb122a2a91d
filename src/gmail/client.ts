import { google, gmail_v1 } from 'googleapis';
import { authorize } from './auth';
import { Mailbox, MailboxLabel } from './mailbox';
import { GmailMessageData } from '../types';
import { GmailConfig } from '../config';
import { classifyError, formatError } from '../utils/errors';
import { logger } from '../utils/logger';

function decode(data: string): string {
  return Buffer.from(data, 'base64url').toString('utf-8');
}

function collectBodies(parts: gmail_v1.Schema$MessagePart[]): { plain: string; html: string } {
  let plain = '';
  let html = '';
  for (const part of parts) {
    if (part.mimeType === 'text/plain' && part.body?.data) {
      plain += decode(part.body.data);
    } else if (part.mimeType === 'text/html' && part.body?.data) {
      html += decode(part.body.data);
    } else if (part.parts) {
      const nested = collectBodies(part.parts);
      plain += nested.plain;
      html += nested.html;
    }
  }
  return { plain, html };
}

/**
 * Flatten a `format: 'full'` Gmail message. The received time comes from
 * `internalDate`, falling back to the Date header.
 */
export function toMessageData(message: gmail_v1.Schema$Message): GmailMessageData | null {
  const payload = message.payload;
  if (!message.id || !payload) return null;

  const headers = payload.headers || [];
  const header = (name: string) =>
    headers.find(h => h.name?.toLowerCase() === name.toLowerCase())?.value || '';

  const date = message.internalDate
    ? new Date(Number(message.internalDate))
    : new Date(header('Date'));

  let plainBody = '';
  let htmlBody = '';

  if (payload.body?.data) {
    if (payload.mimeType === 'text/html') {
      htmlBody = decode(payload.body.data);
    } else {
      plainBody = decode(payload.body.data);
    }
  } else if (payload.parts) {
    const { plain, html } = collectBodies(payload.parts);
    plainBody = plain;
    htmlBody = html;
  }

  return {
    id: message.id,
    threadId: message.threadId || message.id,
    labelIds: message.labelIds || [],
    subject: header('Subject'),
    from: header('From'),
    date,
    snippet: message.snippet || '',
    plainBody,
    htmlBody,
  };
}

export class GmailClient implements Mailbox {
  private gmail: gmail_v1.Gmail | null = null;

  constructor(private readonly config: GmailConfig) {}

  async init() {
    const auth = await authorize(this.config);
    this.gmail = google.gmail({ version: 'v1', auth });
  }

  private async api(): Promise<gmail_v1.Gmail> {
    if (!this.gmail) await this.init();
    if (!this.gmail) throw new Error('Gmail client failed to initialize');
    return this.gmail;
  }

  async listLabels(): Promise<MailboxLabel[]> {
    const gmail = await this.api();
    const res = await gmail.users.labels.list({ userId: 'me' });

    return (res.data.labels || []).flatMap(label =>
      label.id && label.name ? [{ id: label.id, name: label.name }] : []
    );
  }

  async createLabel(name: string): Promise<MailboxLabel> {
    const gmail = await this.api();
    const res = await gmail.users.labels.create({
      userId: 'me',
      requestBody: {
        name,
        labelListVisibility: 'labelShow',
        messageListVisibility: 'show',
      },
    });

    if (!res.data.id) {
      throw new Error(`Gmail did not return an id for label ${name}`);
    }
    return { id: res.data.id, name: res.data.name || name };
  }

  async listMessageIds(labelId: string, query: string): Promise<string[]> {
    const gmail = await this.api();

    const ids: string[] = [];
    let nextPageToken: string | undefined = undefined;

    do {
      const res: { data: gmail_v1.Schema$ListMessagesResponse } = await gmail.users.messages.list({
        userId: 'me',
        labelIds: [labelId],
        q: query,
        pageToken: nextPageToken,
        maxResults: 500,
      });

      for (const message of res.data.messages || []) {
        if (message.id) ids.push(message.id);
      }
      nextPageToken = res.data.nextPageToken || undefined;
    } while (nextPageToken);

    return ids;
  }

  async getMessage(id: string): Promise<GmailMessageData | null> {
    const gmail = await this.api();

    try {
      const res = await gmail.users.messages.get({
        userId: 'me',
        id,
        format: 'full',
      });
      return toMessageData(res.data);
    } catch (error) {
      logger.error(`Failed to fetch message ${id}`, formatError(classifyError(error, { messageId: id })));
      return null;
    }
  }

  async addLabel(messageId: string, labelId: string): Promise<void> {
    const gmail = await this.api();
    await gmail.users.messages.modify({
      userId: 'me',
      id: messageId,
      requestBody: { addLabelIds: [labelId] },
    });
  }
}
