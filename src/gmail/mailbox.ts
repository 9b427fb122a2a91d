import { GmailMessageData } from '../types';

export interface MailboxLabel {
  id: string;
  name: string;
}

/**
 * The slice of a mailbox the importer reads from and labels
 */
export interface Mailbox {
  listLabels(): Promise<MailboxLabel[]>;
  createLabel(name: string): Promise<MailboxLabel>;
  listMessageIds(labelId: string, query: string): Promise<string[]>;
  getMessage(id: string): Promise<GmailMessageData | null>;
  addLabel(messageId: string, labelId: string): Promise<void>;
}
