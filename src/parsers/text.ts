import * as cheerio from 'cheerio';
import { GmailMessageData } from '../types';

/**
 * Plain-text view of an alert email. HTML-only alerts are rendered through cheerio.
 */
export function messageText(message: GmailMessageData): string {
  let text = message.plainBody;

  if (!text.trim() && message.htmlBody) {
    // Keep cell and line boundaries apart once tags are gone
    const spaced = message.htmlBody.replace(/<\/(?:p|div|td|th|tr|li)>|<br\s*\/?>/gi, ' $&');
    const $ = cheerio.load(spaced);
    $('script, style').remove();
    text = $.root().text();
  }

  // Normalize whitespace
  return text.replace(/\s+/g, ' ').trim();
}
