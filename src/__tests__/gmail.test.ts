import { describe, it, expect } from 'vitest';
import { toMessageData } from '../gmail/client';
import { extractAuthCode } from '../gmail/auth';

function encode(text: string): string {
  return Buffer.from(text, 'utf-8').toString('base64url');
}

describe('toMessageData', () => {
  it('should read headers and the plain body of a multipart message', () => {
    const data = toMessageData({
      id: 'abc',
      threadId: 'thread-abc',
      labelIds: ['Label_1'],
      snippet: 'Thank you for using',
      internalDate: String(Date.UTC(2024, 2, 5, 9, 0, 0)),
      payload: {
        mimeType: 'multipart/alternative',
        headers: [
          { name: 'subject', value: 'Alert : Update on your HDFC Bank Credit Card' },
          { name: 'From', value: 'HDFC Bank InstaAlerts <alerts@hdfcbank.net>' },
        ],
        parts: [
          { mimeType: 'text/plain', body: { data: encode('Rs 1,499.50 at AMAZON') } },
          { mimeType: 'text/html', body: { data: encode('<p>Rs 1,499.50 at AMAZON</p>') } },
        ],
      },
    });

    expect(data).toEqual({
      id: 'abc',
      threadId: 'thread-abc',
      labelIds: ['Label_1'],
      subject: 'Alert : Update on your HDFC Bank Credit Card',
      from: 'HDFC Bank InstaAlerts <alerts@hdfcbank.net>',
      date: new Date(Date.UTC(2024, 2, 5, 9, 0, 0)),
      snippet: 'Thank you for using',
      plainBody: 'Rs 1,499.50 at AMAZON',
      htmlBody: '<p>Rs 1,499.50 at AMAZON</p>',
    });
  });

  it('should find bodies in nested parts', () => {
    const data = toMessageData({
      id: 'abc',
      payload: {
        mimeType: 'multipart/mixed',
        parts: [
          {
            mimeType: 'multipart/alternative',
            parts: [{ mimeType: 'text/html', body: { data: encode('<b>Sent Rs.120.00</b>') } }],
          },
          { mimeType: 'application/pdf', filename: 'statement.pdf', body: { attachmentId: 'att-1' } },
        ],
      },
    });

    expect(data?.plainBody).toBe('');
    expect(data?.htmlBody).toBe('<b>Sent Rs.120.00</b>');
  });

  it('should fall back to the Date header and the message id for the thread', () => {
    const data = toMessageData({
      id: 'abc',
      payload: {
        mimeType: 'text/html',
        headers: [{ name: 'Date', value: 'Tue, 05 Mar 2024 09:00:00 +0000' }],
        body: { data: encode('<p>hello</p>') },
      },
    });

    expect(data?.threadId).toBe('abc');
    expect(data?.date).toEqual(new Date(Date.UTC(2024, 2, 5, 9, 0, 0)));
    expect(data?.htmlBody).toBe('<p>hello</p>');
    expect(data?.plainBody).toBe('');
  });

  it('should return null without an id or payload', () => {
    expect(toMessageData({ payload: {} })).toBeNull();
    expect(toMessageData({ id: 'abc' })).toBeNull();
  });
});

describe('extractAuthCode', () => {
  it('should accept a bare code or the redirect URL', () => {
    expect(extractAuthCode(' 4/0Abc-123 ')).toBe('4/0Abc-123');
    expect(extractAuthCode('http://localhost/?code=4%2F0Abc-123&scope=gmail.modify')).toBe('4/0Abc-123');
  });
});
