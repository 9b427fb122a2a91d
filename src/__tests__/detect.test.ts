import { describe, it, expect } from 'vitest';
import { classify, detectBank, detectMode } from '../parsers/detect';
import { DEFAULT_TRANSACTION_LABELS } from '../config';
import { ALERTS, makeMessage } from './fakes';

describe('detectBank', () => {
  it('should recognize the bank from the sender address', () => {
    expect(detectBank('HDFC Bank InstaAlerts <alerts@hdfcbank.net>', 'Dear Card Member')).toBe('HDFC');
    expect(detectBank('credit_cards@icicibank.com', '')).toBe('ICICI');
    expect(detectBank('BankAlerts@kotak.com', '')).toBe('Kotak');
  });

  it('should fall back to "<name> bank" in the body', () => {
    expect(detectBank('noreply@alerts.example.com', ALERTS.federalUpi)).toBe('Federal');
    expect(detectBank('noreply@alerts.example.com', 'Your HSBC Bank card was used')).toBe('HSBC');
  });

  it('should not treat a bare name inside another word as the bank', () => {
    expect(detectBank('noreply@alerts.example.com', 'paid to shop@okaxis')).toBeNull();
  });

  it('should prefer banks earlier in the list when several match', () => {
    expect(detectBank('alerts@hdfcbank.net', 'transfer to your Axis Bank account')).toBe('HDFC');
  });

  it('should return null for unknown senders', () => {
    expect(detectBank('offers@example.com', ALERTS.newsletter)).toBeNull();
  });
});

describe('detectMode', () => {
  it('should take the mode from the transaction label', () => {
    expect(detectMode(['INBOX', 'UPITransactions'], 'credit card', DEFAULT_TRANSACTION_LABELS)).toBe('UPI');
    expect(detectMode(['CreditCardTransactions'], '', DEFAULT_TRANSACTION_LABELS)).toBe('CreditCard');
  });

  it('should fall back to body keywords without a transaction label', () => {
    expect(detectMode(['INBOX'], ALERTS.kotakUpi, DEFAULT_TRANSACTION_LABELS)).toBe('UPI');
    expect(detectMode([], ALERTS.hdfc, DEFAULT_TRANSACTION_LABELS)).toBe('CreditCard');
    expect(detectMode([], ALERTS.newsletter, DEFAULT_TRANSACTION_LABELS)).toBeNull();
  });
});

describe('classify', () => {
  it('should return bank and mode for a recognized alert', () => {
    const message = makeMessage();
    expect(classify(message, ALERTS.hdfc, ['CreditCardTransactions'], DEFAULT_TRANSACTION_LABELS)).toEqual({
      bank: 'HDFC',
      mode: 'CreditCard',
    });
  });

  it('should return null when no bank matches', () => {
    const message = makeMessage({ from: 'offers@example.com', plainBody: ALERTS.newsletter });
    expect(classify(message, ALERTS.newsletter, ['CreditCardTransactions'], DEFAULT_TRANSACTION_LABELS)).toBeNull();
  });
});
