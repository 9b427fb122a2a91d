import { Parser, TransactionMode } from '../types';
import { CreditCardParser } from './credit-card';
import { UpiParser } from './upi';

export class ParserRegistry {
  private parsers = new Map<TransactionMode, Parser>();

  constructor() {
    this.register(new CreditCardParser());
    this.register(new UpiParser());
  }

  register(parser: Parser) {
    this.parsers.set(parser.mode, parser);
  }

  findParser(mode: TransactionMode): Parser | undefined {
    return this.parsers.get(mode);
  }
}

export const parserRegistry = new ParserRegistry();
