import { Token, TokenType } from "../token";
import { ParserFault } from "../errors";

/**
 * Anything the parser can pull tokens from. Sources must end with an EOF
 * token and keep returning it once reached.
 */
export interface TokenSource {
  nextToken(): Token;
}

/**
 * A token source over tokens that were scanned ahead of time.
 */
export class TokenStream implements TokenSource {
  private tokens: Token[];
  private position: number = 0;

  constructor(tokens: Token[]) {
    this.tokens = tokens;
  }

  public nextToken(): Token {
    if (this.position < this.tokens.length) {
      return this.tokens[this.position++];
    }
    const last = this.tokens.length > 0 ? this.tokens[this.tokens.length - 1] : null;
    if (last !== null && last.type === TokenType.EOF) {
      return last;
    }
    throw new ParserFault("token stream ended without EOF", last?.line ?? 1, last?.column ?? 1);
  }
}
