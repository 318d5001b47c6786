import { Token } from "../entities/Token.entity.js";

/**
 * Drops tokens the engine is not confident about.
 */
export class TokenFilter {
  /**
   * Keeps tokens with `confidence > threshold`, in order. The comparison is
   * strict, so a threshold of 0 still drops tokens reported at exactly 0.
   */
  filter(tokens: readonly Token[], threshold: number): Token[] {
    return tokens.filter((token) => token.confidence > threshold);
  }
}
