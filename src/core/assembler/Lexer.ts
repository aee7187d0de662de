export type TokenType = "word" | "comma";

export interface Token {
  type: TokenType;
  value: string;
  line: number;
  column: number;
}

export interface LexedLine {
  line: number;
  text: string;
  tokens: Token[];
}

export class Lexer {
  tokenize(source: string): LexedLine[] {
    const lines = source.split(/\r?\n/);
    const lexed: LexedLine[] = [];

    lines.forEach((text, index) => {
      const lineNumber = index + 1;
      const tokens = this.tokenizeLine(text, lineNumber);
      lexed.push({ line: lineNumber, text: text.trim(), tokens });
    });

    return lexed;
  }

  tokenizeLine(text: string, lineNumber: number): Token[] {
    const cleaned = this.stripComment(text);
    const tokens: Token[] = [];

    let i = 0;
    while (i < cleaned.length) {
      const char = cleaned[i];
      if (/\s/.test(char)) {
        i++;
        continue;
      }

      const column = i + 1;

      if (char === ",") {
        tokens.push({ type: "comma", value: ",", line: lineNumber, column });
        i++;
        continue;
      }

      const start = i;
      while (i < cleaned.length && !/[\s,]/.test(cleaned[i])) i++;
      tokens.push({ type: "word", value: cleaned.slice(start, i), line: lineNumber, column });
    }

    return tokens;
  }

  private stripComment(text: string): string {
    const hash = text.indexOf("#");
    return hash === -1 ? text : text.slice(0, hash);
  }
}
