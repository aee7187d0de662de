import { add, isRegisterName, load, store, sub, type Instruction } from "../cpu/Instruction";
import { InvalidInstructionCount, MalformedInstruction, TruncatedInput } from "../exceptions/InputExceptions";
import { Lexer, type LexedLine } from "./Lexer";

type Mnemonic = "LOAD" | "STORE" | "ADD" | "SUB";

const OPERAND_COUNTS: Record<Mnemonic, number> = {
  LOAD: 2,
  STORE: 2,
  ADD: 3,
  SUB: 3,
};

const isMnemonic = (value: string): value is Mnemonic => Object.prototype.hasOwnProperty.call(OPERAND_COUNTS, value);

// Register prefixes share the keywords' case rule: `r1` names R1.
const normalizeRegister = (token: string): string => (token.startsWith("r") ? `R${token.slice(1)}` : token);

export class Parser {
  /**
   * Reads a count-prefixed program. Blank and comment-only lines are skipped and never
   * count towards the declared total, so `2\nLOAD R1, M1\n\nADD R2, R1, R3` holds two
   * instructions rather than the LOAD and an empty record a line-counting reader would see.
   * Anything after the last declared instruction is ignored.
   */
  parse(lexed: LexedLine[]): Instruction[] {
    const records = lexed.filter((line) => line.tokens.length > 0);
    const [header, ...body] = records;

    const expected = this.parseCount(header);
    if (body.length < expected) {
      throw new TruncatedInput(expected, body.length);
    }

    return body.slice(0, expected).map((line) => this.parseInstruction(line));
  }

  parseInstruction(line: LexedLine): Instruction {
    const [operator, ...rest] = line.tokens;
    if (operator.type !== "word") {
      throw new MalformedInstruction(line.text, "Expected an instruction keyword", line.line);
    }

    const mnemonic = operator.value.toUpperCase();
    if (!isMnemonic(mnemonic)) {
      throw new MalformedInstruction(line.text, `Unknown instruction '${operator.value}'`, line.line);
    }

    const operands = rest.filter((token) => token.type === "word").map((token) => normalizeRegister(token.value));
    const required = OPERAND_COUNTS[mnemonic];
    if (operands.length !== required) {
      throw new MalformedInstruction(
        line.text,
        `${mnemonic} takes ${required} operands, found ${operands.length}`,
        line.line,
      );
    }

    const [first, second, third] = operands;
    if (!isRegisterName(first)) {
      throw new MalformedInstruction(line.text, `Expected a register, found '${first}'`, line.line);
    }

    switch (mnemonic) {
      case "LOAD":
        return load(first, second);
      case "STORE":
        return store(first, second);
      case "ADD":
        return add(first, second, third);
      case "SUB":
        return sub(first, second, third);
    }
  }

  private parseCount(header: LexedLine | undefined): number {
    if (!header) {
      throw new InvalidInstructionCount(null);
    }

    const text = header.text;
    if (header.tokens.length !== 1 || !/^\d+$/.test(header.tokens[0].value)) {
      throw new InvalidInstructionCount(text, header.line);
    }

    return Number.parseInt(header.tokens[0].value, 10);
  }
}

export function parseProgram(source: string): Instruction[] {
  return new Parser().parse(new Lexer().tokenize(source));
}
