export class InputError extends Error {
  line: number | null;

  constructor(message: string, line: number | null = null) {
    super(line === null ? message : `Line ${line}: ${message}`);
    this.line = line;
    this.name = "InputError";
  }
}

export class InvalidInstructionCount extends InputError {
  readonly text: string | null;

  constructor(text: string | null, line: number | null = null) {
    super(
      text === null ? "Missing instruction count" : `Invalid instruction count '${text}'`,
      line,
    );
    this.text = text;
    this.name = "InvalidInstructionCount";
  }
}

export class MalformedInstruction extends InputError {
  readonly source: string;

  constructor(source: string, reason: string, line: number | null = null) {
    super(`${reason}: '${source}'`, line);
    this.source = source;
    this.name = "MalformedInstruction";
  }
}

export class TruncatedInput extends InputError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(`Expected ${expected} instruction${expected === 1 ? "" : "s"} but read ${received}`);
    this.expected = expected;
    this.received = received;
    this.name = "TruncatedInput";
  }
}

export class ConfigError extends Error {
  readonly path: string | null;

  constructor(message: string, path: string | null = null) {
    super(path === null ? message : `${path}: ${message}`);
    this.path = path;
    this.name = "ConfigError";
  }
}
