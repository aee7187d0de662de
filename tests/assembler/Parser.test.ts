import assert from "node:assert";
import { describe, test } from "node:test";

import { parseProgram } from "../../src/core/assembler/Parser";
import { add, load, store, sub } from "../../src/core/cpu/Instruction";
import {
  InputError,
  InvalidInstructionCount,
  MalformedInstruction,
  TruncatedInput,
} from "../../src/core/exceptions/InputExceptions";

describe("Parser", () => {
  test("parses each instruction kind in program order", () => {
    const program = parseProgram(["3", "LOAD R1, M1", "ADD R2, R1, R3", "STORE R2, M2"].join("\n"));

    assert.deepStrictEqual(program, [load("R1", "M1"), add("R2", "R1", "R3"), store("R2", "M2")]);
  });

  test("treats non-register sources as immediates", () => {
    const [instruction] = parseProgram("1\nSUB R4, R5, 10");

    assert.deepStrictEqual(instruction, sub("R4", "R5", "10"));
    assert.deepStrictEqual(instruction.kind === "sub" ? instruction.src2 : null, { kind: "immediate", text: "10" });
  });

  test("accepts lowercase keywords and operands without commas", () => {
    assert.deepStrictEqual(parseProgram("1\nadd R1 R2 R3"), [add("R1", "R2", "R3")]);
  });

  test("reads lowercase register names as the same registers", () => {
    assert.deepStrictEqual(parseProgram("2\nload r1, M1\nadd r2, r1, R3"), [load("R1", "M1"), add("R2", "R1", "R3")]);
  });

  test("skips blank and comment lines without counting them", () => {
    const source = ["# two instructions", "2", "", "LOAD R1, M1  # fetch", "", "ADD R2, R1, 4"].join("\n");

    assert.deepStrictEqual(parseProgram(source), [load("R1", "M1"), add("R2", "R1", "4")]);
  });

  test("a blank line between instructions does not use up the declared count", () => {
    assert.deepStrictEqual(parseProgram("2\nLOAD R1, M1\n\nADD R2, R1, R3"), [load("R1", "M1"), add("R2", "R1", "R3")]);
  });

  test("ignores lines after the declared count", () => {
    assert.deepStrictEqual(parseProgram("1\nLOAD R1, M1\nGARBAGE"), [load("R1", "M1")]);
  });

  test("an instruction count of zero yields an empty program", () => {
    assert.deepStrictEqual(parseProgram("0\n"), []);
  });

  test("rejects a missing or non-numeric count", () => {
    assert.throws(() => parseProgram(""), {
      name: "InvalidInstructionCount",
      message: "Missing instruction count",
      line: null,
    });
    assert.throws(() => parseProgram("two\nLOAD R1, M1"), {
      name: "InvalidInstructionCount",
      message: "Line 1: Invalid instruction count 'two'",
      line: 1,
    });
    assert.throws(() => parseProgram("-1"), InvalidInstructionCount);
  });

  test("reports truncated input with expected and received counts", () => {
    assert.throws(() => parseProgram("2\nLOAD R1, M1"), (error: unknown) => {
      assert.ok(error instanceof TruncatedInput);
      assert.ok(error instanceof InputError);
      assert.strictEqual(error.expected, 2);
      assert.strictEqual(error.received, 1);
      assert.strictEqual(error.message, "Expected 2 instructions but read 1");
      return true;
    });
  });

  test("rejects unknown keywords with the offending line", () => {
    assert.throws(() => parseProgram("1\nMUL R1, R2, R3"), {
      name: "MalformedInstruction",
      message: "Line 2: Unknown instruction 'MUL': 'MUL R1, R2, R3'",
      line: 2,
    });
  });

  test("rejects wrong operand counts and non-register targets", () => {
    assert.throws(() => parseProgram("1\nADD R1, R2"), {
      message: "Line 2: ADD takes 3 operands, found 2: 'ADD R1, R2'",
    });
    assert.throws(() => parseProgram("1\nLOAD M1, R1"), {
      message: "Line 2: Expected a register, found 'M1': 'LOAD M1, R1'",
    });
    assert.throws(() => parseProgram("1\n, LOAD R1, M1"), MalformedInstruction);
  });
});
