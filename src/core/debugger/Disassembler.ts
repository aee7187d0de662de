import type { Instruction, SourceOperand } from "../cpu/Instruction";

export interface DisassembledInstruction {
  mnemonic: string;
  operands: string[];
  assembly: string;
}

const formatSource = (operand: SourceOperand): string => (operand.kind === "register" ? operand.name : operand.text);

const operandsOf = (instruction: Instruction): string[] => {
  switch (instruction.kind) {
    case "load":
      return [instruction.dest, instruction.memLocation];
    case "store":
      return [instruction.src, instruction.memLocation];
    case "add":
    case "sub":
      return [instruction.dest, formatSource(instruction.src1), formatSource(instruction.src2)];
  }
};

export function disassembleInstruction(instruction: Instruction): DisassembledInstruction {
  const mnemonic = instruction.kind.toUpperCase();
  const operands = operandsOf(instruction);
  return { mnemonic, operands, assembly: `${mnemonic} ${operands.join(", ")}` };
}
