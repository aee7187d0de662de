export type InstructionKind = "load" | "store" | "add" | "sub";

export type RegisterOperand = { kind: "register"; name: string };
export type ImmediateOperand = { kind: "immediate"; text: string };
export type SourceOperand = RegisterOperand | ImmediateOperand;

export interface LoadInstruction {
  readonly kind: "load";
  readonly dest: string;
  readonly memLocation: string;
}

export interface StoreInstruction {
  readonly kind: "store";
  readonly src: string;
  readonly memLocation: string;
}

interface ArithmeticOperands {
  readonly dest: string;
  readonly src1: SourceOperand;
  readonly src2: SourceOperand;
}

export interface AddInstruction extends ArithmeticOperands {
  readonly kind: "add";
}

export interface SubInstruction extends ArithmeticOperands {
  readonly kind: "sub";
}

export type ArithmeticInstruction = AddInstruction | SubInstruction;
export type MemoryInstruction = LoadInstruction | StoreInstruction;
export type Instruction = MemoryInstruction | ArithmeticInstruction;

export type HazardInfo = {
  sources: string[];
  destination: string | null;
  memLocation: string | null;
  isLoad: boolean;
  isStore: boolean;
};

export const isRegisterName = (token: string): boolean => token.startsWith("R");

export const toSourceOperand = (token: string): SourceOperand =>
  isRegisterName(token) ? { kind: "register", name: token } : { kind: "immediate", text: token };

export const isMemoryInstruction = (instruction: Instruction): instruction is MemoryInstruction =>
  instruction.kind === "load" || instruction.kind === "store";

export const describeHazardInfo = (instruction: Instruction): HazardInfo => {
  switch (instruction.kind) {
    case "load":
      return {
        sources: [],
        destination: instruction.dest,
        memLocation: instruction.memLocation,
        isLoad: true,
        isStore: false,
      };
    case "store":
      return {
        sources: [instruction.src],
        destination: null,
        memLocation: instruction.memLocation,
        isLoad: false,
        isStore: true,
      };
    case "add":
    case "sub": {
      const sources: string[] = [];
      for (const operand of [instruction.src1, instruction.src2]) {
        if (operand.kind === "register") sources.push(operand.name);
      }
      return { sources, destination: instruction.dest, memLocation: null, isLoad: false, isStore: false };
    }
  }
};

export const load = (dest: string, memLocation: string): LoadInstruction => ({ kind: "load", dest, memLocation });

export const store = (src: string, memLocation: string): StoreInstruction => ({ kind: "store", src, memLocation });

export const add = (dest: string, src1: string, src2: string): AddInstruction => ({
  kind: "add",
  dest,
  src1: toSourceOperand(src1),
  src2: toSourceOperand(src2),
});

export const sub = (dest: string, src1: string, src2: string): SubInstruction => ({
  kind: "sub",
  dest,
  src1: toSourceOperand(src1),
  src2: toSourceOperand(src2),
});
