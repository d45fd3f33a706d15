import { InstrDescriptor, Operands } from "./types";
import { INSTRUCTIONS } from "./tables";

export function decodeOperands(instruction: number): Operands {
  return {
    nnn: instruction & 0x0fff,
    x: (instruction >> 8) & 0x0f,
    y: (instruction >> 4) & 0x0f,
    kk: instruction & 0x00ff,
    n: instruction & 0x000f,
  };
}

/**
 * Order two descriptors by specificity, most significant nibble first:
 * at the first position where one is fixed and the other is operand data,
 * the fixed one sorts first.
 */
function compareSpecificity(a: InstrDescriptor, b: InstrDescriptor): number {
  for (let pos = 0; pos < 4; pos++) {
    const aFixed = a.encoding[pos] !== null;
    const bFixed = b.encoding[pos] !== null;
    if (aFixed && !bFixed) return -1;
    if (!aFixed && bFixed) return 1;
  }
  return 0;
}

/**
 * Flattened dispatch table. Descriptors are bucketed by their high nibble
 * (a wildcard high nibble lands in every bucket) and each bucket is sorted
 * by specificity, so a lookup is a short scan that returns the first match.
 */
export class OpcodeTable {
  private buckets: InstrDescriptor[][] = [];

  constructor(descriptors: readonly InstrDescriptor[]) {
    for (let i = 0; i < descriptors.length; i++) {
      for (let j = i + 1; j < descriptors.length; j++) {
        const a = descriptors[i];
        const b = descriptors[j];
        if (a.mask === b.mask && a.pattern === b.pattern)
          throw new Error(`Ambiguous opcode encoding: ${a.name} and ${b.name}`);
      }
    }

    for (let high = 0; high < 16; high++) {
      const bucket = descriptors.filter(
        (d) => d.encoding[0] === null || d.encoding[0] === high,
      );
      // Array.prototype.sort is stable, so ties keep definition order
      this.buckets.push([...bucket].sort(compareSpecificity));
    }
  }

  lookup(instruction: number): InstrDescriptor | undefined {
    if (!Number.isInteger(instruction) || instruction < 0 || instruction > 0xffff)
      return undefined;
    const bucket = this.buckets[instruction >> 12];
    return bucket.find((d) => (instruction & d.mask) === d.pattern);
  }

  /**
   * Every descriptor that matches, most specific first. Used to check the
   * table rather than for dispatch.
   */
  candidates(instruction: number): InstrDescriptor[] {
    const bucket = this.buckets[(instruction >> 12) & 0x0f];
    return bucket.filter((d) => (instruction & d.mask) === d.pattern);
  }
}

export const opcodeTable = new OpcodeTable(INSTRUCTIONS);

export function disassemble(instruction: number): string | undefined {
  const desc = opcodeTable.lookup(instruction);
  return desc?.disassemble(decodeOperands(instruction));
}
