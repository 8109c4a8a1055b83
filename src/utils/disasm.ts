import type { Byte, Word, Quirks } from "@core/cpu/types";
import { decode, type Instruction } from "@core/cpu/decode";

export type ReadByteFn = (addr: Word) => Byte;

function hex1(v: number) { return (v & 0xF).toString(16).toUpperCase(); }
function hex2(v: number) { return (v & 0xFF).toString(16).toUpperCase().padStart(2, "0"); }
function hex3(v: number) { return (v & 0xFFF).toString(16).toUpperCase().padStart(3, "0"); }
function hex4(v: number) { return (v & 0xFFFF).toString(16).toUpperCase().padStart(4, "0"); }

export interface DisasmResult {
  word: Word;
  mnemonic: string;
  operand: string;
  known: boolean;
}

const V = (r: number) => "V" + hex1(r);

// Only the quirks that change how an instruction reads
export type DisasmQuirks = Partial<Pick<Quirks, "jumpWithVx">>;

function format(ins: Instruction, quirks: DisasmQuirks): [string, string] {
  switch (ins.op) {
    case "CLS": return ["CLS", ""];
    case "RET": return ["RET", ""];
    case "JP": return ["JP", "$" + hex3(ins.nnn)];
    case "CALL": return ["CALL", "$" + hex3(ins.nnn)];
    case "SE_IMM": return ["SE", `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case "SNE_IMM": return ["SNE", `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case "SE_REG": return ["SE", `${V(ins.x)}, ${V(ins.y)}`];
    case "SNE_REG": return ["SNE", `${V(ins.x)}, ${V(ins.y)}`];
    case "LD_IMM": return ["LD", `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case "ADD_IMM": return ["ADD", `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case "LD_REG": return ["LD", `${V(ins.x)}, ${V(ins.y)}`];
    case "OR": return ["OR", `${V(ins.x)}, ${V(ins.y)}`];
    case "AND": return ["AND", `${V(ins.x)}, ${V(ins.y)}`];
    case "XOR": return ["XOR", `${V(ins.x)}, ${V(ins.y)}`];
    case "ADD_REG": return ["ADD", `${V(ins.x)}, ${V(ins.y)}`];
    case "SUB": return ["SUB", `${V(ins.x)}, ${V(ins.y)}`];
    case "SHR": return ["SHR", `${V(ins.x)}, ${V(ins.y)}`];
    case "SUBN": return ["SUBN", `${V(ins.x)}, ${V(ins.y)}`];
    case "SHL": return ["SHL", `${V(ins.x)}, ${V(ins.y)}`];
    case "LD_I": return ["LD", "I, $" + hex3(ins.nnn)];
    case "JP_OFFSET": return ["JP", `${V(quirks.jumpWithVx ? ins.x : 0)}, $${hex3(ins.nnn)}`];
    case "RND": return ["RND", `${V(ins.x)}, #$${hex2(ins.kk)}`];
    case "DRW": return ["DRW", `${V(ins.x)}, ${V(ins.y)}, ${ins.n}`];
    case "SKP": return ["SKP", V(ins.x)];
    case "SKNP": return ["SKNP", V(ins.x)];
    case "LD_X_DT": return ["LD", `${V(ins.x)}, DT`];
    case "LD_X_K": return ["LD", `${V(ins.x)}, K`];
    case "LD_DT_X": return ["LD", `DT, ${V(ins.x)}`];
    case "LD_ST_X": return ["LD", `ST, ${V(ins.x)}`];
    case "ADD_I_X": return ["ADD", `I, ${V(ins.x)}`];
    case "LD_F_X": return ["LD", `F, ${V(ins.x)}`];
    case "LD_B_X": return ["LD", `B, ${V(ins.x)}`];
    case "LD_MEM_X": return ["LD", `[I], ${V(ins.x)}`];
    case "LD_X_MEM": return ["LD", `${V(ins.x)}, [I]`];
  }
}

export function disasmWord(word: Word, quirks: DisasmQuirks = {}): DisasmResult {
  const ins = decode(word);
  if (!ins) return { word, mnemonic: "???", operand: "", known: false };
  const [mnemonic, operand] = format(ins, quirks);
  return { word, mnemonic, operand, known: true };
}

export function disasmAt(read: ReadByteFn, pc: Word): DisasmResult {
  const word = ((read(pc & 0xFFF) & 0xFF) << 8) | (read((pc + 1) & 0xFFF) & 0xFF);
  return disasmWord(word);
}

// One listing row: "0200  A22A  LD I, $22A"
export function formatListingLine(pc: Word, res: DisasmResult): string {
  const dis = (res.mnemonic + (res.operand ? " " + res.operand : "")).trim();
  return `${hex3(pc).padStart(4, "0")}  ${hex4(res.word)}  ${dis}`;
}

// Listing row followed by register columns, used by the trace output
export function formatTraceLine(pc: Word, res: DisasmResult, regs: { v: Uint8Array, i: Word, sp: number }): string {
  const left = formatListingLine(pc, res);
  const regCol = 32;
  const pad = left.length < regCol ? " ".repeat(regCol - left.length) : " ";
  const vs = Array.from(regs.v, hex2).join(" ");
  return `${left}${pad}I:${hex4(regs.i)} SP:${hex2(regs.sp)} V:${vs}`;
}

export function disassemble(program: Uint8Array, origin: Word = 0x200, quirks: DisasmQuirks = {}): string[] {
  const lines: string[] = [];
  for (let off = 0; off + 1 < program.length; off += 2) {
    const word = (program[off] << 8) | program[off + 1];
    lines.push(formatListingLine(origin + off, disasmWord(word, quirks)));
  }
  if (program.length % 2 === 1) {
    lines.push(`${hex4(origin + program.length - 1)}  ${hex2(program[program.length - 1])}    .byte $${hex2(program[program.length - 1])}`);
  }
  return lines;
}

// Hex dump, eight bytes per row: "050  F0 90 90 90 F0 20 60 20"
export function dumpMemory(read: ReadByteFn, start: Word = 0, length = 0x1000): string[] {
  const lines: string[] = [];
  for (let row = 0; row < length; row += 8) {
    const bytes: string[] = [];
    for (let k = row; k < Math.min(row + 8, length); k++) bytes.push(hex2(read((start + k) & 0xFFF)));
    lines.push(`${hex3(start + row)}  ${bytes.join(" ")}`);
  }
  return lines;
}
