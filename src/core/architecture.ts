import { ParseError } from "./errors.js";

export const ARCHITECTURES = ["aarch32", "aarch64", "riscv32", "riscv64", "ia32", "x86_64"] as const;

export type Architecture = (typeof ARCHITECTURES)[number];

export type ArchitectureFamily = "arm" | "riscv" | "x86";

const FAMILIES: Record<Architecture, ArchitectureFamily> = {
  aarch32: "arm",
  aarch64: "arm",
  riscv32: "riscv",
  riscv64: "riscv",
  ia32: "x86",
  x86_64: "x86",
};

const ALIASES: Record<string, Architecture> = {
  arm_hyp: "aarch32",
  amd64: "x86_64",
  X64: "x86_64",
};

export function isArchitecture(value: string): value is Architecture {
  return ARCHITECTURES.some((architecture) => architecture === value);
}

export function parseArchitecture(input: string): Architecture {
  const token = input.trim();
  if (isArchitecture(token)) {
    return token;
  }

  const alias = ALIASES[token];
  if (alias) {
    return alias;
  }

  throw new ParseError(
    "architecture",
    input,
    `Unknown architecture "${input}" (expected one of ${ARCHITECTURES.join(", ")})`,
  );
}

export function architectureFamily(architecture: Architecture): ArchitectureFamily {
  return FAMILIES[architecture];
}
