// src/index.ts
//
// Lox Public API
// --------------
// One import point for embedders and tooling.
//
// Example usage:
//   import { runSource } from "treelox";
//   const { exitCode, stdout } = runSource("print 1 + 2;", { io });

export * from "./core/lexer";
export * from "./core/ast";
export * from "./core/parser";
export * from "./core/interpreter";
export * from "./diagnostics";
export * from "./language/lox.language";
export * from "./language/configuration";
export * from "./runner/run";
export * from "./utils/logger";
