// src/diagnostics/index.ts
//
// Diagnostics barrel: the shared Diagnostic model, the ErrorReporter the
// pipeline reports into, and the lint rules.

export * from "./errors";
export * from "./reporter";
export * from "./lint";
