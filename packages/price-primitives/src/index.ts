export * from "./types.ts";
export * from "./symbols.ts";
export * from "./time.ts";
export * from "./store-document.ts";
