export * from "./b-tree";
export * from "./nodes";
export * from "./rank";
export * from "./logger";
