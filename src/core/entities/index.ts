export * from "./Transaction";
export * from "./Filter";
export * from "./View";
