export * from "./grid";
export * from "./direction";
export * from "./settings";
