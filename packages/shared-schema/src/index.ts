export * from "./skin";
export * from "./defaults";
export * from "./api";
