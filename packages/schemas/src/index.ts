export * from "./albums";
