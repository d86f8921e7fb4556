export * from "./casino-engine.module";
export * from "./casino.service";
