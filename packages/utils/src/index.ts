export * from "./bounded-stack";
export * from "./dirs";
export * as logger from "./logger";
export * from "./type-guards";
