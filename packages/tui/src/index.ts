// Terminal UI engine

export * from "./editor-buffer";
export * from "./editor-view";
export * from "./errors";
export * from "./event-queue";
export * from "./events";
export * from "./frame-buffer";
export * from "./highlight";
export * from "./input";
export * from "./keys";
export * from "./layout";
export * from "./renderer";
export * from "./stdin-buffer";
export * from "./style";
export * from "./surface";
export * from "./symbols";
export * from "./terminal";
export * from "./utils";
