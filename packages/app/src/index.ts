export * from "./app";
export * from "./catalog";
export * from "./description";
export * from "./errors";
export * from "./keyword-highlighter";
export * from "./languages";
export * from "./navigator";
export * from "./requests";
export * from "./screen";
export * from "./screens/login";
export * from "./screens/problem-detail";
export * from "./screens/problem-list";
export * from "./screens/submission-result";
export * from "./screens/test-result";
export * from "./services";
export * from "./settings";
export * from "./solution-store";
export * from "./types";
