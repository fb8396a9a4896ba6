export * from "./allocations.js";
export * from "./callTree.js";
export * from "./callTreeNavigator.js";
export * from "./config.js";
export * from "./defaults.js";
export * from "./discovery.js";
export * from "./events.js";
export * from "./exceptions.js";
export * from "./frames.js";
export * from "./gc.js";
export * from "./jit.js";
export * from "./lanes.js";
export * from "./parsers/index.js";
export * from "./queryEngine.js";
export * from "./runtimeEvents.js";
export * from "./session.js";
export * from "./snapshot.js";
export * from "./stackAggregator.js";
export * from "./timeline.js";
export * from "./traceSource.js";
export * from "./utils.js";
