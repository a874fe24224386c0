export { P4Executor, DEFAULT_TIMEOUT_MS, type P4ExecutorOptions } from "./runner/P4Executor.js";
export { MockBackend, renderMockOutput } from "./mock/MockBackend.js";
