export * from "./model.js";
export type { P4Backend } from "./ports/index.js";
export { P4_PROGRAM, toInvocation, describeInvocation } from "./commands.js";
