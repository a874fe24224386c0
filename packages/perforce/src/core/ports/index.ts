export type { P4Backend } from "./P4Backend.js";
