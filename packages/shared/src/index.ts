export { logger } from "./logger";
export type { Logger } from "./logger";
export { onShutdown, sleep } from "./runtime";
